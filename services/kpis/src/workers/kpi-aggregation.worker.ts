/**
 * KPI Aggregation Worker
 *
 * Consumes the trigger jobs enqueued when a report is approved and runs the
 * manual aggregation path for the job's KPI and period. Known rejections
 * (missing KPI, no approved reports) complete the job with `success: false`;
 * any other failure is retried with exponential backoff and, once attempts
 * are exhausted, moved to the dead letter queue. The approved report is left
 * untouched in every case.
 */

import type { Job, Queue, Worker } from 'bullmq';
import { createLogger } from '@metrica/config';
import { createDLQ, createWorker, moveToDeadLetterQueue } from '@metrica/jobs';
import type { DLQEntry, JobEnvelope } from '@metrica/jobs';
import type { AggregationTriggerRequest, AggregationTriggerResult } from '../types.js';
import { runAggregationTrigger, type AggregationDeps } from '../services/aggregation.service.js';
import { AGGREGATION_QUEUE_NAME } from '../services/aggregation-dispatcher.js';

const log = createLogger('kpis:aggregation-worker');

export interface AggregationWorkerOptions {
  redisUrl: string;
  /** Attempts configured on the queue; the DLQ move happens after the last one. */
  maxAttempts: number;
  concurrency?: number;
}

export interface AggregationWorkerInstance {
  worker: Worker<JobEnvelope<AggregationTriggerRequest>>;
  dlq: Queue<DLQEntry<AggregationTriggerRequest>>;
}

// ─── Processor ──────────────────────────────────────────────────────

export function createAggregationProcessor(deps: AggregationDeps) {
  return async (job: Job<JobEnvelope<AggregationTriggerRequest>>): Promise<AggregationTriggerResult> => {
    const { payload, organizationId } = job.data;
    log.info(
      { jobId: job.data.id, organizationId, kpiId: payload.kpiId, attempt: job.attemptsMade + 1 },
      'Processing KPI aggregation job'
    );

    const result = await runAggregationTrigger(deps, payload);
    if (result.success) {
      log.info({ jobId: job.data.id, entryId: result.entryId, value: result.value }, 'KPI aggregation complete');
    } else {
      log.warn({ jobId: job.data.id, kpiId: payload.kpiId, reason: result.message }, 'KPI aggregation skipped');
    }
    return result;
  };
}

// ─── Worker Startup ─────────────────────────────────────────────────

export function startAggregationWorker(
  deps: AggregationDeps,
  options: AggregationWorkerOptions
): AggregationWorkerInstance {
  const dlq = createDLQ<AggregationTriggerRequest>(AGGREGATION_QUEUE_NAME, options.redisUrl);
  const worker = createWorker<AggregationTriggerRequest>(
    AGGREGATION_QUEUE_NAME,
    createAggregationProcessor(deps),
    { redisUrl: options.redisUrl, concurrency: options.concurrency ?? 5 }
  );

  worker.on('failed', (job, err) => {
    if (!job) return;
    const context = {
      jobId: job.data.id,
      kpiId: job.data.payload.kpiId,
      attemptsMade: job.attemptsMade,
      err,
    };

    if (job.attemptsMade < options.maxAttempts) {
      log.warn(context, 'KPI aggregation attempt failed; will retry');
      return;
    }

    log.error(context, 'KPI aggregation exhausted retries; report stays approved');
    moveToDeadLetterQueue(dlq, job, err).catch((dlqErr: unknown) => {
      log.error({ err: dlqErr, jobId: job.data.id }, 'Failed to move aggregation job to DLQ');
    });
  });

  worker.on('error', (err) => {
    log.error({ err }, 'KPI aggregation worker error');
  });

  log.info({ queue: AGGREGATION_QUEUE_NAME }, 'KPI aggregation worker started');
  return { worker, dlq };
}

export async function stopAggregationWorker(instance: AggregationWorkerInstance): Promise<void> {
  await Promise.allSettled([instance.worker.close()]);
  await Promise.allSettled([instance.dlq.close()]);
  log.info('KPI aggregation worker stopped');
}
