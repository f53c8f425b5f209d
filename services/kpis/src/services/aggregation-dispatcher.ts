import type { JobsOptions } from 'bullmq';
import { createLogger, type Config } from '@metrica/config';
import { buildJobEnvelope, createQueue, type JobEnvelope } from '@metrica/jobs';
import type { AggregationTriggerRequest, AggregationTriggerResult } from '../types.js';
import { runAggregationTrigger, type AggregationDeps } from './aggregation.service.js';

const log = createLogger('kpis:aggregation-dispatch');

export const AGGREGATION_QUEUE_NAME = 'kpis-aggregation';
export const AGGREGATION_JOB_TYPE = 'kpis.aggregate_period';

export interface AggregationDispatchRequest extends AggregationTriggerRequest {
  organizationId: string;
  /** The approval that caused this dispatch, when there is one. */
  reportId?: string;
}

export type DispatchReceipt =
  | { mode: 'queue'; accepted: true; jobId: string }
  | {
      mode: 'inline';
      accepted: boolean;
      attempts: number;
      result: AggregationTriggerResult | null;
      error: string | null;
    };

/** Transport for the aggregation trigger contract. */
export interface AggregationDispatcher {
  dispatch(request: AggregationDispatchRequest): Promise<DispatchReceipt>;
}

function toTriggerRequest(request: AggregationDispatchRequest): AggregationTriggerRequest {
  return {
    kpiId: request.kpiId,
    periodStart: request.periodStart,
    periodEnd: request.periodEnd,
    aggregationMethod: request.aggregationMethod,
  };
}

// ─── Queue Transport ──────────────────────────────────────────────────

/** The slice of a BullMQ queue the dispatcher writes to. */
export interface AggregationJobQueue {
  add(
    name: string,
    data: JobEnvelope<AggregationTriggerRequest>,
    opts?: JobsOptions
  ): Promise<{ id?: string }>;
}

export class QueueAggregationDispatcher implements AggregationDispatcher {
  constructor(
    private readonly queue: AggregationJobQueue,
    private readonly maxAttempts: number
  ) {}

  async dispatch(request: AggregationDispatchRequest): Promise<DispatchReceipt> {
    const trigger = toTriggerRequest(request);
    const envelope = buildJobEnvelope<AggregationTriggerRequest>(
      AGGREGATION_JOB_TYPE,
      request.organizationId,
      trigger,
      this.maxAttempts
    );

    // One job per approval: a redelivered approval does not enqueue twice.
    const jobId = request.reportId ? `aggregate-report-${request.reportId}` : envelope.id;
    const job = await this.queue.add(AGGREGATION_JOB_TYPE, envelope, { jobId });

    log.info(
      { kpiId: trigger.kpiId, periodStart: trigger.periodStart, periodEnd: trigger.periodEnd, jobId },
      'Aggregation job enqueued'
    );
    return { mode: 'queue', accepted: true, jobId: job.id ?? jobId };
  }
}

// ─── Inline Transport ─────────────────────────────────────────────────
export interface InlineDispatchOptions {
  maxAttempts: number;
  backoffMs: number;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Runs the trigger in process with the same retry policy the queue applies.
 * Exhaustion is logged and reported on the receipt; it never throws.
 */
export class InlineAggregationDispatcher implements AggregationDispatcher {
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly deps: AggregationDeps,
    private readonly options: InlineDispatchOptions
  ) {
    this.sleep = options.sleep ?? defaultSleep;
  }

  async dispatch(request: AggregationDispatchRequest): Promise<DispatchReceipt> {
    const trigger = toTriggerRequest(request);
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= this.options.maxAttempts; attempt++) {
      try {
        const result = await runAggregationTrigger(this.deps, trigger);
        return { mode: 'inline', accepted: true, attempts: attempt, result, error: null };
      } catch (err) {
        lastError = err;
        log.warn({ err, kpiId: trigger.kpiId, attempt }, 'Inline aggregation attempt failed');
        if (attempt < this.options.maxAttempts) {
          await this.sleep(this.options.backoffMs * 2 ** (attempt - 1));
        }
      }
    }

    const message = lastError instanceof Error ? lastError.message : String(lastError);
    log.error(
      {
        kpiId: trigger.kpiId,
        periodStart: trigger.periodStart,
        periodEnd: trigger.periodEnd,
        attempts: this.options.maxAttempts,
        error: message,
      },
      'Inline aggregation exhausted retries; entry stays stale until the next reconciliation'
    );
    return {
      mode: 'inline',
      accepted: false,
      attempts: this.options.maxAttempts,
      result: null,
      error: message,
    };
  }
}

// ─── Factory ──────────────────────────────────────────────────────────
export type DispatchConfig = Pick<
  Config,
  'KPI_AGGREGATION_DISPATCH' | 'KPI_AGGREGATION_MAX_ATTEMPTS' | 'KPI_AGGREGATION_BACKOFF_MS' | 'REDIS_URL'
>;

export function createAggregationDispatcher(
  deps: AggregationDeps,
  cfg: DispatchConfig
): AggregationDispatcher {
  if (cfg.KPI_AGGREGATION_DISPATCH === 'inline') {
    return new InlineAggregationDispatcher(deps, {
      maxAttempts: cfg.KPI_AGGREGATION_MAX_ATTEMPTS,
      backoffMs: cfg.KPI_AGGREGATION_BACKOFF_MS,
    });
  }

  const queue = createQueue<AggregationTriggerRequest>(AGGREGATION_QUEUE_NAME, {
    redisUrl: cfg.REDIS_URL,
    defaultJobOptions: {
      attempts: cfg.KPI_AGGREGATION_MAX_ATTEMPTS,
      backoff: { type: 'exponential', delay: cfg.KPI_AGGREGATION_BACKOFF_MS },
    },
  });
  return new QueueAggregationDispatcher(queue, cfg.KPI_AGGREGATION_MAX_ATTEMPTS);
}
