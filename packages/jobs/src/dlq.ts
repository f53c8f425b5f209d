import { Queue, type Job } from 'bullmq';
import { QUEUE_PREFIX, resolveConnection } from './queue.js';
import type { DLQEntry, JobEnvelope } from './types.js';

// ─── Dead Letter Queue ──────────────────────────────────────────────
// Jobs land here once BullMQ has exhausted their retries. Entries are kept
// for inspection and are never retried automatically.

export function getDLQName(queueName: string): string {
  return `${queueName}-dlq`;
}

export function createDLQ<T = unknown>(queueName: string, redisUrl?: string): Queue<DLQEntry<T>> {
  return new Queue<DLQEntry<T>>(getDLQName(queueName), {
    connection: resolveConnection(redisUrl),
    prefix: QUEUE_PREFIX,
    defaultJobOptions: {
      attempts: 1,
      removeOnComplete: false,
      removeOnFail: false,
    },
  });
}

export async function moveToDeadLetterQueue<T>(
  dlq: Queue<DLQEntry<T>>,
  job: Job<JobEnvelope<T>>,
  err: Error,
): Promise<void> {
  const entry: DLQEntry<T> = {
    job: job.data,
    error: err.message,
    stack: err.stack,
    attemptsMade: job.attemptsMade,
    failedAt: new Date().toISOString(),
    sourceQueue: job.queueName,
  };

  await dlq.add(`dlq.${job.data.type}`, entry, { jobId: `dlq-${job.data.id}` });
}
