/**
 * Queue and Worker factory functions
 *
 * Wraps BullMQ with project conventions: organization-aware job envelopes,
 * sensible retry defaults and a shared key prefix.
 */

import { randomUUID } from 'node:crypto';
import { Queue, Worker, type Processor } from 'bullmq';
import type { CreateQueueOptions, CreateWorkerOptions, JobEnvelope } from './types.js';

const DEFAULT_REDIS_URL = 'redis://localhost:6379';

/** Single-node Redis connection options returned by parseRedisUrl. */
export interface RedisConnectionOptions {
  host: string;
  port: number;
  password: string | undefined;
  username: string | undefined;
  db: number;
}

/**
 * Parse a Redis URL into single-node Redis connection options.
 * A missing port falls back to 6379 and a missing or non-numeric path to db 0.
 */
export function parseRedisUrl(url: string): RedisConnectionOptions {
  const parsed = new URL(url);
  return {
    host: parsed.hostname,
    port: parseInt(parsed.port || '6379', 10),
    password: parsed.password || undefined,
    username: parsed.username || undefined,
    db: parsed.pathname ? parseInt(parsed.pathname.slice(1), 10) || 0 : 0,
  };
}

/** Connection for `redisUrl`, or the local default. Shared by queues, workers and DLQs. */
export function resolveConnection(redisUrl?: string): RedisConnectionOptions {
  return parseRedisUrl(redisUrl ?? DEFAULT_REDIS_URL);
}

/** Key prefix shared by every queue and worker in the project. */
export const QUEUE_PREFIX = 'metrica';

/**
 * Create a BullMQ queue with project defaults.
 *
 * @param name - Queue name (e.g. "kpis-aggregation")
 * @param opts - Optional Redis URL and default job options
 * @returns A configured BullMQ Queue instance
 *
 * @example
 * ```ts
 * const queue = createQueue<AggregationTriggerRequest>('kpis-aggregation', { redisUrl });
 * await queue.add('kpis.aggregate_period', envelope);
 * ```
 */
export function createQueue<T = unknown>(
  name: string,
  opts?: CreateQueueOptions,
): Queue<JobEnvelope<T>> {
  const connection = resolveConnection(opts?.redisUrl);

  return new Queue<JobEnvelope<T>>(name, {
    connection,
    prefix: QUEUE_PREFIX,
    defaultJobOptions: {
      attempts: opts?.defaultJobOptions?.attempts ?? 3,
      backoff: opts?.defaultJobOptions?.backoff ?? {
        type: 'exponential',
        delay: 1000,
      },
      removeOnComplete: opts?.defaultJobOptions?.removeOnComplete ?? 1000,
      removeOnFail: opts?.defaultJobOptions?.removeOnFail ?? 5000,
    },
  });
}

/**
 * Create a BullMQ worker for a queue made with createQueue.
 *
 * @param name - Queue name to process (must match a queue created with createQueue)
 * @param processor - Job processing function
 * @param opts - Optional Redis URL, concurrency and lock settings
 * @returns A configured BullMQ Worker instance
 *
 * @example
 * ```ts
 * const worker = createWorker<AggregationTriggerRequest>('kpis-aggregation', async (job) => {
 *   const { organizationId, payload } = job.data;
 *   log.info({ organizationId, kpiId: payload.kpiId }, 'Aggregating period');
 * });
 * ```
 */
export function createWorker<T = unknown>(
  name: string,
  processor: Processor<JobEnvelope<T>>,
  opts?: CreateWorkerOptions,
): Worker<JobEnvelope<T>> {
  const connection = resolveConnection(opts?.redisUrl);

  return new Worker<JobEnvelope<T>>(name, processor, {
    connection,
    prefix: QUEUE_PREFIX,
    concurrency: opts?.concurrency ?? 5,
    lockDuration: opts?.lockDuration ?? 30_000,
    stalledInterval: opts?.stalledInterval ?? 30_000,
  });
}

/**
 * Build a JobEnvelope for submitting to a queue.
 *
 * @param type - Job type name (e.g. "kpis.aggregate_period")
 * @param organizationId - Organization the job runs for
 * @param payload - Job payload data
 * @param maxRetries - Maximum retries (default: 3)
 * @returns An envelope on its first attempt, stamped with a fresh id
 */
export function buildJobEnvelope<T>(
  type: string,
  organizationId: string,
  payload: T,
  maxRetries = 3,
): JobEnvelope<T> {
  return {
    id: randomUUID(),
    type,
    organizationId,
    payload,
    attempts: 1,
    maxRetries,
    createdAt: new Date().toISOString(),
  };
}
