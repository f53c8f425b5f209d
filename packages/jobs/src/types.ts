/**
 * Shared job types for the queue framework.
 */

/** Wrapper every job payload travels in. */
export interface JobEnvelope<T = unknown> {
  id: string;
  type: string;
  organizationId: string;
  payload: T;
  attempts: number;
  maxRetries: number;
  createdAt: string;
}

export interface CreateQueueOptions {
  redisUrl?: string;
  defaultJobOptions?: {
    attempts?: number;
    backoff?: { type: 'exponential' | 'fixed'; delay: number };
    removeOnComplete?: number | boolean;
    removeOnFail?: number | boolean;
  };
}

export interface CreateWorkerOptions {
  redisUrl?: string;
  concurrency?: number;
  lockDuration?: number;
  stalledInterval?: number;
}

/** What lands in a dead letter queue once a job has exhausted its retries. */
export interface DLQEntry<T = unknown> {
  job: JobEnvelope<T>;
  error: string;
  stack: string | undefined;
  attemptsMade: number;
  failedAt: string;
  sourceQueue: string;
}
