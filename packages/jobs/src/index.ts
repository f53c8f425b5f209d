/**
 * BullMQ queue framework: queue and worker factories, job envelopes
 * and dead letter queues for background job processing.
 */

export {
  createQueue,
  createWorker,
  buildJobEnvelope,
  parseRedisUrl,
  QUEUE_PREFIX,
} from './queue.js';
export type { RedisConnectionOptions } from './queue.js';

export { createDLQ, getDLQName, moveToDeadLetterQueue } from './dlq.js';

export type {
  JobEnvelope,
  CreateQueueOptions,
  CreateWorkerOptions,
  DLQEntry,
} from './types.js';
