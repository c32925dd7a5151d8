// Connection
export { createRedisConnection } from './connection.js';

// Queues
export {
  createMessageQueue,
  enqueueInboundMessage,
  enqueueOutboundMessage,
  DEFAULT_JOB_OPTIONS,
  type MessageJobSink,
} from './queues/message.queue.js';

// Types
export * from './types/jobs.js';

// Re-export BullMQ types for convenience
export { Queue, Worker, Job } from 'bullmq';
export type { ConnectionOptions, Processor } from 'bullmq';
