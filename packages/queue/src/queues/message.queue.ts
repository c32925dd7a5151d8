import { Queue, type ConnectionOptions, type JobsOptions } from 'bullmq';
import {
  QUEUE_NAMES,
  type InboundMessageJobData,
  type MessageJobData,
  type MessageJobType,
  type OutboundMessageJobData,
} from '../types/jobs.js';

/**
 * What producers need from a queue; a BullMQ Queue satisfies it
 */
export interface MessageJobSink {
  add(name: MessageJobType, data: MessageJobData, opts?: JobsOptions): Promise<{ id?: string }>;
}

/**
 * Default job options for message queue
 *
 * - 3 retry attempts with exponential backoff
 * - Remove completed jobs (keep failed for debugging)
 */
export const DEFAULT_JOB_OPTIONS = {
  attempts: 3,
  backoff: {
    type: 'exponential' as const,
    delay: 2000, // 2s -> 4s -> 8s
  },
  removeOnComplete: true,
  removeOnFail: false,
} satisfies JobsOptions;

/**
 * Create the messages queue
 */
export function createMessageQueue(connection: ConnectionOptions): Queue<MessageJobData> {
  return new Queue<MessageJobData>(QUEUE_NAMES.MESSAGES, {
    connection,
    defaultJobOptions: DEFAULT_JOB_OPTIONS,
  });
}

/**
 * Helper: Enqueue inbound message for processing
 *
 * The webhookEventId is the job ID, so an event LINE redelivers is not
 * processed twice.
 */
export async function enqueueInboundMessage(
  queue: MessageJobSink,
  data: Omit<InboundMessageJobData, 'type'>
): Promise<string> {
  const jobId = `inbound-${data.webhookEventId}`;
  const job = await queue.add(
    'inbound',
    { type: 'inbound', ...data },
    {
      jobId,
      // The router creates cards; a retry would duplicate them
      attempts: 1,
    }
  );
  return job.id ?? jobId;
}

/**
 * Helper: Enqueue outbound chat message
 *
 * @param sequence - Position among the replies to one inbound message
 */
export async function enqueueOutboundMessage(
  queue: MessageJobSink,
  data: Omit<OutboundMessageJobData, 'type'>,
  sequence = 0
): Promise<string | undefined> {
  const job = await queue.add(
    'outbound',
    { type: 'outbound', ...data },
    data.inReplyTo ? { jobId: `outbound-${data.inReplyTo}-${sequence}` } : undefined
  );
  return job.id;
}
