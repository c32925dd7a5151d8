/**
 * Queue Names
 */
export const QUEUE_NAMES = {
  MESSAGES: 'taskrelay-messages',
} as const;

/**
 * Job Types for the Messages Queue
 */
export type MessageJobType =
  | 'inbound' // Run the command router on a chat message
  | 'outbound'; // Push a reply to the chat platform

/**
 * Inbound Message Job Data
 * Created when the LINE webhook receives a text message
 */
export interface InboundMessageJobData {
  type: 'inbound';
  /** LINE webhookEventId, stable across redeliveries */
  webhookEventId: string;
  /** userId, groupId or roomId the replies go to */
  chatIdentity: string;
  /** Message text */
  text: string;
  /** ISO timestamp when received */
  receivedAt: string;
}

/**
 * Outbound Message Job Data
 * One reply to push to a chat
 */
export interface OutboundMessageJobData {
  type: 'outbound';
  chatIdentity: string;
  content: string;
  /** webhookEventId of the triggering message */
  inReplyTo?: string;
}

/**
 * Union type for all message job data
 */
export type MessageJobData = InboundMessageJobData | OutboundMessageJobData;
