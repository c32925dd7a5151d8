/**
 * LINE Messaging API Types
 * Webhook event sources and push request bodies
 */

/**
 * Where an event came from
 *
 * Group and room sources also carry the userId of the sender when the
 * user has consented to sharing it.
 */
export type LineEventSource =
  | { type: 'user'; userId: string }
  | { type: 'group'; groupId: string; userId?: string }
  | { type: 'room'; roomId: string; userId?: string };

/**
 * LINE push message request
 */
export interface LinePushRequest {
  /** userId, groupId or roomId */
  to: string;
  messages: Array<{ type: 'text'; text: string }>;
  notificationDisabled?: boolean;
}

/**
 * LINE push message response
 */
export interface LinePushResponse {
  sentMessages?: Array<{ id: string; quoteToken?: string }>;
}
