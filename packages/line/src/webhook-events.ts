import type { LineEventSource } from '@taskrelay/shared-types';

/**
 * A text message pulled out of a webhook payload
 */
export interface InboundTextEvent {
  webhookEventId: string;
  /** Where replies go: groupId, roomId or userId */
  chatIdentity: string;
  text: string;
  timestamp: number;
  isRedelivery: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readSource(value: unknown): LineEventSource | null {
  if (!isRecord(value)) {
    return null;
  }
  const { type, userId, groupId, roomId } = value;
  if (type === 'user' && typeof userId === 'string') {
    return { type, userId };
  }
  if (type === 'group' && typeof groupId === 'string') {
    return { type, groupId };
  }
  if (type === 'room' && typeof roomId === 'string') {
    return { type, roomId };
  }
  return null;
}

/**
 * Conversation a reply should be pushed to
 */
export function chatIdentityOf(source: LineEventSource): string {
  switch (source.type) {
    case 'user':
      return source.userId;
    case 'group':
      return source.groupId;
    case 'room':
      return source.roomId;
  }
}

/**
 * Check the payload envelope
 */
export function isLineWebhookPayload(value: unknown): value is { destination: string; events: unknown[] } {
  return isRecord(value) && typeof value['destination'] === 'string' && Array.isArray(value['events']);
}

/**
 * Collect the text message events of a webhook payload
 *
 * Other events, non-text messages, standby-mode events and malformed
 * entries are dropped.
 */
export function extractTextMessages(events: unknown[]): InboundTextEvent[] {
  const result: InboundTextEvent[] = [];

  for (const event of events) {
    if (!isRecord(event) || event['type'] !== 'message' || event['mode'] === 'standby') {
      continue;
    }

    const { webhookEventId, timestamp, message, deliveryContext } = event;
    const source = readSource(event['source']);
    if (
      typeof webhookEventId !== 'string' ||
      typeof timestamp !== 'number' ||
      !source ||
      !isRecord(message) ||
      message['type'] !== 'text' ||
      typeof message['text'] !== 'string'
    ) {
      continue;
    }

    result.push({
      webhookEventId,
      chatIdentity: chatIdentityOf(source),
      text: message['text'],
      timestamp,
      isRedelivery: isRecord(deliveryContext) && deliveryContext['isRedelivery'] === true,
    });
  }

  return result;
}
