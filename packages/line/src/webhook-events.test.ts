import { describe, expect, it } from 'vitest';
import { extractTextMessages, isLineWebhookPayload } from './webhook-events.js';

describe('isLineWebhookPayload', () => {
  it('requires a destination and an events array', () => {
    expect(isLineWebhookPayload({ destination: 'U0', events: [] })).toBe(true);
    expect(isLineWebhookPayload({ destination: 'U0' })).toBe(false);
    expect(isLineWebhookPayload([])).toBe(false);
    expect(isLineWebhookPayload(null)).toBe(false);
  });
});

describe('extractTextMessages', () => {
  it('keeps text messages and routes replies to the conversation', () => {
    const events = [
      {
        type: 'message',
        webhookEventId: 'evt-user',
        timestamp: 1,
        mode: 'active',
        source: { type: 'user', userId: 'U1' },
        message: { type: 'text', id: 'm1', text: 'status' },
        deliveryContext: { isRedelivery: false },
      },
      {
        type: 'message',
        webhookEventId: 'evt-group',
        timestamp: 2,
        source: { type: 'group', groupId: 'C1', userId: 'U2' },
        message: { type: 'text', id: 'm2', text: 'task: Ship, due: tomorrow' },
        deliveryContext: { isRedelivery: true },
      },
      {
        type: 'message',
        webhookEventId: 'evt-room',
        timestamp: 3,
        source: { type: 'room', roomId: 'R1' },
        message: { type: 'text', id: 'm3', text: 'hello' },
      },
    ];

    expect(extractTextMessages(events)).toEqual([
      { webhookEventId: 'evt-user', chatIdentity: 'U1', text: 'status', timestamp: 1, isRedelivery: false },
      {
        webhookEventId: 'evt-group',
        chatIdentity: 'C1',
        text: 'task: Ship, due: tomorrow',
        timestamp: 2,
        isRedelivery: true,
      },
      { webhookEventId: 'evt-room', chatIdentity: 'R1', text: 'hello', timestamp: 3, isRedelivery: false },
    ]);
  });

  it('drops other events, non-text messages and malformed entries', () => {
    const events = [
      { type: 'follow', webhookEventId: 'evt-1', timestamp: 1, source: { type: 'user', userId: 'U1' } },
      {
        type: 'message',
        webhookEventId: 'evt-2',
        timestamp: 2,
        source: { type: 'user', userId: 'U1' },
        message: { type: 'sticker', id: 'm2' },
      },
      {
        type: 'message',
        webhookEventId: 'evt-3',
        timestamp: 3,
        mode: 'standby',
        source: { type: 'user', userId: 'U1' },
        message: { type: 'text', id: 'm3', text: 'hi' },
      },
      { type: 'message', webhookEventId: 'evt-4', timestamp: 4, message: { type: 'text', id: 'm4', text: 'hi' } },
      'garbage',
      null,
    ];

    expect(extractTextMessages(events)).toEqual([]);
  });
});
