import { describe, expect, it, vi } from 'vitest';
import type { JobsOptions } from 'bullmq';
import { enqueueInboundMessage, enqueueOutboundMessage, type MessageJobSink } from './message.queue.js';
import type { MessageJobData, MessageJobType } from '../types/jobs.js';

function fakeQueue() {
  const add = vi.fn(async (_name: MessageJobType, _data: MessageJobData, opts?: JobsOptions) => ({
    id: opts?.jobId ?? 'auto-1',
  }));
  const queue: MessageJobSink = { add };
  return { queue, add };
}

describe('enqueueInboundMessage', () => {
  it('keys the job on the webhook event id and does not retry', async () => {
    const { queue, add } = fakeQueue();

    const id = await enqueueInboundMessage(queue, {
      webhookEventId: 'evt-1',
      chatIdentity: 'U1',
      text: 'status',
      receivedAt: '2026-10-18T09:00:00.000Z',
    });

    expect(id).toBe('inbound-evt-1');
    expect(add).toHaveBeenCalledWith(
      'inbound',
      {
        type: 'inbound',
        webhookEventId: 'evt-1',
        chatIdentity: 'U1',
        text: 'status',
        receivedAt: '2026-10-18T09:00:00.000Z',
      },
      { jobId: 'inbound-evt-1', attempts: 1 }
    );
  });
});

describe('enqueueOutboundMessage', () => {
  it('derives the job id from the triggering event and sequence', async () => {
    const { queue, add } = fakeQueue();

    const id = await enqueueOutboundMessage(queue, { chatIdentity: 'U1', content: 'hi', inReplyTo: 'evt-1' }, 2);

    expect(id).toBe('outbound-evt-1-2');
    expect(add).toHaveBeenCalledWith(
      'outbound',
      { type: 'outbound', chatIdentity: 'U1', content: 'hi', inReplyTo: 'evt-1' },
      { jobId: 'outbound-evt-1-2' }
    );
  });

  it('lets the queue pick an id for unsolicited messages', async () => {
    const { queue, add } = fakeQueue();

    await expect(enqueueOutboundMessage(queue, { chatIdentity: 'U1', content: 'hi' })).resolves.toBe('auto-1');
    expect(add).toHaveBeenCalledWith('outbound', { type: 'outbound', chatIdentity: 'U1', content: 'hi' }, undefined);
  });
});
