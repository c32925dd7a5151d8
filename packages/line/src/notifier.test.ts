import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DeliveryFailedError } from '@taskrelay/relay';
import { LineClient, LineError } from './client.js';
import { LineNotifier } from './notifier.js';

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('LineNotifier', () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    fetchMock.mockReset();
  });

  const client = new LineClient({ channelAccessToken: 'test-token', baseUrl: 'https://line.test' });

  function pushedBodies(): Array<{ to: string; messages: Array<{ type: string; text: string }> }> {
    return fetchMock.mock.calls.map(([, init]) => JSON.parse(String(init?.body)));
  }

  it('pushes a short text as one message', async () => {
    fetchMock.mockResolvedValue(jsonResponse(200, {}));

    await new LineNotifier(client).sendMessage('U123', 'hello');

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('https://line.test/v2/bot/message/push');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toMatchObject({ Authorization: 'Bearer test-token' });
    expect(pushedBodies()).toEqual([{ to: 'U123', messages: [{ type: 'text', text: 'hello' }] }]);
  });

  it('splits long text and pushes at most five messages at a time', async () => {
    fetchMock.mockImplementation(async () => jsonResponse(200, {}));
    const text = 'x'.repeat(5000 * 6 + 10);

    await new LineNotifier(client).sendMessage('U123', text);

    const bodies = pushedBodies();
    expect(bodies).toHaveLength(2);
    expect(bodies[0]?.messages).toHaveLength(5);
    expect(bodies[1]?.messages.map((message) => message.text.length)).toEqual([5000, 10]);
  });

  it('wraps API failures in DeliveryFailedError', async () => {
    fetchMock.mockResolvedValue(jsonResponse(400, { message: 'The request body has 1 error(s)' }));

    const error = await new LineNotifier(client).sendMessage('U123', 'hello').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DeliveryFailedError);
    expect(error).toMatchObject({ kind: 'DeliveryFailed', chatIdentity: 'U123' });
    expect(error instanceof Error && error.cause).toBeInstanceOf(LineError);
  });
});

describe('LineClient', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('refuses an empty push', async () => {
    const client = new LineClient({ channelAccessToken: 'test-token' });
    await expect(client.pushText('U1', [])).rejects.toThrow(RangeError);
  });
});
