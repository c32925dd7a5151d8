import type { LinePushRequest, LinePushResponse } from '@taskrelay/shared-types';

/**
 * LINE API Error
 */
export class LineError extends Error {
  constructor(
    message: string,
    public statusCode: number,
    public response?: unknown
  ) {
    super(message);
    this.name = 'LineError';
  }
}

/**
 * LINE Messaging API Client Configuration
 */
export interface LineClientConfig {
  /** Long-lived channel access token from the LINE Developers console */
  channelAccessToken: string;
  /** Base URL (default: https://api.line.me) */
  baseUrl?: string;
  /** Request timeout in ms (default: 10s) */
  timeoutMs?: number;
}

/** LINE accepts at most five message objects per push */
const MAX_MESSAGES_PER_PUSH = 5;

/**
 * LINE Messaging API Client
 *
 * Sends push messages. Receiving is handled via webhooks
 * (see webhook-validator.ts).
 */
export class LineClient {
  private channelAccessToken: string;
  private baseUrl: string;
  private timeoutMs: number;

  constructor(config: LineClientConfig) {
    this.channelAccessToken = config.channelAccessToken;
    this.baseUrl = config.baseUrl ?? 'https://api.line.me';
    this.timeoutMs = config.timeoutMs ?? 10_000;
  }

  /**
   * Push text messages to a user, group or room
   *
   * @param to - userId, groupId or roomId
   * @param texts - One to five texts, delivered in order
   */
  async pushText(to: string, texts: string[]): Promise<LinePushResponse> {
    if (texts.length === 0 || texts.length > MAX_MESSAGES_PER_PUSH) {
      throw new RangeError(`A push carries 1-${MAX_MESSAGES_PER_PUSH} messages, got ${texts.length}`);
    }

    const payload: LinePushRequest = {
      to,
      messages: texts.map((text) => ({ type: 'text', text })),
    };

    return this.request<LinePushResponse>('/v2/bot/message/push', {
      method: 'POST',
      body: JSON.stringify(payload),
    });
  }

  /**
   * Make authenticated request to the LINE API
   */
  private async request<T>(endpoint: string, options: RequestInit): Promise<T> {
    const url = `${this.baseUrl}${endpoint}`;

    const response = await fetch(url, {
      ...options,
      signal: AbortSignal.timeout(this.timeoutMs),
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.channelAccessToken}`,
        ...options.headers,
      },
    });

    const text = await response.text();
    const data: unknown = text ? JSON.parse(text) : {};

    if (!response.ok) {
      throw new LineError(`LINE API error: ${response.status} ${response.statusText}`, response.status, data);
    }

    return data as T;
  }
}

/**
 * Create LINE client from environment variables
 */
export function createLineClient(timeoutMs?: number): LineClient {
  const channelAccessToken = process.env['LINE_CHANNEL_ACCESS_TOKEN'];

  if (!channelAccessToken) {
    throw new Error('Missing LINE configuration. Required: LINE_CHANNEL_ACCESS_TOKEN');
  }

  return new LineClient({ channelAccessToken, timeoutMs });
}
