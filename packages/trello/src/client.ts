/**
 * Trello API Client
 *
 * REST client for the Trello API, authenticated with an API key and token
 */

/**
 * Trello API Error
 */
export class TrelloError extends Error {
  constructor(
    message: string,
    public statusCode: number,
    public response?: string
  ) {
    super(message);
    this.name = 'TrelloError';
  }
}

export interface TrelloClientConfig {
  apiKey: string;
  apiToken: string;
  /** Base URL (default: https://api.trello.com/1) */
  baseUrl?: string;
  /** Request timeout in ms (default: 10s) */
  timeoutMs?: number;
}

type QueryParams = Record<string, string | undefined>;

export class TrelloClient {
  private apiKey: string;
  private apiToken: string;
  private baseUrl: string;
  private timeoutMs: number;

  constructor(config: TrelloClientConfig) {
    this.apiKey = config.apiKey;
    this.apiToken = config.apiToken;
    this.baseUrl = config.baseUrl ?? 'https://api.trello.com/1';
    this.timeoutMs = config.timeoutMs ?? 10_000;
  }

  /**
   * Make authenticated request to Trello API
   */
  async request<T>(endpoint: string, params: QueryParams = {}, options: RequestInit = {}): Promise<T> {
    const url = new URL(`${this.baseUrl}${endpoint}`);
    url.searchParams.set('key', this.apiKey);
    url.searchParams.set('token', this.apiToken);
    for (const [name, value] of Object.entries(params)) {
      if (value !== undefined) {
        url.searchParams.set(name, value);
      }
    }

    const response = await fetch(url, {
      ...options,
      signal: AbortSignal.timeout(this.timeoutMs),
      headers: {
        Accept: 'application/json',
        ...options.headers,
      },
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new TrelloError(`Trello API error (${response.status}): ${errorText}`, response.status, errorText);
    }

    return response.json();
  }

  /**
   * GET request
   */
  async get<T>(endpoint: string, params?: QueryParams): Promise<T> {
    return this.request<T>(endpoint, params, { method: 'GET' });
  }

  /**
   * POST request, fields sent as query parameters
   */
  async post<T>(endpoint: string, params: QueryParams): Promise<T> {
    return this.request<T>(endpoint, params, { method: 'POST' });
  }
}

/**
 * Create Trello client from environment variables
 */
export function createTrelloClient(timeoutMs?: number): TrelloClient {
  const apiKey = process.env['TRELLO_API_KEY'];
  const apiToken = process.env['TRELLO_API_TOKEN'];

  if (!apiKey || !apiToken) {
    throw new Error('Missing Trello configuration. Required: TRELLO_API_KEY, TRELLO_API_TOKEN');
  }

  return new TrelloClient({ apiKey, apiToken, timeoutMs });
}
