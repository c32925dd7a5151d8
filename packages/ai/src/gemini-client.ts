import { GoogleGenerativeAI } from '@google/generative-ai';
import type { Logger } from 'pino';
import { UpstreamUnavailableError, describeError, type CompletionService } from '@taskrelay/relay';
import { ASSISTANT_SYSTEM_PROMPT } from './prompts/assistant.js';

/**
 * The slice of the SDK's GenerativeModel the client calls
 */
export interface TextGenerator {
  generateContent(request: string): Promise<{ response: { text(): string } }>;
}

/**
 * Gemini AI Client Configuration
 */
export interface GeminiClientConfig {
  /** Google AI API key */
  apiKey: string;
  /** Model to use (default: gemini-2.5-flash) */
  model?: string;
  /** Per-request timeout in ms (default: 10s) */
  timeoutMs?: number;
  systemInstruction?: string;
  logger?: Logger;
}

export interface GeminiRetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  sleep: (ms: number) => Promise<void>;
}

const DEFAULT_RETRY: GeminiRetryOptions = {
  maxRetries: 3,
  baseDelayMs: 1000,
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

/**
 * Check if an error is retryable (transient server error)
 */
export function isRetryableError(error: unknown): boolean {
  if (error && typeof error === 'object' && 'status' in error) {
    return error.status === 503 || error.status === 429;
  }
  return false;
}

/**
 * Gemini AI Client
 *
 * Plain-text completions for chat replies. Failures surface as
 * UpstreamUnavailableError('ai-completion').
 */
export class GeminiClient implements CompletionService {
  private readonly retry: GeminiRetryOptions;

  constructor(
    private readonly model: TextGenerator,
    private readonly modelName: string,
    private readonly logger?: Logger,
    retry: Partial<GeminiRetryOptions> = {}
  ) {
    this.retry = { ...DEFAULT_RETRY, ...retry };
  }

  /**
   * Build a client over the Google Generative AI SDK
   */
  static fromConfig(config: GeminiClientConfig): GeminiClient {
    const modelName = config.model ?? 'gemini-2.5-flash';
    const model = new GoogleGenerativeAI(config.apiKey).getGenerativeModel(
      {
        model: modelName,
        systemInstruction: config.systemInstruction ?? ASSISTANT_SYSTEM_PROMPT,
        generationConfig: {
          temperature: 0.7,
          topP: 0.9,
          maxOutputTokens: 1024,
        },
      },
      { timeout: config.timeoutMs ?? 10_000 }
    );

    return new GeminiClient(model, modelName, config.logger);
  }

  /**
   * Generate a reply
   *
   * Retries 503 and 429 with exponential backoff (1s, 2s).
   */
  async complete(prompt: string): Promise<string> {
    const { maxRetries, baseDelayMs, sleep } = this.retry;

    for (let attempt = 1; ; attempt++) {
      try {
        const result = await this.model.generateContent(prompt);
        return result.response.text();
      } catch (error) {
        if (!isRetryableError(error) || attempt >= maxRetries) {
          throw new UpstreamUnavailableError('ai-completion', describeError(error), { cause: error });
        }

        const delay = Math.pow(2, attempt - 1) * baseDelayMs;
        this.logger?.warn({ model: this.modelName, attempt, maxRetries, delay }, 'Retrying Gemini request');
        await sleep(delay);
      }
    }
  }
}

/**
 * Create Gemini client from environment variables
 */
export function createGeminiClient(options: { timeoutMs?: number; logger?: Logger } = {}): GeminiClient {
  const apiKey = process.env['GOOGLE_AI_API_KEY'];

  if (!apiKey) {
    throw new Error('Missing GOOGLE_AI_API_KEY environment variable');
  }

  return GeminiClient.fromConfig({
    apiKey,
    model: process.env['GEMINI_MODEL'] || undefined,
    timeoutMs: options.timeoutMs,
    logger: options.logger,
  });
}
