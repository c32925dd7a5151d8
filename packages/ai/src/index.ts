export {
  GeminiClient,
  createGeminiClient,
  isRetryableError,
  type GeminiClientConfig,
  type GeminiRetryOptions,
  type TextGenerator,
} from './gemini-client.js';
export { ASSISTANT_SYSTEM_PROMPT } from './prompts/assistant.js';
