export {
  LineClient,
  LineError,
  createLineClient,
  type LineClientConfig,
} from './client.js';

export {
  validateWebhookSignature,
  computeLineSignature,
  extractSignatureHeader,
  WebhookValidationError,
} from './webhook-validator.js';

export { LineNotifier } from './notifier.js';

export {
  extractTextMessages,
  isLineWebhookPayload,
  chatIdentityOf,
  type InboundTextEvent,
} from './webhook-events.js';
