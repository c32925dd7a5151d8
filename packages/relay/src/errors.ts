/**
 * Relay error kinds
 *
 * The first three are shown to the user with a dedicated reply.
 * DeliveryFailed is only ever logged.
 */
export type RelayErrorKind =
  | 'InvalidAccountFormat'
  | 'Unlinked'
  | 'UpstreamUnavailable'
  | 'DeliveryFailed';

/**
 * Base class for expected failures of the relay
 */
export abstract class RelayError extends Error {
  abstract readonly kind: RelayErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Bind command carried a task-account id that does not match the expected pattern
 */
export class InvalidAccountFormatError extends RelayError {
  readonly kind = 'InvalidAccountFormat';

  constructor(public readonly accountId: string) {
    super(`Invalid task account id: "${accountId}"`);
  }
}

/**
 * Operation needs a linked task-board account and the chat identity has none
 */
export class UnlinkedError extends RelayError {
  readonly kind = 'Unlinked';

  constructor(public readonly chatIdentity: string) {
    super(`No task account linked to ${chatIdentity}`);
  }
}

/**
 * Upstream services a request can fail on
 */
export type UpstreamService = 'task-board' | 'ai-completion';

/**
 * Task board or AI service failed or timed out
 */
export class UpstreamUnavailableError extends RelayError {
  readonly kind = 'UpstreamUnavailable';

  constructor(
    public readonly service: UpstreamService,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${service} unavailable: ${message}`, options);
  }
}

/**
 * Outbound chat message could not be delivered
 */
export class DeliveryFailedError extends RelayError {
  readonly kind = 'DeliveryFailed';

  constructor(
    public readonly chatIdentity: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`Delivery to ${chatIdentity} failed: ${message}`, options);
  }
}

export function isRelayError(error: unknown): error is RelayError {
  return error instanceof RelayError;
}

/**
 * Readable message for any thrown value
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
