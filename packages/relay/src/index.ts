// Errors
export {
  RelayError,
  InvalidAccountFormatError,
  UnlinkedError,
  UpstreamUnavailableError,
  DeliveryFailedError,
  isRelayError,
  describeError,
  type RelayErrorKind,
  type UpstreamService,
} from './errors.js';

// Ports
export type {
  AccountLinkRepository,
  ReminderLedger,
  ClaimOptions,
  TaskSource,
  Notifier,
  CompletionService,
} from './ports.js';

// Account links
export { AccountLinkStore } from './links/store.js';
export { isValidTaskAccountId, parseTaskAccountId } from './links/account-id.js';

// In-memory stores
export { InMemoryAccountLinkRepository, InMemoryReminderLedger } from './stores/memory.js';

// Commands
export {
  classifyMessage,
  parseCaptureFields,
  DEFAULT_GRAMMAR,
  type CaptureFields,
  type CommandGrammar,
  type RelayCommand,
  type RelayCommandKind,
} from './commands/index.js';
export { parseWhen, DEFAULT_DUE_HOUR, type ParseWhenOptions } from './dates.js';

// Router
export {
  createCommandRouter,
  type CommandRouter,
  type CommandRouterDeps,
  type InboundChatMessage,
} from './router.js';

// Reminders
export { dueWindowKey, reminderKeyFor, isReminderDue, type AlertHorizon } from './reminders/window.js';
export {
  ReminderScanner,
  DEFAULT_SCANNER_OPTIONS,
  type ReminderScannerDeps,
  type ReminderScannerOptions,
  type ScanSummary,
} from './reminders/scanner.js';
export { pruneReminderLedger } from './reminders/retention.js';

// Formatters
export {
  formatDue,
  formatBindSuccess,
  formatInvalidAccount,
  formatUnlinked,
  formatUpstreamUnavailable,
  formatStatusSummary,
  formatTaskCreated,
  formatDateHint,
  formatMemberHint,
  formatReminder,
  splitMessage,
  truncate,
  GENERIC_FALLBACK_REPLY,
  MAX_LINE_TEXT_LENGTH,
} from './formatters/line.js';
