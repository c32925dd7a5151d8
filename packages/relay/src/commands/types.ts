/**
 * Command grammar
 *
 * The relay understands a small fixed set of messages. Anything that is
 * not a bind or a status query is captured as a task.
 */
export interface CommandGrammar {
  /** Token that starts a bind command, e.g. "bind trello@member123" */
  bindPrefix: string;
  /** A message containing any of these is a status query */
  statusKeywords: readonly string[];
}

export const DEFAULT_GRAMMAR: CommandGrammar = {
  bindPrefix: 'bind',
  statusKeywords: ['status', 'progress'],
};

/**
 * Labelled fields of a structured capture ("task: ..., due: ...")
 * Dates are still raw text here.
 */
export interface CaptureFields {
  title: string;
  due?: string;
  start?: string;
  member?: string;
}

/**
 * A classified inbound message
 */
export type RelayCommand =
  | { kind: 'bind'; accountId: string }
  | { kind: 'status' }
  | { kind: 'capture'; text: string; fields: CaptureFields | null };

export type RelayCommandKind = RelayCommand['kind'];
