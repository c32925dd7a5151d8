import type { CaptureFields, CommandGrammar, RelayCommand } from './types.js';
import { DEFAULT_GRAMMAR } from './types.js';

export { DEFAULT_GRAMMAR } from './types.js';
export type { CaptureFields, CommandGrammar, RelayCommand, RelayCommandKind } from './types.js';

/**
 * Field labels accepted in a structured capture
 */
const FIELD_LABELS: Record<string, keyof CaptureFields> = {
  task: 'title',
  due: 'due',
  date: 'due',
  start: 'start',
  member: 'member',
};

const FIELD_PATTERN = /^([a-z]+)\s*[:：]\s*(.*)$/i;

/**
 * Classify an inbound message
 *
 * Rules are applied in order: bind, status query, capture.
 *
 * @param message - Raw message text
 * @param grammar - Bind prefix and status keywords
 */
export function classifyMessage(
  message: string,
  grammar: CommandGrammar = DEFAULT_GRAMMAR
): RelayCommand {
  const text = message.trim();
  const lower = text.toLowerCase();

  const prefix = grammar.bindPrefix.toLowerCase();
  if (lower.startsWith(prefix)) {
    const rest = text.slice(prefix.length);
    // "bind" alone or "bind <id>", but not "binder clips"
    if (rest === '' || /^\s/.test(rest)) {
      return { kind: 'bind', accountId: rest.trim() };
    }
  }

  if (grammar.statusKeywords.some((keyword) => lower.includes(keyword.toLowerCase()))) {
    return { kind: 'status' };
  }

  return { kind: 'capture', text, fields: parseCaptureFields(text) };
}

/**
 * Parse "task: Buy milk, due: tomorrow evening, member: bob"
 *
 * Segments are separated by "," or "，". Unlabelled segments after the
 * task field belong to the title, so "task: Buy eggs, milk" keeps both.
 * Returns null unless a non-empty task field is present.
 */
export function parseCaptureFields(text: string): CaptureFields | null {
  const fields: Partial<CaptureFields> = {};
  let inTitle = false;

  for (const segment of text.split(/[,，]/)) {
    const trimmed = segment.trim();
    const match = FIELD_PATTERN.exec(trimmed);
    const field = match ? FIELD_LABELS[match[1]?.toLowerCase() ?? ''] : undefined;

    if (!field) {
      if (inTitle && trimmed && fields.title) {
        fields.title = `${fields.title}, ${trimmed}`;
      }
      continue;
    }

    inTitle = false;
    const value = match?.[2]?.trim();
    if (value && fields[field] === undefined) {
      fields[field] = value;
      inTitle = field === 'title';
    }
  }

  if (!fields.title) {
    return null;
  }

  return {
    title: fields.title,
    ...(fields.due !== undefined && { due: fields.due }),
    ...(fields.start !== undefined && { start: fields.start }),
    ...(fields.member !== undefined && { member: fields.member }),
  };
}
