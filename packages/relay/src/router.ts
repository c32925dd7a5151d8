import type { Logger } from 'pino';
import type { ChatIdentity, TaskDraft } from '@taskrelay/shared-types';
import type { CompletionService, TaskSource } from './ports.js';
import type { AccountLinkStore } from './links/store.js';
import { classifyMessage, DEFAULT_GRAMMAR, type CaptureFields, type CommandGrammar } from './commands/index.js';
import { parseWhen } from './dates.js';
import {
  InvalidAccountFormatError,
  UnlinkedError,
  UpstreamUnavailableError,
  describeError,
} from './errors.js';
import {
  GENERIC_FALLBACK_REPLY,
  formatBindSuccess,
  formatDateHint,
  formatInvalidAccount,
  formatMemberHint,
  formatStatusSummary,
  formatTaskCreated,
  formatUnlinked,
  formatUpstreamUnavailable,
} from './formatters/line.js';

/**
 * One inbound chat message
 */
export interface InboundChatMessage {
  chatIdentity: ChatIdentity;
  text: string;
}

export interface CommandRouterDeps {
  links: AccountLinkStore;
  tasks: TaskSource;
  completion: CompletionService;
  logger: Logger;
  grammar?: CommandGrammar;
  /** IANA zone for dates in replies and capture fields */
  zone?: string;
  clock?: () => Date;
}

/**
 * Handles one message, resolves to the replies for the sender
 */
export type CommandRouter = (message: InboundChatMessage) => Promise<string[]>;

const UPSTREAM_LABELS: Record<UpstreamUnavailableError['service'], string> = {
  'task-board': 'The task board',
  'ai-completion': 'The AI assistant',
};

/**
 * Command Router
 *
 * Classifies each message and runs it:
 * 1. bind → Account Link Store
 * 2. status query → list open tasks for the linked account
 * 3. anything else → create a task AND ask the AI, independently
 *
 * Never throws; failures become replies.
 */
export function createCommandRouter(deps: CommandRouterDeps): CommandRouter {
  const grammar = deps.grammar ?? DEFAULT_GRAMMAR;
  const zone = deps.zone ?? 'UTC';
  const clock = deps.clock ?? (() => new Date());

  /**
   * Map a failure to the reply the user sees
   */
  function replyForError(error: unknown, context: Record<string, unknown>): string {
    if (error instanceof InvalidAccountFormatError) {
      return formatInvalidAccount(grammar.bindPrefix);
    }
    if (error instanceof UnlinkedError) {
      return formatUnlinked(grammar.bindPrefix);
    }
    if (error instanceof UpstreamUnavailableError) {
      deps.logger.warn({ ...context, service: error.service, error: error.message }, 'Upstream unavailable');
      return formatUpstreamUnavailable(UPSTREAM_LABELS[error.service]);
    }

    deps.logger.error(
      { ...context, error: describeError(error), stack: error instanceof Error ? error.stack : undefined },
      'Unexpected error while handling message'
    );
    return GENERIC_FALLBACK_REPLY;
  }

  async function requireAccount(chatIdentity: ChatIdentity): Promise<string> {
    const account = await deps.links.lookup(chatIdentity);
    if (!account) {
      throw new UnlinkedError(chatIdentity);
    }
    return account;
  }

  async function handleBind(chatIdentity: ChatIdentity, accountId: string): Promise<string> {
    const link = await deps.links.bind(chatIdentity, accountId);
    deps.logger.info({ chatIdentity, taskAccountId: link.taskAccountId }, 'Account linked');
    return formatBindSuccess(link.taskAccountId);
  }

  async function handleStatus(chatIdentity: ChatIdentity): Promise<string> {
    const account = await requireAccount(chatIdentity);
    const tasks = await deps.tasks.listTasks(account);
    const unfinished = tasks.filter((task) => task.status !== 'done');
    return formatStatusSummary(unfinished, zone);
  }

  /**
   * Build the task draft; unparseable dates are dropped with a hint
   */
  function buildDraft(text: string, fields: CaptureFields | null): { draft: TaskDraft; hints: string[] } {
    if (!fields) {
      return { draft: { title: text }, hints: [] };
    }

    const draft: TaskDraft = { title: fields.title };
    const hints: string[] = [];
    const now = clock();

    if (fields.due !== undefined) {
      const dueAt = parseWhen(fields.due, { now, zone });
      if (dueAt) {
        draft.dueAt = dueAt;
      } else {
        hints.push(formatDateHint('due', fields.due));
      }
    }
    if (fields.start !== undefined) {
      const startAt = parseWhen(fields.start, { now, zone });
      if (startAt) {
        draft.startAt = startAt;
      } else {
        hints.push(formatDateHint('start', fields.start));
      }
    }

    if (fields.member !== undefined) {
      draft.member = fields.member;
    }

    return { draft, hints };
  }

  async function createTask(chatIdentity: ChatIdentity, text: string, fields: CaptureFields | null): Promise<string[]> {
    const account = await requireAccount(chatIdentity);
    const { draft, hints } = buildDraft(text, fields);
    const created = await deps.tasks.createTask(account, draft);

    deps.logger.info({ chatIdentity, taskAccountId: account, taskId: created.id }, 'Task created');
    if (created.unknownMember !== undefined) {
      hints.push(formatMemberHint(created.unknownMember));
    }
    return [...hints, formatTaskCreated(draft, zone)];
  }

  async function handleCapture(chatIdentity: ChatIdentity, text: string, fields: CaptureFields | null): Promise<string[]> {
    const [created, completion] = await Promise.allSettled([
      createTask(chatIdentity, text, fields),
      deps.completion.complete(text),
    ]);

    const replies: string[] = [];

    if (created.status === 'fulfilled') {
      replies.push(...created.value);
    } else {
      replies.push(replyForError(created.reason, { chatIdentity, action: 'create-task' }));
    }

    if (completion.status === 'fulfilled') {
      const reply = completion.value.trim();
      if (reply) {
        replies.push(reply);
      }
    } else {
      replies.push(replyForError(completion.reason, { chatIdentity, action: 'ai-completion' }));
    }

    return replies;
  }

  return async (message) => {
    const command = classifyMessage(message.text, grammar);
    const { chatIdentity } = message;

    deps.logger.debug({ chatIdentity, command: command.kind }, 'Routing message');

    try {
      switch (command.kind) {
        case 'bind':
          return [await handleBind(chatIdentity, command.accountId)];
        case 'status':
          return [await handleStatus(chatIdentity)];
        case 'capture':
          return await handleCapture(chatIdentity, command.text, command.fields);
      }
    } catch (error) {
      return [replyForError(error, { chatIdentity, command: command.kind })];
    }
  };
}
