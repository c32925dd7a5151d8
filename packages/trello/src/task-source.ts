import type { Logger } from 'pino';
import type { BoardTask, CreatedTask, TaskAccountId, TaskDraft, TaskStatus } from '@taskrelay/shared-types';
import {
  InvalidAccountFormatError,
  UpstreamUnavailableError,
  describeError,
  parseTaskAccountId,
  type TaskSource,
} from '@taskrelay/relay';
import { TrelloError, type TrelloClient } from './client.js';
import { createCard, getMember, getMemberCards, getMemberListNames } from './services/cards.js';
import type { TrelloCard } from './types.js';

export interface TrelloTaskSourceOptions {
  /** List new cards are created in; required for createTask */
  defaultListId?: string;
  /** Lower-case list names that mean "in progress" */
  inProgressLists?: string[];
  logger?: Logger;
}

export const DEFAULT_IN_PROGRESS_LISTS = ['doing', 'in progress'];

/**
 * Derive the relay status of a card
 */
export function cardStatus(card: TrelloCard, listName: string | undefined, inProgressLists: string[]): TaskStatus {
  if (card.dueComplete || card.closed) {
    return 'done';
  }
  if (listName !== undefined && inProgressLists.includes(listName.trim().toLowerCase())) {
    return 'in-progress';
  }
  return 'open';
}

export function toBoardTask(card: TrelloCard, listName: string | undefined, inProgressLists: string[]): BoardTask {
  return {
    id: card.id,
    title: card.name,
    dueAt: card.due ? new Date(card.due) : null,
    status: cardStatus(card, listName, inProgressLists),
    ...(card.shortUrl ? { url: card.shortUrl } : {}),
  };
}

/**
 * Task source over a Trello member's cards
 *
 * Accounts look like "trello@<username or member id>".
 */
export class TrelloTaskSource implements TaskSource {
  private readonly inProgressLists: string[];

  constructor(
    private readonly client: TrelloClient,
    private readonly options: TrelloTaskSourceOptions
  ) {
    this.inProgressLists = (options.inProgressLists ?? DEFAULT_IN_PROGRESS_LISTS).map((name) =>
      name.trim().toLowerCase()
    );
  }

  async listTasks(account: TaskAccountId): Promise<BoardTask[]> {
    const member = this.memberOf(account);

    try {
      const [cards, listNames] = await Promise.all([
        getMemberCards(this.client, member),
        getMemberListNames(this.client, member),
      ]);
      return cards.map((card) => toBoardTask(card, listNames.get(card.idList), this.inProgressLists));
    } catch (error) {
      throw this.translate(account, error);
    }
  }

  /**
   * Create a card in the default list, assigned to the account's member
   *
   * draft.member is added as a second assignee when Trello knows them;
   * otherwise the card is created without them and the name is reported
   * back in unknownMember.
   */
  async createTask(account: TaskAccountId, draft: TaskDraft): Promise<CreatedTask> {
    const member = this.memberOf(account);
    const idList = this.options.defaultListId;
    if (!idList) {
      throw new Error('TrelloTaskSource: no default list configured for new cards');
    }

    try {
      const { id: memberId } = await getMember(this.client, member);
      const idMembers = [memberId];
      let unknownMember: string | undefined;

      if (draft.member !== undefined) {
        const extraId = await this.findMemberId(draft.member);
        if (extraId === null) {
          unknownMember = draft.member;
        } else if (!idMembers.includes(extraId)) {
          idMembers.push(extraId);
        }
      }

      const cardId = await createCard(this.client, {
        name: draft.title,
        idList,
        idMembers,
        due: draft.dueAt?.toISOString(),
        start: draft.startAt?.toISOString(),
      });

      this.options.logger?.debug({ taskAccountId: account, cardId, idMembers }, 'Trello card created');
      return unknownMember === undefined ? { id: cardId } : { id: cardId, unknownMember };
    } catch (error) {
      throw this.translate(account, error);
    }
  }

  /**
   * Member id for a username or id, null when Trello has no such member
   */
  private async findMemberId(name: string): Promise<string | null> {
    const member = name.trim().replace(/^@/, '');
    if (!member) {
      return null;
    }

    try {
      const { id } = await getMember(this.client, member);
      return id;
    } catch (error) {
      if (error instanceof TrelloError && (error.statusCode === 400 || error.statusCode === 404)) {
        return null;
      }
      throw error;
    }
  }

  private memberOf(account: TaskAccountId): string {
    const member = parseTaskAccountId(account);
    if (!member) {
      throw new InvalidAccountFormatError(account);
    }
    return member;
  }

  /**
   * Unknown member → InvalidAccountFormat, anything else → UpstreamUnavailable
   */
  private translate(account: TaskAccountId, error: unknown): Error {
    if (error instanceof TrelloError && (error.statusCode === 400 || error.statusCode === 404)) {
      return new InvalidAccountFormatError(account);
    }
    return new UpstreamUnavailableError('task-board', describeError(error), { cause: error });
  }
}
