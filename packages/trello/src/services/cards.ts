import type { TrelloClient } from '../client.js';
import type { CreateCardData, TrelloBoard, TrelloCard, TrelloMember } from '../types.js';

const CARD_FIELDS = 'name,due,dueComplete,closed,idList,shortUrl';

/**
 * Open cards the member is assigned to
 */
export async function getMemberCards(client: TrelloClient, member: string): Promise<TrelloCard[]> {
  return client.get<TrelloCard[]>(`/members/${encodeURIComponent(member)}/cards`, {
    filter: 'open',
    fields: CARD_FIELDS,
  });
}

/**
 * Map of list id → list name across the member's open boards
 */
export async function getMemberListNames(client: TrelloClient, member: string): Promise<Map<string, string>> {
  const boards = await client.get<TrelloBoard[]>(`/members/${encodeURIComponent(member)}/boards`, {
    filter: 'open',
    fields: 'name',
    lists: 'open',
  });

  const names = new Map<string, string>();
  for (const board of boards) {
    for (const list of board.lists ?? []) {
      names.set(list.id, list.name);
    }
  }
  return names;
}

/**
 * Resolve a username or member id to the member record
 */
export async function getMember(client: TrelloClient, member: string): Promise<TrelloMember> {
  return client.get<TrelloMember>(`/members/${encodeURIComponent(member)}`, { fields: 'id,username' });
}

/**
 * Create a card
 *
 * @returns Trello card ID
 */
export async function createCard(client: TrelloClient, data: CreateCardData): Promise<string> {
  const card = await client.post<TrelloCard>('/cards', {
    name: data.name,
    idList: data.idList,
    idMembers: data.idMembers?.join(','),
    due: data.due,
    start: data.start,
    pos: data.pos ?? 'top',
  });
  return card.id;
}
