/**
 * Trello card (subset of fields requested by the relay)
 */
export interface TrelloCard {
  id: string;
  name: string;
  /** ISO timestamp or null */
  due: string | null;
  dueComplete: boolean;
  closed: boolean;
  idList: string;
  shortUrl?: string;
}

export interface TrelloList {
  id: string;
  name: string;
  closed?: boolean;
}

export interface TrelloBoard {
  id: string;
  name: string;
  lists?: TrelloList[];
}

export interface TrelloMember {
  id: string;
  username: string;
}

/**
 * Card creation data (POST /1/cards)
 */
export interface CreateCardData {
  name: string;
  idList: string;
  idMembers?: string[];
  due?: string;
  start?: string;
  pos?: 'top' | 'bottom';
}
