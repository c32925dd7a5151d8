// Client
export { TrelloClient, TrelloError, createTrelloClient, type TrelloClientConfig } from './client.js';

// Card Service
export { getMemberCards, getMemberListNames, getMember, createCard } from './services/cards.js';

// Task source
export {
  TrelloTaskSource,
  cardStatus,
  toBoardTask,
  DEFAULT_IN_PROGRESS_LISTS,
  type TrelloTaskSourceOptions,
} from './task-source.js';

// Types
export type { CreateCardData, TrelloBoard, TrelloCard, TrelloList, TrelloMember } from './types.js';
