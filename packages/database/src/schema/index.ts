export * from './account-links.js';
export * from './reminder-ledger.js';
