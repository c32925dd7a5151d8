// Client
export { createDbClient, pingDatabase, closeDbClient, type DbClient, type PostgresDbClient } from './client.js';

// Schema
export * from './schema/index.js';

// Repositories
export { DrizzleAccountLinkRepository } from './repositories/account-links.js';
export { DrizzleReminderLedger, toReminderRecord } from './repositories/reminder-ledger.js';
