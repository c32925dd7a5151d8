import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { PGlite } from '@electric-sql/pglite';
import { drizzle } from 'drizzle-orm/pglite';
import * as schema from '../schema/index.js';
import { DrizzleAccountLinkRepository } from './account-links.js';
import { SCHEMA_DDL } from './test-ddl.js';

describe('DrizzleAccountLinkRepository', () => {
  let client: PGlite;
  let repository: DrizzleAccountLinkRepository;

  beforeEach(async () => {
    client = new PGlite();
    await client.exec(SCHEMA_DDL);
    repository = new DrizzleAccountLinkRepository(drizzle(client, { schema }));
  });

  afterEach(async () => {
    await client.close();
  });

  it('returns null for an unknown chat', async () => {
    expect(await repository.find('U404')).toBeNull();
  });

  it('overwrites the link when a chat binds again', async () => {
    await repository.upsert({
      chatIdentity: 'U1',
      taskAccountId: 'trello@alice',
      linkedAt: new Date('2026-10-01T00:00:00Z'),
    });
    await repository.upsert({
      chatIdentity: 'U1',
      taskAccountId: 'trello@bob',
      linkedAt: new Date('2026-10-02T00:00:00Z'),
    });

    expect(await repository.find('U1')).toEqual({
      chatIdentity: 'U1',
      taskAccountId: 'trello@bob',
      linkedAt: new Date('2026-10-02T00:00:00Z'),
    });
    expect(await repository.findAll()).toHaveLength(1);
  });
});
