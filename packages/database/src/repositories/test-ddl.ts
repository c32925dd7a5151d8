/**
 * Tables as drizzle-kit push creates them, for in-process PGlite tests
 */
export const SCHEMA_DDL = `
  CREATE TABLE account_links (
    chat_identity text PRIMARY KEY,
    task_account_id text NOT NULL,
    linked_at timestamptz NOT NULL,
    created_at timestamptz DEFAULT now() NOT NULL,
    updated_at timestamptz DEFAULT now() NOT NULL
  );
  CREATE INDEX idx_account_links_account ON account_links (task_account_id);

  CREATE TABLE reminder_ledger (
    task_account_id text NOT NULL,
    task_id text NOT NULL,
    due_window_key text NOT NULL,
    due_at timestamptz NOT NULL,
    claimed_at timestamptz NOT NULL,
    sent_at timestamptz,
    PRIMARY KEY (task_account_id, task_id, due_window_key)
  );
  CREATE INDEX idx_reminder_ledger_due_at ON reminder_ledger (due_at);
`;
