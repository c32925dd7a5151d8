/**
 * Task-account identifiers
 *
 * Format: "<provider>@<member>", currently only the trello provider.
 * The member part is a Trello username or member id.
 */
const ACCOUNT_ID_PATTERN = /^trello@([A-Za-z0-9_]{1,64})$/;

export function isValidTaskAccountId(accountId: string): boolean {
  return ACCOUNT_ID_PATTERN.test(accountId);
}

/**
 * Extract the board member from an account id
 *
 * @returns Member id or username, or null when the id is malformed
 */
export function parseTaskAccountId(accountId: string): string | null {
  const match = ACCOUNT_ID_PATTERN.exec(accountId);
  return match?.[1] ?? null;
}
