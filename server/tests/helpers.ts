import { openDatabase } from '../src/db.js';
import { LedgerRepository } from '../src/repository.js';
import { LedgerService } from '../src/ledger.js';

/** Fixed clock: 2024-01-05 09:03:07 local time */
export const NOW = new Date(2024, 0, 5, 9, 3, 7);
export const NOW_STAMP = '2024-01-05 09:03:07';

export const PASSWORD = 'test-secret';

export function createLedger() {
  const db = openDatabase(':memory:');
  const repo = new LedgerRepository(db);
  const service = new LedgerService(repo, { hashIterations: 1000, now: () => NOW });
  return { db, repo, service };
}

/** Register users that all share the placeholder password. */
export function signupAll(service: LedgerService, ...usernames: string[]): void {
  for (const username of usernames) {
    const result = service.signup(username, PASSWORD, PASSWORD);
    if (!result.ok) throw new Error(result.message);
  }
}
