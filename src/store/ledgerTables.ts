import { LedgerTables } from '@/models';
import { ACCOUNT_RULES } from '@/config/businessRules';

export function createEmptyTables(): LedgerTables {
  return {
    users: new Map(),
    accounts: new Map(),
    nextAccountNumber: ACCOUNT_RULES.FIRST_ACCOUNT_NUMBER,
  };
}

/**
 * Deep copy, used to undo a failed mutation
 */
export function cloneTables(tables: LedgerTables): LedgerTables {
  return structuredClone(tables);
}

/**
 * Replace the contents of `target` in place, so references held by services
 * stay valid
 */
export function restoreTables(target: LedgerTables, source: LedgerTables): void {
  target.users.clear();
  for (const [nic, user] of source.users) {
    target.users.set(nic, user);
  }

  target.accounts.clear();
  for (const [accountNumber, account] of source.accounts) {
    target.accounts.set(accountNumber, account);
  }

  target.nextAccountNumber = source.nextAccountNumber;
}

export function resetTables(tables: LedgerTables): void {
  restoreTables(tables, createEmptyTables());
}

/**
 * Take the next free account number and advance the counter
 *
 * Numbers already used as Accounts keys are skipped, so a stale counter file
 * can never hand out a duplicate.
 */
export function allocateAccountNumber(tables: LedgerTables): string {
  let candidate = tables.nextAccountNumber;
  while (tables.accounts.has(String(candidate))) {
    candidate += 1;
  }

  tables.nextAccountNumber = candidate + 1;
  return String(candidate);
}
