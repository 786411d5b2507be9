/**
 * Test data builders
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { Account, AdminUser, CustomerUser, LedgerTables, Transaction } from '@/models';
import { hashPassword } from '@/utils/password';

export const TEST_PASSWORD = 'test-secret';
export const TEST_PASSWORD_HASH = '9caf06bb4436cdbfa20af9121a626bc1093c4f54b31c0fa937957856135345b6';

/**
 * 2024-01-15 09:30:00 local time
 */
export const fixedClock = (): Date => new Date(2024, 0, 15, 9, 30, 0);
export const FIXED_TIMESTAMP = '2024-01-15 09:30:00';

export function makeAdmin(overrides: Partial<AdminUser> = {}): AdminUser {
  return {
    nic: 'ADM-1',
    name: 'Ada Admin',
    address: '1 Main Street',
    dob: '1980-02-29',
    passwordHash: hashPassword(TEST_PASSWORD),
    role: 'admin',
    ...overrides,
  };
}

export function makeCustomer(overrides: Partial<CustomerUser> = {}): CustomerUser {
  return {
    nic: 'CUS-1',
    name: 'Carl Customer',
    address: '22 Side Road',
    dob: '1990-05-15',
    passwordHash: hashPassword(TEST_PASSWORD),
    role: 'customer',
    ownedAccounts: [],
    ...overrides,
  };
}

export function makeAccount(overrides: Partial<Account> = {}): Account {
  return {
    accountNumber: '1001',
    ownerNic: 'CUS-1',
    balance: '0.00',
    createdAt: FIXED_TIMESTAMP,
    transactions: [],
    ...overrides,
  };
}

export function deposit(amount: string, type: 'Initial Deposit' | 'Deposit' = 'Deposit'): Transaction {
  return { type, timestamp: FIXED_TIMESTAMP, amount };
}

/**
 * Put users and accounts into a table set, keyed as the store keys them
 */
export function seed(
  tables: LedgerTables,
  data: { users?: Array<AdminUser | CustomerUser>; accounts?: Account[] }
): void {
  for (const user of data.users ?? []) {
    tables.users.set(user.nic, user);
  }
  for (const account of data.accounts ?? []) {
    tables.accounts.set(account.accountNumber, account);
  }
}

/**
 * Fresh temporary directory per test
 */
export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'ledger-test-'));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}
