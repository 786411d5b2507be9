import { Account } from './Account';
import { User } from './User';
import { LedgerResource } from '@/constants/records';

/**
 * The working copy of the ledger
 * Keys are the user NIC and the account number respectively
 */
export interface LedgerTables {
  users: Map<string, User>;
  accounts: Map<string, Account>;
  nextAccountNumber: number;
}

/**
 * A line that could not be decoded during load
 */
export interface SkippedLine {
  resource: LedgerResource;
  lineNumber: number;
  reason: string;
}

export type IntegrityIssueCode =
  | 'NO_ADMIN'
  | 'DANGLING_OWNED_ACCOUNT'
  | 'OWNER_MISMATCH'
  | 'ORPHAN_ACCOUNT'
  | 'BALANCE_MISMATCH';

export interface IntegrityIssue {
  code: IntegrityIssueCode;
  message: string;
  nic?: string;
  accountNumber?: string;
}

/**
 * Outcome of a full load
 *
 * Missing, empty and unreadable files all leave their table empty; they are
 * told apart only in `warnings` and `missingResources`.
 */
export interface LoadReport {
  usersLoaded: number;
  accountsLoaded: number;
  nextAccountNumber: number;
  skippedLines: SkippedLine[];
  missingResources: LedgerResource[];
  warnings: string[];
  integrityIssues: IntegrityIssue[];
  needsBootstrap: boolean;
}

export interface SaveFailure {
  resource: LedgerResource;
  path: string;
  message: string;
}

/**
 * Outcome of a full save
 * A failure on one file does not stop the others from being written
 */
export interface SaveReport {
  ok: boolean;
  failures: SaveFailure[];
}
