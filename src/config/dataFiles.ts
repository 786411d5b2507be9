import path from 'path';
import { env } from '@/config/env';

/**
 * Locations of the three ledger files
 */
export interface DataFilePaths {
  users: string;
  accounts: string;
  nextAccountNumber: string;
}

/**
 * Resolve the ledger file paths inside a data directory
 *
 * File names default to the ones configured in the environment, so tests can
 * point a store at a temporary directory without touching process.env.
 */
export function resolveDataFiles(
  dataDir: string = env.DATA_DIR,
  names: Partial<DataFilePaths> = {}
): DataFilePaths {
  const root = path.resolve(dataDir);

  return {
    users: path.join(root, names.users ?? env.USERS_FILE),
    accounts: path.join(root, names.accounts ?? env.ACCOUNTS_FILE),
    nextAccountNumber: path.join(
      root,
      names.nextAccountNumber ?? env.NEXT_ACCOUNT_NUMBER_FILE
    ),
  };
}
