import { cleanEnv, str, num, bool } from 'envalid';
import dotenv from 'dotenv';

// Load .env file
dotenv.config();

/**
 * Validated environment variables
 *
 * Using envalid for runtime validation and type safety:
 * - Validates types (string, number, boolean)
 * - Enforces choices for enums
 * - Provides defaults for development/test
 * - Fails fast on startup if required vars are missing
 *
 * The bootstrap admin password has a development default only; production
 * must set it explicitly.
 */
export const env = cleanEnv(process.env, {
  // ==========================================
  // Runtime
  // ==========================================
  NODE_ENV: str({
    choices: ['development', 'test', 'production'],
    default: 'development',
    desc: 'Application environment (affects log formatting)',
  }),

  // ==========================================
  // Data Files
  // ==========================================
  DATA_DIR: str({
    default: './data',
    desc: 'Directory holding the users, accounts and counter files',
  }),
  USERS_FILE: str({
    default: 'users.txt',
    desc: 'Users table file name, relative to DATA_DIR',
  }),
  ACCOUNTS_FILE: str({
    default: 'accounts.txt',
    desc: 'Accounts table file name, relative to DATA_DIR',
  }),
  NEXT_ACCOUNT_NUMBER_FILE: str({
    default: 'next_account_number.txt',
    desc: 'Account number counter file name, relative to DATA_DIR',
  }),

  // ==========================================
  // Ledger
  // ==========================================
  INTEREST_RATE: num({
    default: 0.015,
    desc: 'Annual interest rate applied by accrueInterestAll (0.015 = 1.5%)',
  }),

  // ==========================================
  // First-run Admin
  // ==========================================
  // Used only when the users file is missing, empty or fully corrupt
  BOOTSTRAP_ADMIN_NIC: str({
    default: 'admin',
    desc: 'NIC of the admin created on first run',
  }),
  BOOTSTRAP_ADMIN_NAME: str({
    default: 'System Administrator',
    desc: 'Display name of the first-run admin',
  }),
  BOOTSTRAP_ADMIN_ADDRESS: str({
    default: '',
    desc: 'Address of the first-run admin',
  }),
  BOOTSTRAP_ADMIN_DOB: str({
    default: '1970-01-01',
    desc: 'Date of birth of the first-run admin (YYYY-MM-DD)',
  }),
  BOOTSTRAP_ADMIN_PASSWORD: str({
    devDefault: 'change-me',
    desc: 'Password of the first-run admin (REQUIRED in production)',
  }),

  // ==========================================
  // Logging Configuration
  // ==========================================
  LOG_LEVEL: str({
    choices: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'],
    default: 'info',
    desc: 'Minimum log level to output',
  }),
  LOG_PRETTY: bool({
    default: true,
    desc: 'Pretty-print logs in development (false for JSON logs)',
  }),
});

export type Env = typeof env;
