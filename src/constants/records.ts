/**
 * On-disk record format
 *
 * FIELD_DELIMITER separates the fields of a line; LIST_DELIMITER separates
 * the owned account numbers inside the last users field. The two share no
 * characters, so a list can never be mistaken for a field boundary.
 */
export const FIELD_DELIMITER = '|~|';
export const LIST_DELIMITER = ';';

export const RESERVED_DELIMITERS = [FIELD_DELIMITER, LIST_DELIMITER] as const;

/**
 * Number of fields per line
 */
export const USER_FIELD_COUNT = 7;
export const ACCOUNT_FIELD_COUNT = 5;

/**
 * User roles
 */
export const USER_ROLES = {
  ADMIN: 'admin',
  CUSTOMER: 'customer',
} as const;

/**
 * Transaction types, written verbatim into the transactions blob
 */
export const TRANSACTION_TYPES = {
  INITIAL_DEPOSIT: 'Initial Deposit',
  DEPOSIT: 'Deposit',
  WITHDRAWAL: 'Withdrawal',
  TRANSFER_SENT: 'Transfer Sent',
  TRANSFER_RECEIVED: 'Transfer Received',
  INTEREST_APPLIED: 'Interest Applied',
} as const;

/**
 * Transaction types that reduce the balance
 */
export const DEBIT_TRANSACTION_TYPES: ReadonlySet<TransactionType> = new Set<TransactionType>([
  TRANSACTION_TYPES.WITHDRAWAL,
  TRANSACTION_TYPES.TRANSFER_SENT,
]);

/**
 * Ledger resources persisted as separate files
 */
export const LEDGER_RESOURCES = {
  USERS: 'users',
  ACCOUNTS: 'accounts',
  NEXT_ACCOUNT_NUMBER: 'nextAccountNumber',
} as const;

// Type exports
export type UserRole = (typeof USER_ROLES)[keyof typeof USER_ROLES];
export type TransactionType = (typeof TRANSACTION_TYPES)[keyof typeof TRANSACTION_TYPES];
export type LedgerResource = (typeof LEDGER_RESOURCES)[keyof typeof LEDGER_RESOURCES];
