import { Transaction } from './Transaction';

/**
 * Account model
 * One line of the accounts file
 *
 * Note: balance is a money string with two decimals to preserve precision.
 * Convert to Decimal for calculations.
 */
export interface Account {
  accountNumber: string;
  ownerNic: string;
  balance: string;
  createdAt: string; // YYYY-MM-DD HH:MM:SS
  transactions: Transaction[];
}

/**
 * Money input accepted by ledger operations
 * Strings are parsed exactly; numbers must not carry more than two decimals
 */
export type MoneyInput = number | string;

/**
 * Result of a successful transfer
 */
export interface TransferResult {
  source: Account;
  destination: Account;
  amount: string;
}

/**
 * Result of an interest run
 */
export interface InterestAccrualResult {
  accountsCredited: number;
  totalInterest: string;
  rate: number;
}
