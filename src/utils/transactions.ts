import Decimal from 'decimal.js';
import { Transaction } from '@/models';
import { DEBIT_TRANSACTION_TYPES } from '@/constants/records';

/**
 * Effect of a transaction on its account balance
 * Withdrawals and sent transfers count negative, everything else positive
 */
export function signedAmount(transaction: Transaction): Decimal {
  const amount = new Decimal(transaction.amount);
  return DEBIT_TRANSACTION_TYPES.has(transaction.type) ? amount.negated() : amount;
}

/**
 * Net effect of a whole history, i.e. the balance it implies
 */
export function netTransactionTotal(transactions: Transaction[]): Decimal {
  return transactions.reduce((sum, transaction) => sum.plus(signedAmount(transaction)), new Decimal(0));
}
