/**
 * Transaction model
 * Immutable, append-only entries of an account history
 *
 * `amount` is an unsigned money string ("30.00"); the type decides the sign
 * (see DEBIT_TRANSACTION_TYPES).
 */
interface BaseTransaction {
  timestamp: string; // YYYY-MM-DD HH:MM:SS
  amount: string;
}

export interface PlainTransaction extends BaseTransaction {
  type: 'Initial Deposit' | 'Deposit' | 'Withdrawal';
}

export interface TransferSentTransaction extends BaseTransaction {
  type: 'Transfer Sent';
  toAccount: string;
}

export interface TransferReceivedTransaction extends BaseTransaction {
  type: 'Transfer Received';
  fromAccount: string;
}

export interface InterestAppliedTransaction extends BaseTransaction {
  type: 'Interest Applied';
  rate: number;
}

export type Transaction =
  | PlainTransaction
  | TransferSentTransaction
  | TransferReceivedTransaction
  | InterestAppliedTransaction;
