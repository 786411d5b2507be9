import { Account } from '@/models';
import { ACCOUNT_FIELD_COUNT, FIELD_DELIMITER } from '@/constants/records';
import { parseDecimal, toMoney } from '@/utils/money';
import { DecodeResult, decoded, malformed } from './decodeResult';
import { decodeTransactions, encodeTransactions } from './transaction.codec';

/**
 * Accounts file line:
 * accountNumber |~| ownerNic |~| balance |~| createdAt |~| [transactions JSON]
 */
export function encodeAccount(account: Account): string {
  return [
    account.accountNumber,
    account.ownerNic,
    account.balance,
    account.createdAt,
    encodeTransactions(account.transactions),
  ].join(FIELD_DELIMITER);
}

/**
 * Decode an accounts file line
 *
 * Recovery policy (lossy, kept for compatibility with existing files):
 * - unparsable balance → 0.00
 * - unparsable or mis-shaped transactions → empty list
 * Both are reported in `notes`.
 */
export function decodeAccountLine(line: string): DecodeResult<Account> {
  const parts = line.trim().split(FIELD_DELIMITER);
  if (parts.length !== ACCOUNT_FIELD_COUNT) {
    return malformed(`expected ${ACCOUNT_FIELD_COUNT} fields, got ${parts.length}`);
  }

  const [accountNumber, ownerNic, balanceText, createdAt, transactionsBlob] = parts;
  if (!accountNumber) {
    return malformed('empty account number');
  }

  const notes: string[] = [];

  const parsedBalance = parseDecimal(balanceText);
  if (!parsedBalance) {
    notes.push(`account ${accountNumber} has invalid balance "${balanceText}", defaulted to 0.00`);
  }

  const transactions = decodeTransactions(transactionsBlob);
  if (!transactions) {
    notes.push(`account ${accountNumber} has unreadable transactions, defaulted to empty`);
  }

  return decoded(
    {
      accountNumber,
      ownerNic,
      balance: toMoney(parsedBalance ?? 0),
      createdAt,
      transactions: transactions ?? [],
    },
    notes
  );
}

/**
 * Decode an accounts file line
 * @returns null when the line is malformed
 */
export function decodeAccount(line: string): Account | null {
  const result = decodeAccountLine(line);
  return result.ok ? result.value : null;
}
