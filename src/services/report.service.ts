import {
  AccountSummary,
  BalanceView,
  CustomerSummary,
  Transaction,
  TransactionHistoryRow,
  UserSummary,
} from '@/models';
import { USER_ROLES } from '@/constants/records';
import { NotFoundError } from '@/errors';
import { ILedgerStore } from '@/store/interfaces/ILedgerStore';
import { formatRate } from '@/utils/money';

/**
 * Report Service
 * Read-only views over the ledger tables for the session layer
 *
 * Rows keep table order (registration / creation order). Money stays as
 * canonical strings; display formatting is up to the caller.
 */
export class ReportService {
  constructor(private store: ILedgerStore) {}

  listUsers(): UserSummary[] {
    return Array.from(this.store.tables.users.values(), (user) => ({
      nic: user.nic,
      name: user.name,
      role: user.role,
      ownedAccounts: user.role === USER_ROLES.CUSTOMER ? [...user.ownedAccounts] : null,
    }));
  }

  listCustomers(): CustomerSummary[] {
    return Array.from(this.store.tables.users.values())
      .filter((user) => user.role === USER_ROLES.CUSTOMER)
      .map((user) => ({ nic: user.nic, name: user.name }));
  }

  listAccounts(): AccountSummary[] {
    const { users, accounts } = this.store.tables;

    return Array.from(accounts.values(), (account) => ({
      accountNumber: account.accountNumber,
      ownerNic: account.ownerNic,
      ownerName: users.get(account.ownerNic)?.name ?? null,
      balance: account.balance,
      createdAt: account.createdAt,
    }));
  }

  getBalance(accountNumber: string): BalanceView {
    const account = this.store.tables.accounts.get(accountNumber);
    if (!account) {
      throw new NotFoundError(`Account ${accountNumber} does not exist`);
    }

    return {
      accountNumber: account.accountNumber,
      ownerNic: account.ownerNic,
      balance: account.balance,
    };
  }

  /**
   * Transaction rows, oldest first, with a human-readable details column
   */
  getTransactionHistory(accountNumber: string): TransactionHistoryRow[] {
    const account = this.store.tables.accounts.get(accountNumber);
    if (!account) {
      throw new NotFoundError(`Account ${accountNumber} does not exist`);
    }

    return account.transactions.map((transaction) => ({
      timestamp: transaction.timestamp,
      type: transaction.type,
      amount: transaction.amount,
      details: describeTransaction(transaction),
    }));
  }
}

export function describeTransaction(transaction: Transaction): string {
  switch (transaction.type) {
    case 'Transfer Sent':
      return `To Acct: ${transaction.toAccount}`;
    case 'Transfer Received':
      return `From Acct: ${transaction.fromAccount}`;
    case 'Interest Applied':
      return `Rate: ${formatRate(transaction.rate)}`;
    default:
      return 'N/A';
  }
}
