import Decimal from 'decimal.js';
import {
  Account,
  CustomerUser,
  InterestAccrualResult,
  LedgerTables,
  MoneyInput,
  Transaction,
  TransferResult,
} from '@/models';
import { TRANSACTION_TYPES, USER_ROLES } from '@/constants/records';
import { INTEREST_RULES } from '@/config/businessRules';
import { InsufficientFundsError, NotFoundError, ValidationError } from '@/errors';
import { logger } from '@/adapters/logging/LoggerFactory';
import { ILedgerStore } from '@/store/interfaces/ILedgerStore';
import { allocateAccountNumber } from '@/store/ledgerTables';
import {
  initialDepositSchema,
  interestRateSchema,
  positiveAmountSchema,
} from '@/validators/amount.validator';
import { parseInput } from '@/validators/parse';
import { toMoney } from '@/utils/money';
import { Clock, formatTimestamp, systemClock } from '@/utils/time';

export interface AccountServiceOptions {
  clock?: Clock;
  interestRate?: number;
}

/**
 * Account Service
 * Balance mutations and their transaction records
 *
 * Every mutation runs inside store.transaction, so the balance change, the
 * history entry and the save happen as one call. Validation happens before
 * anything is touched; a rejected operation leaves the tables and the files
 * as they were.
 */
export class AccountService {
  private readonly clock: Clock;
  private readonly interestRate: number;

  constructor(
    private store: ILedgerStore,
    options: AccountServiceOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.interestRate = options.interestRate ?? INTEREST_RULES.DEFAULT_RATE;
  }

  /**
   * Open an account for a customer
   *
   * Business Rules:
   * - Owner must exist and be a customer
   * - Account number is the next one not already in use
   * - An Initial Deposit transaction is recorded only for a positive amount
   * - The number is appended to the owner's owned accounts
   */
  openAccount(ownerNic: string, initialDeposit: MoneyInput = 0): Account {
    const amount = parseInput(initialDepositSchema, initialDeposit, 'initial deposit');

    const account = this.store.transaction((tables) => {
      const owner = this.requireCustomer(tables, ownerNic);
      const accountNumber = allocateAccountNumber(tables);
      const timestamp = this.now();

      const created: Account = {
        accountNumber,
        ownerNic,
        balance: toMoney(amount),
        createdAt: timestamp,
        transactions: [],
      };
      if (amount.greaterThan(0)) {
        created.transactions.push({
          type: TRANSACTION_TYPES.INITIAL_DEPOSIT,
          timestamp,
          amount: toMoney(amount),
        });
      }

      tables.accounts.set(accountNumber, created);
      owner.ownedAccounts.push(accountNumber);
      return created;
    });

    logger.info(
      { accountNumber: account.accountNumber, ownerNic, initialDeposit: account.balance },
      'Account opened'
    );
    return account;
  }

  /**
   * Add funds to an account
   */
  deposit(accountNumber: string, amount: MoneyInput): Account {
    const value = parseInput(positiveAmountSchema, amount, 'deposit amount');

    const account = this.store.transaction((tables) => {
      const target = this.requireAccount(tables, accountNumber);
      this.credit(target, value, { type: TRANSACTION_TYPES.DEPOSIT });
      return target;
    });

    logger.info(
      { accountNumber, amount: toMoney(value), balance: account.balance },
      'Deposit recorded'
    );
    return account;
  }

  /**
   * Take funds out of an account
   *
   * @throws InsufficientFundsError when amount exceeds the balance
   */
  withdraw(accountNumber: string, amount: MoneyInput): Account {
    const value = parseInput(positiveAmountSchema, amount, 'withdrawal amount');

    const account = this.store.transaction((tables) => {
      const source = this.requireAccount(tables, accountNumber);
      this.requireFunds(source, value);
      this.debit(source, value, { type: TRANSACTION_TYPES.WITHDRAWAL });
      return source;
    });

    logger.info(
      { accountNumber, amount: toMoney(value), balance: account.balance },
      'Withdrawal recorded'
    );
    return account;
  }

  /**
   * Move funds between two accounts
   *
   * Both sides change in the same transaction and each gets one entry that
   * names the other account. The destination may belong to any user.
   *
   * @throws ValidationError when source and destination are the same
   * @throws NotFoundError when either account is missing
   * @throws InsufficientFundsError when amount exceeds the source balance
   */
  transfer(
    sourceAccountNumber: string,
    destinationAccountNumber: string,
    amount: MoneyInput
  ): TransferResult {
    const value = parseInput(positiveAmountSchema, amount, 'transfer amount');

    if (sourceAccountNumber === destinationAccountNumber) {
      logger.warn({ accountNumber: sourceAccountNumber }, 'Transfer rejected: same account');
      throw new ValidationError('Cannot transfer funds to the same account');
    }

    const result = this.store.transaction((tables) => {
      const source = this.requireAccount(tables, sourceAccountNumber);
      const destination = this.requireAccount(tables, destinationAccountNumber);
      this.requireFunds(source, value);

      this.debit(source, value, {
        type: TRANSACTION_TYPES.TRANSFER_SENT,
        toAccount: destination.accountNumber,
      });
      this.credit(destination, value, {
        type: TRANSACTION_TYPES.TRANSFER_RECEIVED,
        fromAccount: source.accountNumber,
      });

      return { source, destination, amount: toMoney(value) };
    });

    logger.info(
      {
        from: sourceAccountNumber,
        to: destinationAccountNumber,
        amount: result.amount,
        sourceBalance: result.source.balance,
      },
      'Transfer recorded'
    );
    return result;
  }

  /**
   * Credit interest to every account with a positive balance
   *
   * interest = balance * rate, rounded half-to-even to cents. Accounts whose
   * interest rounds to zero, and accounts at or below zero, are left alone.
   * Nothing is saved when no account is credited.
   */
  accrueInterestAll(rate: number = this.interestRate): InterestAccrualResult {
    const validRate = parseInput(interestRateSchema, rate, 'interest rate');

    const credits = this.computeInterest(this.store.tables, validRate);
    if (credits.length === 0) {
      logger.info({ rate: validRate }, 'No interest applied');
      return { accountsCredited: 0, totalInterest: toMoney(0), rate: validRate };
    }

    const total = this.store.transaction((tables) => {
      let sum = new Decimal(0);
      for (const { accountNumber, interest } of credits) {
        const account = this.requireAccount(tables, accountNumber);
        this.credit(account, interest, {
          type: TRANSACTION_TYPES.INTEREST_APPLIED,
          rate: validRate,
        });
        sum = sum.plus(interest);
      }
      return sum;
    });

    const result = {
      accountsCredited: credits.length,
      totalInterest: toMoney(total),
      rate: validRate,
    };
    logger.info(result, 'Interest applied');
    return result;
  }

  /**
   * @throws NotFoundError when the account does not exist
   */
  getAccount(accountNumber: string): Account {
    return this.requireAccount(this.store.tables, accountNumber);
  }

  /**
   * Look up an account on behalf of its owner
   *
   * @throws NotFoundError unless `nic` is a customer who owns the account
   */
  getOwnedAccount(nic: string, accountNumber: string): Account {
    const user = this.store.tables.users.get(nic);
    const account = this.store.tables.accounts.get(accountNumber);

    if (
      !user ||
      user.role !== USER_ROLES.CUSTOMER ||
      !user.ownedAccounts.includes(accountNumber) ||
      !account ||
      account.ownerNic !== nic
    ) {
      throw new NotFoundError(`Account ${accountNumber} not found for user '${nic}'`);
    }
    return account;
  }

  /**
   * A customer's accounts in creation order
   * Owned numbers with no matching account are skipped
   */
  listOwnedAccounts(nic: string): Account[] {
    const owner = this.requireCustomer(this.store.tables, nic);

    return owner.ownedAccounts.flatMap((accountNumber) => {
      const account = this.store.tables.accounts.get(accountNumber);
      return account ? [account] : [];
    });
  }

  private computeInterest(
    tables: LedgerTables,
    rate: number
  ): Array<{ accountNumber: string; interest: Decimal }> {
    const credits: Array<{ accountNumber: string; interest: Decimal }> = [];

    for (const account of tables.accounts.values()) {
      const balance = new Decimal(account.balance);
      if (balance.lessThanOrEqualTo(0)) continue;

      const interest = balance.times(rate).toDecimalPlaces(2, Decimal.ROUND_HALF_EVEN);
      if (interest.greaterThan(0)) {
        credits.push({ accountNumber: account.accountNumber, interest });
      }
    }

    return credits;
  }

  private credit(account: Account, amount: Decimal, entry: TransactionDetails): void {
    account.balance = toMoney(new Decimal(account.balance).plus(amount));
    this.record(account, amount, entry);
  }

  private debit(account: Account, amount: Decimal, entry: TransactionDetails): void {
    account.balance = toMoney(new Decimal(account.balance).minus(amount));
    this.record(account, amount, entry);
  }

  private record(account: Account, amount: Decimal, entry: TransactionDetails): void {
    const transaction: Transaction = { ...entry, timestamp: this.now(), amount: toMoney(amount) };
    account.transactions.push(transaction);
  }

  private requireFunds(account: Account, amount: Decimal): void {
    if (amount.greaterThan(account.balance)) {
      logger.warn(
        { accountNumber: account.accountNumber, available: account.balance, requested: toMoney(amount) },
        'Operation rejected: insufficient funds'
      );
      throw new InsufficientFundsError(account.accountNumber, account.balance, toMoney(amount));
    }
  }

  private requireAccount(tables: LedgerTables, accountNumber: string): Account {
    const account = tables.accounts.get(accountNumber);
    if (!account) {
      logger.warn({ accountNumber }, 'Account not found');
      throw new NotFoundError(`Account ${accountNumber} does not exist`);
    }
    return account;
  }

  private requireCustomer(tables: LedgerTables, nic: string): CustomerUser {
    const user = tables.users.get(nic);
    if (!user) {
      logger.warn({ nic }, 'User not found');
      throw new NotFoundError(`User with NIC '${nic}' not found`);
    }
    if (user.role !== USER_ROLES.CUSTOMER) {
      throw new ValidationError(`User '${nic}' is not a customer and cannot own accounts`);
    }
    return user;
  }

  private now(): string {
    return formatTimestamp(this.clock());
  }
}

/**
 * Variant-specific part of a transaction; timestamp and amount are filled in
 * when it is recorded
 */
type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;
type TransactionDetails = DistributiveOmit<Transaction, 'timestamp' | 'amount'>;
