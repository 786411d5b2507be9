import { LedgerTables, SaveReport } from '@/models';
import { PersistenceError } from '@/errors';
import { ILogger } from '@/interfaces/ILogger';
import { ILedgerStore } from './interfaces/ILedgerStore';
import { cloneTables, createEmptyTables, resetTables, restoreTables } from './ledgerTables';

/**
 * Base store
 * Implements the mutate-then-save contract; subclasses decide where data lives
 */
export abstract class LedgerStore implements ILedgerStore {
  readonly tables: LedgerTables = createEmptyTables();

  protected constructor(protected readonly log: ILogger) {}

  abstract save(): SaveReport;

  transaction<T>(work: (tables: LedgerTables) => T): T {
    const snapshot = cloneTables(this.tables);

    let result: T;
    try {
      result = work(this.tables);
    } catch (error) {
      restoreTables(this.tables, snapshot);
      throw error;
    }

    this.commit();
    return result;
  }

  reset(): void {
    resetTables(this.tables);
  }

  private commit(): void {
    const report = this.save();
    if (report.ok) {
      return;
    }

    this.log.error(
      { failures: report.failures },
      'Ledger change applied in memory but NOT saved; data may be lost on exit'
    );
    throw new PersistenceError(
      `Failed to save ${report.failures.map((failure) => failure.resource).join(', ')}`,
      report.failures
    );
  }
}
