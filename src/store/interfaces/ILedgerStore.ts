import { LedgerTables, SaveReport } from '@/models';

/**
 * Ledger Store Interface
 *
 * Owns the in-memory tables shared by all services in a process and the
 * durable copy behind them.
 */
export interface ILedgerStore {
  readonly tables: LedgerTables;

  /**
   * Write every table to durable storage
   * Never throws; failures are listed in the report
   */
  save(): SaveReport;

  /**
   * Run a mutation and persist it
   *
   * If `work` throws, the tables are restored to their previous state and
   * nothing is saved. If the save fails, the mutation stays in memory and
   * a PersistenceError is thrown.
   */
  transaction<T>(work: (tables: LedgerTables) => T): T;

  /**
   * Drop all data and return to the first-run state (not persisted)
   */
  reset(): void;
}
