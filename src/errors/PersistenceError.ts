import { AppError } from './AppError';
import { SaveFailure } from '@/models';

/**
 * Persistence Error
 * Thrown when writing one or more ledger files fails.
 *
 * The in-memory tables are NOT rolled back: they stay the source of truth
 * until the next successful save, so the change is live but not durable.
 */
export class PersistenceError extends AppError {
  public readonly failures: SaveFailure[];

  constructor(message: string, failures: SaveFailure[]) {
    super(message, 'PERSISTENCE_ERROR');
    this.failures = failures;
    Object.setPrototypeOf(this, PersistenceError.prototype);
  }
}
