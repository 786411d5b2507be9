import { BusinessRuleError } from './BusinessRuleError';

/**
 * Insufficient Funds Error
 * Thrown when a withdrawal or transfer exceeds the source balance.
 * Amounts are canonical money strings.
 */
export class InsufficientFundsError extends BusinessRuleError {
  public readonly accountNumber: string;
  public readonly available: string;
  public readonly requested: string;

  constructor(accountNumber: string, available: string, requested: string) {
    super(
      `Insufficient funds in account ${accountNumber}: available ${available}, requested ${requested}`,
      'INSUFFICIENT_FUNDS'
    );
    this.accountNumber = accountNumber;
    this.available = available;
    this.requested = requested;
    Object.setPrototypeOf(this, InsufficientFundsError.prototype);
  }
}
