import { AppError } from './AppError';

/**
 * Business Rule Error
 * Thrown when input is well-formed but violates a ledger rule
 * Examples: insufficient funds, opening an account for an admin
 */
export class BusinessRuleError extends AppError {
  constructor(message: string, code: string = 'BUSINESS_RULE') {
    super(message, code);
    Object.setPrototypeOf(this, BusinessRuleError.prototype);
  }
}
