import { AppError } from './AppError';

/**
 * Validation Error
 * Thrown when input is malformed: empty or reserved-character NIC, bad date,
 * weak password, non-positive amount
 */
export class ValidationError extends AppError {
  public readonly errors?: unknown;

  constructor(message: string, errors?: unknown) {
    super(message, 'VALIDATION_ERROR');
    this.errors = errors;
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}
