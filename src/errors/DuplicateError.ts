import { AppError } from './AppError';

/**
 * Duplicate Error
 * Thrown when registering a NIC that is already taken
 */
export class DuplicateError extends AppError {
  constructor(message: string) {
    super(message, 'DUPLICATE');
    Object.setPrototypeOf(this, DuplicateError.prototype);
  }
}
