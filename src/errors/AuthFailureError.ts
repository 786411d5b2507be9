import { AppError } from './AppError';

export class AuthFailureError extends AppError {
  public readonly attemptsUsed: number;

  constructor(message: string, attemptsUsed: number) {
    super(message, 'AUTH_FAILURE');
    this.attemptsUsed = attemptsUsed;
    Object.setPrototypeOf(this, AuthFailureError.prototype);
  }
}
