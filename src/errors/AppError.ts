/**
 * Base class for all ledger errors
 *
 * `code` is a stable, machine-readable identifier the session layer can
 * switch on without matching message text.
 */
export class AppError extends Error {
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    Object.setPrototypeOf(this, AppError.prototype);
  }
}
