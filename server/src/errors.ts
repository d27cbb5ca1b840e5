/**
 * A request the server refuses before any provider is called.
 * `status` is the HTTP status sent back with `{ error: message }`.
 */
export class RequestValidationError extends Error {
  readonly status: number;

  constructor(message: string, status: number = 400) {
    super(message);
    this.name = 'RequestValidationError';
    this.status = status;
  }
}
