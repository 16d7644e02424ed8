/**
 * Error taxonomy for the paste service. Every error the HTTP layer should
 * translate carries its own status; anything else is a 500.
 */
export class PasteError extends Error {
  readonly status: number;

  constructor(message: string, status: number, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.status = status;
  }
}

export class NotFoundError extends PasteError {
  constructor(message = "Paste not found") {
    super(message, 404);
  }
}

/** Expired pastes answer exactly like missing ones. */
export class ExpiredError extends NotFoundError {
  readonly pasteId: string;

  constructor(pasteId: string) {
    super();
    this.pasteId = pasteId;
  }
}

export class ValidationError extends PasteError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class PayloadTooLargeError extends PasteError {
  constructor(limit: number) {
    super(`Content too large (max ${limit} bytes)`, 413);
  }
}

export class StorageError extends PasteError {
  constructor(message: string, cause?: unknown) {
    super(message, 500, cause === undefined ? undefined : { cause });
  }
}

export const isNotFound = (error: unknown): error is NotFoundError =>
  error instanceof NotFoundError;
