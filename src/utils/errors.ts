/**
 * Error taxonomy shared by the services and the global Express error handler.
 * `statusCode` and `code` are what the handler puts on the wire.
 */
export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;

  constructor(message: string, statusCode = 500, code = "INTERNAL_ERROR") {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
  }
}

// Malformed user or admin input
export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400, "VALIDATION_ERROR");
  }
}

export class PersistenceError extends AppError {
  constructor(message: string) {
    super(message, 503, "PERSISTENCE_ERROR");
  }
}

export const errorMessage = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);
