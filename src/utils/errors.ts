/**
 * Tagged application errors.
 *
 * The HTTP error handler maps `kind` to a status code; nothing downstream
 * inspects the message text.
 */

export type ErrorKind = 'NOT_FOUND' | 'ALREADY_EXISTS' | 'INVALID_INPUT' | 'INTERNAL';

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  NOT_FOUND: 404,
  ALREADY_EXISTS: 409,
  INVALID_INPUT: 400,
  INTERNAL: 500,
};

export class AppError extends Error {
  readonly kind: ErrorKind;
  readonly status: number;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'AppError';
    this.kind = kind;
    this.status = STATUS_BY_KIND[kind];
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super('NOT_FOUND', message);
    this.name = 'NotFoundError';
  }
}

export class AlreadyExistsError extends AppError {
  constructor(message: string) {
    super('ALREADY_EXISTS', message);
    this.name = 'AlreadyExistsError';
  }
}

export class InvalidInputError extends AppError {
  constructor(message: string) {
    super('INVALID_INPUT', message);
    this.name = 'InvalidInputError';
  }
}

/** Backing document could not be read or written. */
export class StoreError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INTERNAL', message, options);
    this.name = 'StoreError';
  }
}

/**
 * Errors raised outside the app (body parsing, for instance) that carry an
 * HTTP status of their own.
 */
export const hasHttpStatus = (error: unknown): error is { status: number; message?: string } => {
  return typeof error === 'object'
    && error !== null
    && 'status' in error
    && typeof error.status === 'number';
};
