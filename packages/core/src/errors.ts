/**
 * Error taxonomy shared by every shelfdb package.
 *
 * Each class carries a stable `code` so callers can branch without
 * `instanceof` checks across package boundaries.
 */

export type ShelfErrorCode =
  | 'VALIDATION'
  | 'DATABASE'
  | 'TRANSACTION'
  | 'CONNECTION'
  | 'CLOSED'
  | 'UNSUPPORTED_TARGET'
  | 'LOCK'
  | 'CACHE'
  | 'KEY_NOT_FOUND';

export class ShelfError extends Error {
  readonly code: ShelfErrorCode;

  constructor(code: ShelfErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Bad identifier or clause fragment. Always raised before any I/O.
 */
export class ValidationError extends ShelfError {
  readonly violations: string[];

  constructor(message: string, violations: string[] = []) {
    super('VALIDATION', message);
    this.violations = violations;
  }
}

/**
 * Underlying engine failure; the original error is kept as `cause`
 */
export class DatabaseError extends ShelfError {
  constructor(message: string, cause: unknown) {
    super('DATABASE', `${message}: ${describeCause(cause)}`, { cause });
  }
}

export class TransactionError extends ShelfError {
  constructor(message: string) {
    super('TRANSACTION', message);
  }
}

export class ConnectionError extends ShelfError {
  constructor(message: string, code: ShelfErrorCode = 'CONNECTION') {
    super(code, message);
  }
}

export class ClosedError extends ConnectionError {
  constructor(message: string) {
    super(message, 'CLOSED');
  }
}

export class UnsupportedTargetError extends ConnectionError {
  constructor(message: string) {
    super(message, 'UNSUPPORTED_TARGET');
  }
}

export class LockError extends ShelfError {
  constructor(message: string) {
    super('LOCK', message);
  }
}

export class CacheError extends ShelfError {
  constructor(message: string) {
    super('CACHE', message);
  }
}

export class KeyNotFoundError extends ShelfError {
  readonly key: string;

  constructor(key: string) {
    super('KEY_NOT_FOUND', `Key not found: '${key}'`);
    this.key = key;
  }
}

export function isShelfError(error: unknown): error is ShelfError {
  return error instanceof ShelfError;
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}
