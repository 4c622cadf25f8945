/**
 * Ошибки слоя хранения. Not-found сюда не входит: поиск возвращает null или [].
 */

export type StoreErrorCode =
  | 'STORAGE_UNAVAILABLE'
  | 'CONSTRAINT_VIOLATION'
  | 'VALIDATION_ERROR'
  | 'NOT_CONNECTED';

export class StoreError extends Error {
  constructor(
    public readonly code: StoreErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'StoreError';
  }
}

export class StorageUnavailableError extends StoreError {
  constructor(message: string, cause?: unknown) {
    super('STORAGE_UNAVAILABLE', message, { cause });
    this.name = 'StorageUnavailableError';
  }
}

export class ConstraintViolationError extends StoreError {
  constructor(
    message: string,
    public readonly sqliteCode: string,
    cause?: unknown,
  ) {
    super('CONSTRAINT_VIOLATION', message, { cause });
    this.name = 'ConstraintViolationError';
  }
}

export class ValidationError extends StoreError {
  constructor(
    message: string,
    public readonly details: string[] = [],
  ) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
  }
}

const UNAVAILABLE_CODES = [
  'SQLITE_CANTOPEN',
  'SQLITE_IOERR',
  'SQLITE_READONLY',
  'SQLITE_FULL',
  'SQLITE_BUSY',
  'SQLITE_LOCKED',
  'SQLITE_PERM',
  'SQLITE_CORRUPT',
  'SQLITE_NOTADB',
];

function sqliteCodeOf(err: unknown): string | null {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string' && err.code.startsWith('SQLITE_')) {
    return err.code;
  }
  return null;
}

/**
 * Переводит SqliteError из better-sqlite3 в StoreError. Прочие ошибки возвращаются как есть.
 */
export function toStoreError(err: unknown): unknown {
  if (err instanceof StoreError) return err;

  const code = sqliteCodeOf(err);
  if (!code) return err;

  const message = err instanceof Error ? err.message : String(err);
  if (code.startsWith('SQLITE_CONSTRAINT')) {
    return new ConstraintViolationError(`Write rejected: ${message}`, code, err);
  }
  // Extended codes look like SQLITE_IOERR_WRITE, SQLITE_READONLY_DBMOVED
  if (UNAVAILABLE_CODES.some(prefix => code === prefix || code.startsWith(`${prefix}_`))) {
    return new StorageUnavailableError(`Storage unavailable: ${message}`, err);
  }
  return err;
}
