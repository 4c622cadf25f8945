import type Database from 'better-sqlite3';
import { getDb } from './database.js';
import { toStoreError } from './errors.js';

/**
 * Одна операция репозитория = одна транзакция (BEGIN ... COMMIT, ROLLBACK при throw).
 * SqliteError переводится в StoreError.
 */
export function withUnitOfWork<T>(work: (db: Database.Database) => T): T {
  const db = getDb();
  try {
    return db.transaction(() => work(db))();
  } catch (err) {
    throw toStoreError(err);
  }
}
