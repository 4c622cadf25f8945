import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { config } from '../config/config.js';
import { StorageUnavailableError, StoreError, toStoreError } from './errors.js';
import { initSchema } from './schema.js';

const MEMORY_PATH = ':memory:';

let db: Database.Database | null = null;
let currentPath: string | null = null;

function ensureParentDir(dbPath: string): void {
  const dir = path.dirname(dbPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

/**
 * Открыть БД. Повторный вызов с тем же путём возвращает уже открытое соединение.
 * `:memory:` даёт отдельную БД в памяти (используется в тестах).
 */
export function openDatabase(dbPath: string = config.database.path): Database.Database {
  if (db && currentPath === dbPath) return db;
  if (db) closeDatabase();

  try {
    if (dbPath !== MEMORY_PATH) ensureParentDir(dbPath);
    const handle = new Database(dbPath, config.database.verbose ? { verbose: console.log } : {});
    handle.pragma('foreign_keys = ON');
    db = handle;
    currentPath = dbPath;
    return handle;
  } catch (err) {
    const mapped = toStoreError(err);
    if (mapped instanceof StoreError) throw mapped;
    throw new StorageUnavailableError(
      `Cannot open database at ${dbPath}: ${err instanceof Error ? err.message : String(err)}`,
      err,
    );
  }
}

export function getDb(): Database.Database {
  if (!db) {
    throw new StoreError('NOT_CONNECTED', 'Database is not open. Call openDatabase() first.');
  }
  return db;
}

/**
 * Открыть (если нужно) и привести схему к актуальной. Вызывается один раз при старте.
 */
export function initDatabase(dbPath?: string): Database.Database {
  const handle = openDatabase(dbPath);
  console.log('[Store] Initializing schema...');
  initSchema(handle);
  console.log(`[Store] Schema ready: ${currentPath}`);
  return handle;
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
    currentPath = null;
  }
}

export function getDbPath(): string | null {
  return currentPath;
}
