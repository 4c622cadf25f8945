import type Database from 'better-sqlite3';
import { toStoreError } from './errors.js';

/**
 * Создаёт таблицы, индексы и внешние ключи, если их ещё нет.
 */
export function initSchema(db: Database.Database): void {
  try {
    // 1. Таблица students
    db.exec(`
      CREATE TABLE IF NOT EXISTS students (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        username TEXT NOT NULL,
        chat_id INTEGER NOT NULL UNIQUE,
        first_name TEXT NOT NULL,
        last_name TEXT NOT NULL,
        login_time TEXT,
        logout_time TEXT
      );
    `);

    // 2. Таблица admins
    db.exec(`
      CREATE TABLE IF NOT EXISTS admins (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        singleton_key TEXT UNIQUE,
        telegram_chat_id INTEGER NOT NULL,
        username TEXT NOT NULL,
        email TEXT NOT NULL,
        role TEXT NOT NULL,
        expiration TEXT NOT NULL,
        phone_number INTEGER NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_admins_username ON admins(username);
    `);

    // 3. Таблица tweets
    db.exec(`
      CREATE TABLE IF NOT EXISTS tweets (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        chat_id INTEGER NOT NULL,
        username TEXT,
        first_name TEXT NOT NULL,
        last_name TEXT NOT NULL,
        content TEXT NOT NULL,
        postage_date TEXT NOT NULL,
        student_id INTEGER REFERENCES students(id) ON DELETE SET NULL,
        admin_id INTEGER REFERENCES admins(id) ON DELETE SET NULL
      );
      CREATE INDEX IF NOT EXISTS idx_tweets_chat_id ON tweets(chat_id);
      CREATE INDEX IF NOT EXISTS idx_tweets_student_id ON tweets(student_id);
      CREATE INDEX IF NOT EXISTS idx_tweets_admin_id ON tweets(admin_id);
    `);

    // 4. Таблица approved_requests
    db.exec(`
      CREATE TABLE IF NOT EXISTS approved_requests (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        chat_id INTEGER NOT NULL,
        username TEXT NOT NULL,
        first_name TEXT NOT NULL,
        last_name TEXT NOT NULL,
        content TEXT NOT NULL,
        admin_id INTEGER REFERENCES admins(id) ON DELETE SET NULL
      );
      CREATE INDEX IF NOT EXISTS idx_approved_requests_chat_id ON approved_requests(chat_id);
      CREATE INDEX IF NOT EXISTS idx_approved_requests_admin_id ON approved_requests(admin_id);
    `);
  } catch (err) {
    throw toStoreError(err);
  }
}
