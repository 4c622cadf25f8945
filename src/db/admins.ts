import type Database from 'better-sqlite3';
import type { AdminSettings } from '../config/config.js';
import { withUnitOfWork } from './unit-of-work.js';
import type { Admin, AdminOverrides, ApprovedRequest } from './types.js';

export const SINGLETON_ADMIN_KEY = 'primary';
export const DEFAULT_ADMIN_USERNAME = 'campus_admin';
export const DEFAULT_ADMIN_ROLE = 'admin';
export const DEFAULT_ADMIN_EXPIRATION = '2024-05-26T00:00:00.000Z';
export const EXPIRY_DAY_OF_MONTH = 30;

type AdminRow = [string | null, number, string, string, string, string, number];

function insertAdmin(
  db: Database.Database,
  singletonKey: string | null,
  settings: AdminSettings,
  overrides: AdminOverrides,
): Admin | undefined {
  const stmt = db.prepare<AdminRow>(`
    INSERT INTO admins (singleton_key, telegram_chat_id, username, email, role, expiration, phone_number)
    VALUES (?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(singleton_key) DO NOTHING
  `);
  const result = stmt.run(
    singletonKey,
    settings.telegramChatId,
    overrides.username ?? DEFAULT_ADMIN_USERNAME,
    settings.email,
    overrides.role ?? DEFAULT_ADMIN_ROLE,
    overrides.expiration ?? DEFAULT_ADMIN_EXPIRATION,
    settings.phoneNumber,
  );
  // DO NOTHING: changes === 0, lastInsertRowid is stale
  if (result.changes === 0) return undefined;
  return db.prepare<[number | bigint], Admin>('SELECT * FROM admins WHERE id = ?').get(result.lastInsertRowid);
}

/**
 * Вернуть единственного "главного" админа, создав его при первом вызове.
 * Настройки передаются явно; у существующей записи они не перезаписываются.
 */
export function getOrCreateSingletonAdmin(settings: AdminSettings): Admin {
  return withUnitOfWork(db => {
    const created = insertAdmin(db, SINGLETON_ADMIN_KEY, settings, {});
    if (created) {
      console.log(`[Store] Singleton admin created: ID=${created.id}`);
      return created;
    }
    const existing = db
      .prepare<[string], Admin>('SELECT * FROM admins WHERE singleton_key = ?')
      .get(SINGLETON_ADMIN_KEY);
    if (!existing) {
      throw new Error('Singleton admin insert was skipped but no row holds the key');
    }
    return existing;
  });
}

/**
 * Обычный (не singleton) админ. Поля по умолчанию можно переопределить.
 */
export function createAdmin(settings: AdminSettings, overrides: AdminOverrides = {}): Admin {
  return withUnitOfWork(db => {
    const admin = insertAdmin(db, null, settings, overrides);
    if (!admin) {
      throw new Error('Admin row not found right after insert');
    }
    console.log(`[Store] Admin created: ID=${admin.id}, username=${admin.username}`);
    return admin;
  });
}

export function getAdminByUsername(username: string): Admin | null {
  return withUnitOfWork(db => {
    const stmt = db.prepare<[string], Admin>('SELECT * FROM admins WHERE username = ? ORDER BY id ASC LIMIT 1');
    return stmt.get(username) ?? null;
  });
}

/**
 * Удалить админа с наибольшим id. false, если таблица пуста.
 */
export function removeHighestIdAdmin(): boolean {
  return withUnitOfWork(db => {
    const info = db
      .prepare<[]>('DELETE FROM admins WHERE id = (SELECT MAX(id) FROM admins)')
      .run();
    if (info.changes > 0) {
      console.log('[Store] Removed admin with the highest id');
    }
    return info.changes > 0;
  });
}

export function deleteSingletonAdmin(): boolean {
  return withUnitOfWork(db => {
    const info = db.prepare<[string]>('DELETE FROM admins WHERE singleton_key = ?').run(SINGLETON_ADMIN_KEY);
    if (info.changes > 0) {
      console.log('[Store] Singleton admin deleted');
    }
    return info.changes > 0;
  });
}

/**
 * Ежемесячная проверка: 30-го числа (локальная дата) удаляется админ с наибольшим id.
 * В месяцах без 30-го числа (февраль) удаления нет.
 */
export function runMonthlyExpiryCheck(now: Date = new Date()): boolean {
  if (now.getDate() !== EXPIRY_DAY_OF_MONTH) return false;
  console.log(`[Store] Monthly admin expiry on ${now.toDateString()}`);
  return removeHighestIdAdmin();
}

export function listApprovedRequestsForAdmin(adminId: number): ApprovedRequest[] {
  return withUnitOfWork(db =>
    db
      .prepare<[number], ApprovedRequest>('SELECT * FROM approved_requests WHERE admin_id = ? ORDER BY id ASC')
      .all(adminId),
  );
}
