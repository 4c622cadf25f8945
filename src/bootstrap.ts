import { getAdminSettings, type AdminSettings } from './config/config.js';
import { initDatabase } from './db/database.js';
import { getOrCreateSingletonAdmin, runMonthlyExpiryCheck } from './db/admins.js';
import { getStoreStats } from './db/stats.js';
import type { Admin, StoreStats } from './db/types.js';

export interface BootstrapOptions {
  dbPath?: string;
  adminSettings?: AdminSettings;
  now?: Date;
}

export interface BootstrapResult {
  admin: Admin;
  adminExpired: boolean;
  stats: StoreStats;
}

/**
 * Старт хранилища: схема, ежемесячная проверка срока, главный админ.
 * Проверка идёт первой, чтобы возвращённый админ существовал в БД.
 */
export function bootstrapStore(options: BootstrapOptions = {}): BootstrapResult {
  initDatabase(options.dbPath);

  const adminExpired = runMonthlyExpiryCheck(options.now);
  const admin = getOrCreateSingletonAdmin(options.adminSettings ?? getAdminSettings());
  const stats = getStoreStats();

  console.log('[Store] Stats:');
  console.log(`   Students: ${stats.students}`);
  console.log(`   Tweets: ${stats.tweets}`);
  console.log(`   Admins: ${stats.admins}${adminExpired ? ' (expired admin removed)' : ''}`);
  console.log(`   Approved requests: ${stats.approvedRequests}`);

  return { admin, adminExpired, stats };
}
