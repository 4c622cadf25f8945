import { withUnitOfWork } from './unit-of-work.js';
import type { StoreStats } from './types.js';

/**
 * Общая статистика БД
 */
export function getStoreStats(): StoreStats {
  return withUnitOfWork(db => {
    const count = (table: string): number =>
      db.prepare<[], { count: number }>(`SELECT COUNT(*) as count FROM ${table}`).get()?.count ?? 0;

    return {
      students: count('students'),
      tweets: count('tweets'),
      admins: count('admins'),
      approvedRequests: count('approved_requests'),
    };
  });
}
