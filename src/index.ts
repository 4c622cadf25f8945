export { config, getAdminSettings, getEnvValue } from './config/config.js';
export type { AdminSettings } from './config/config.js';
export { openDatabase, initDatabase, closeDatabase, getDb, getDbPath } from './db/database.js';
export { initSchema } from './db/schema.js';
export { withUnitOfWork } from './db/unit-of-work.js';
export {
  StoreError,
  StorageUnavailableError,
  ConstraintViolationError,
  ValidationError,
  toStoreError,
} from './db/errors.js';
export type { StoreErrorCode } from './db/errors.js';
export { createOrGetStudent, getStudentByChatId, recordLogout, listStudentTweets } from './db/students.js';
export { createTweet, findTweetsByUser, getLatestTweet, listAdminTweets } from './db/tweets.js';
export {
  getOrCreateSingletonAdmin,
  createAdmin,
  getAdminByUsername,
  removeHighestIdAdmin,
  deleteSingletonAdmin,
  runMonthlyExpiryCheck,
  listApprovedRequestsForAdmin,
  SINGLETON_ADMIN_KEY,
  DEFAULT_ADMIN_USERNAME,
  DEFAULT_ADMIN_ROLE,
  DEFAULT_ADMIN_EXPIRATION,
} from './db/admins.js';
export { createApprovedRequest } from './db/approved-requests.js';
export { getStoreStats } from './db/stats.js';
export { bootstrapStore } from './bootstrap.js';
export type { BootstrapOptions, BootstrapResult } from './bootstrap.js';
export type {
  Student,
  Tweet,
  Admin,
  ApprovedRequest,
  StudentInput,
  TweetInput,
  AdminOverrides,
  ApprovedRequestInput,
  StoreStats,
} from './db/types.js';
