import { bootstrapStore } from './bootstrap.js';
import { closeDatabase } from './db/database.js';

function main() {
  console.log('🚀 Starting campus bot store...\n');

  try {
    bootstrapStore();
  } finally {
    closeDatabase();
  }
}

try {
  main();
} catch (err) {
  console.error('❌ Store startup failed:', err instanceof Error ? err.message : String(err));
  process.exit(1);
}
