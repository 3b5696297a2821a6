/**
 * Database Initialization Script
 * Creates the SQLite feature store and runs migrations
 *
 * Usage: npx tsx scripts/init_db.ts
 */

import './lib/load-env';
import { closeDatabase, initializeDatabase } from '../src/data/db';
import { recoverActivePointer } from '../src/data/repositories/model_version_repo';

console.log('Initializing database...');

try {
  const db = initializeDatabase();
  const pointer = recoverActivePointer();
  console.log('Database initialized successfully');
  console.log('Location:', db.name);
  console.log('Active strategy version:', pointer.activeVersion ?? 'baseline');
  closeDatabase();
} catch (error) {
  console.error('Database initialization failed:', error);
  process.exit(1);
}
