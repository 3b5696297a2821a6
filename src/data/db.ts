/**
 * SQLite Database initialization and management
 * Uses better-sqlite3 for synchronous operations
 */

import Database from 'better-sqlite3';
import { readFileSync, existsSync, mkdirSync, readdirSync } from 'fs';
import { dirname, join } from 'path';
import { resolveDbPath } from '@/core/env';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('db');

let db: Database.Database | null = null;
let openedPath: string | null = null;

function getDbPath(): string {
  const dbPath = resolveDbPath();
  const dataDir = dirname(dbPath);

  if (!existsSync(dataDir)) {
    mkdirSync(dataDir, { recursive: true });
  }

  return dbPath;
}

export function initializeDatabase(): Database.Database {
  const dbPath = getDbPath();
  if (db && openedPath === dbPath) {
    return db;
  }
  if (db) {
    // SIGNAL_DB_PATH changed underneath us (tests); reopen at the new location
    closeDatabase();
  }

  const isNew = !existsSync(dbPath);

  logger.info({ dbPath, isNew }, 'Initializing database');

  db = new Database(dbPath);
  openedPath = dbPath;

  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');

  runMigrations(db);

  return db;
}

function runMigrations(database: Database.Database): void {
  const migrationsDir = join(process.cwd(), 'src', 'data', 'migrations');
  if (!existsSync(migrationsDir)) {
    throw new Error(`Migrations directory not found: ${migrationsDir}`);
  }

  const files = readdirSync(migrationsDir)
    .filter((f) => f.endsWith('.sql'))
    .sort();

  logger.debug({ migrationsDir, files }, 'Running database migrations');

  for (const file of files) {
    const sql = readFileSync(join(migrationsDir, file), 'utf-8');
    database.exec(sql);
  }
}

export function getDatabase(): Database.Database {
  return initializeDatabase();
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
    openedPath = null;
    logger.debug('Database connection closed');
  }
}
