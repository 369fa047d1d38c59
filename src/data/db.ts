/**
 * SQLite factor store initialization and management
 * Uses better-sqlite3 for synchronous operations
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync, readFileSync, readdirSync } from 'fs';
import { dirname, join } from 'path';
import { loadEnvConfig } from '@/core/env';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('db');

let db: Database.Database | null = null;
let openPath: string | null = null;

function getDbPath(): string {
  const dbPath = loadEnvConfig().dbPath;
  const dataDir = dirname(dbPath);

  if (!existsSync(dataDir)) {
    mkdirSync(dataDir, { recursive: true });
  }

  return dbPath;
}

export function initializeDatabase(): Database.Database {
  const dbPath = getDbPath();
  if (db && openPath === dbPath) {
    return db;
  }
  // FACTOR_DB_PATH changed since the last open
  closeDatabase();

  const isNew = !existsSync(dbPath);
  logger.info({ dbPath, isNew }, 'Initializing database');

  db = new Database(dbPath);
  openPath = dbPath;

  db.pragma('journal_mode = WAL');
  runMigrations(db);

  return db;
}

function runMigrations(database: Database.Database): void {
  const migrationsDir = join(process.cwd(), 'src', 'data', 'migrations');
  if (!existsSync(migrationsDir)) {
    logger.warn({ migrationsDir }, 'Migrations directory not found');
    return;
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
    openPath = null;
    logger.debug('Database connection closed');
  }
}
