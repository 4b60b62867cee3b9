import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { logger } from '../utils/logger';
import { StorageUnavailableError } from '../services/base/ServiceError';

const DEFAULT_DB_FILE = 'research_store.db';
const BUSY_TIMEOUT_MS = 5000;

/**
 * Opens a database connection.
 * Creates the database file and directory if they don't exist, enables WAL
 * mode for file databases, turns on foreign key enforcement and sets a busy
 * timeout so concurrent writers wait on the lock instead of failing.
 * Does NOT run migrations - that is handled by runMigrations().
 *
 * @param dbPath Optional path to the database file. If omitted, uses getDbPath(). ':memory:' creates an in-memory DB.
 * @returns The created Database instance.
 */
export function initDb(dbPath?: string): Database.Database {
  const targetPath = dbPath ?? getDbPath();

  let db: Database.Database;
  try {
    if (targetPath !== ':memory:') {
      ensureDirectoryExists(path.dirname(targetPath));
    }
    logger.info(`[DB] Initializing new database connection at: ${targetPath}`);
    db = new Database(targetPath);
  } catch (error) {
    logger.error(`[DB] Failed to open database at ${targetPath}:`, error);
    throw new StorageUnavailableError('open', error instanceof Error ? error.message : String(error), {
      path: targetPath,
    });
  }

  try {
    db.pragma('foreign_keys = ON');
    db.pragma(`busy_timeout = ${BUSY_TIMEOUT_MS}`);
  } catch (error) {
    db.close();
    logger.error('[DB] Failed to configure connection:', error);
    throw new StorageUnavailableError('configure', error instanceof Error ? error.message : String(error), {
      path: targetPath,
    });
  }

  // Enable WAL mode for better concurrency (not applicable to :memory:)
  if (targetPath !== ':memory:') {
    try {
      db.pragma('journal_mode = WAL');
      logger.debug('[DB] WAL mode enabled.');
    } catch (walError) {
      // May fail on some network file systems
      logger.warn('[DB] Could not enable WAL mode: ', walError);
    }
  }

  return db;
}

/**
 * Closes a database connection if it is still open.
 */
export function closeDb(db: Database.Database): void {
  if (db.open) {
    logger.info(`[DB] Closing database connection: ${db.name}`);
    db.close();
  } else {
    logger.debug('[DB] Connection already closed.');
  }
}

/**
 * Gets the path for the store database.
 * 1. Uses the `RESEARCH_DB_PATH` environment variable if set.
 *    - Returns ':memory:' directly if the variable is exactly ':memory:'.
 *    - Resolves other paths using `path.resolve()`.
 * 2. Otherwise falls back to `./data/research_store.db` relative to `process.cwd()`.
 */
export function getDbPath(): string {
  const envPath = process.env.RESEARCH_DB_PATH;

  if (envPath) {
    if (envPath === ':memory:') {
      logger.info('[DB] Using in-memory database (from RESEARCH_DB_PATH).');
      return ':memory:';
    }
    const resolvedEnvPath = path.resolve(envPath);
    logger.info(`[DB] Using database path from RESEARCH_DB_PATH: ${resolvedEnvPath}`);
    return resolvedEnvPath;
  }

  const cwdDefaultPath = path.resolve(process.cwd(), 'data', DEFAULT_DB_FILE);
  logger.warn(`[DB] RESEARCH_DB_PATH not set. Using fallback path relative to cwd: ${cwdDefaultPath}`);
  return cwdDefaultPath;
}

function ensureDirectoryExists(dirPath: string): void {
  if (!fs.existsSync(dirPath)) {
    fs.mkdirSync(dirPath, { recursive: true });
    logger.info(`[DB] Created database directory: ${dirPath}`);
  }
}
