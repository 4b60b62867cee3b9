import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { logger } from '../utils/logger';
import { StorageUnavailableError } from '../services/base/ServiceError';

const MIGRATIONS_DIR_NAME = 'migrations';
const MIGRATIONS_TABLE_NAME = 'schema_migrations';

/**
 * Ensures the schema_migrations table exists on the given DB instance.
 */
function ensureMigrationsTableExists(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS ${MIGRATIONS_TABLE_NAME} (
      version TEXT PRIMARY KEY,
      applied_at INTEGER NOT NULL
    );
  `);
  logger.debug(`[Migrations] Ensured table '${MIGRATIONS_TABLE_NAME}' exists.`);
}

function getAppliedMigrations(db: Database.Database): Set<string> {
  ensureMigrationsTableExists(db);
  const rows = db.prepare(`SELECT version FROM ${MIGRATIONS_TABLE_NAME}`).all() as { version: string }[];
  return new Set(rows.map(r => r.version));
}

/**
 * Resolves the migrations directory.
 * Sources keep the .sql files beside this module; a compiled build in
 * dist/models/ reaches back to the source tree since tsc does not copy them.
 */
function getMigrationsPath(): string {
  const candidates = [
    path.join(__dirname, MIGRATIONS_DIR_NAME),
    path.resolve(__dirname, '..', '..', 'models', MIGRATIONS_DIR_NAME),
  ];
  const found = candidates.find(candidate => fs.existsSync(candidate));
  if (!found) {
    throw new StorageUnavailableError('migrate', `Migrations directory not found (looked in ${candidates.join(', ')})`);
  }
  return found;
}

/**
 * Reads migration filenames from the migrations directory, sorted alphabetically
 * (e.g., 0001_.., 0002_..).
 */
function getMigrationFiles(migrationsPath: string): string[] {
  return fs.readdirSync(migrationsPath)
    .filter(file => file.endsWith('.sql'))
    .sort();
}

/**
 * Runs all pending migrations on the provided DB instance.
 * Each migration runs in its own transaction together with its version record,
 * so a failed file leaves no partial schema behind.
 */
function runMigrations(db: Database.Database): number {
  logger.info(`[Migrations] Starting database migration check on ${db.name}...`);

  const migrationsPath = getMigrationsPath();
  const appliedVersions = getAppliedMigrations(db);
  let migrationsAppliedCount = 0;

  for (const filename of getMigrationFiles(migrationsPath)) {
    const version = path.basename(filename, '.sql');

    if (appliedVersions.has(version)) {
      logger.debug(`[Migrations] Skipping already applied migration: ${version}`);
      continue;
    }

    logger.info(`[Migrations] Applying migration: ${version}...`);
    const sql = fs.readFileSync(path.join(migrationsPath, filename), 'utf8');

    const runMigrationTx = db.transaction(() => {
      db.exec(sql);
      db.prepare(`INSERT INTO ${MIGRATIONS_TABLE_NAME} (version, applied_at) VALUES (?, ?)`)
        .run(version, Date.now());
    });

    try {
      runMigrationTx();
      migrationsAppliedCount++;
    } catch (migrationError) {
      logger.error(`[Migrations] FAILED to apply migration ${version}:`, migrationError);
      throw new StorageUnavailableError(
        'migrate',
        `Migration ${version} failed: ${migrationError instanceof Error ? migrationError.message : String(migrationError)}`
      );
    }
  }

  if (migrationsAppliedCount > 0) {
    logger.info(`[Migrations] Applied ${migrationsAppliedCount} new migration(s).`);
  } else {
    logger.info('[Migrations] Database schema is up to date.');
  }
  return migrationsAppliedCount;
}

export default runMigrations;
export { runMigrations };
