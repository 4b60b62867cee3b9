import Database from 'better-sqlite3';
import { logger } from '../utils/logger';
import {
  ServiceError,
  ConstraintViolationError,
  MalformedInputError,
  NotFoundError,
  StorageUnavailableError,
} from '../services/base/ServiceError';

/**
 * Base class for all models, providing common database handling and error management
 */
export abstract class BaseModel {
  protected readonly db: Database.Database;
  protected abstract readonly modelName: string;

  constructor(db: Database.Database) {
    this.db = db;
  }

  /**
   * Get the database instance (for transaction support)
   */
  getDatabase(): Database.Database {
    return this.db;
  }

  /**
   * Runs `fn` inside a single transaction. Nested calls join the outer one.
   */
  protected transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  /**
   * Handle database errors consistently across all models
   * @param error - The error that occurred
   * @param context - Description of the operation that failed
   * @throws ServiceError subclass matching the failure
   */
  protected handleDbError(error: unknown, context: string): never {
    // Errors raised deliberately inside a model pass through untouched
    if (error instanceof ServiceError) {
      throw error;
    }

    const message = error instanceof Error ? error.message : 'Unknown database error';
    logger.error(`[${this.modelName}] DB error in ${context}: ${message}`, error);

    if (error instanceof Database.SqliteError) {
      switch (error.code) {
        case 'SQLITE_CONSTRAINT_UNIQUE':
        case 'SQLITE_CONSTRAINT_PRIMARYKEY':
          throw new ConstraintViolationError(this.modelName, message, { context });
        case 'SQLITE_CONSTRAINT_FOREIGNKEY':
          throw new NotFoundError('Referenced record', undefined, { context });
        default:
          throw new StorageUnavailableError(context, message, { code: error.code });
      }
    }

    throw new StorageUnavailableError(context, message);
  }
}

/**
 * Rejects limits SQLite would treat oddly (zero, negatives mean "no limit").
 */
export function assertPositiveLimit(limit: number): void {
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new MalformedInputError(`Limit must be a positive integer, got ${limit}`);
  }
}
