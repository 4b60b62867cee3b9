import { logger } from '../../utils/logger';
import type Database from 'better-sqlite3';

type LogContext = Record<string, unknown>;

/**
 * Abstract base class for the store's services.
 * Provides prefixed logging, timed execution and transaction helpers.
 */
export abstract class BaseService<TDeps = object> {
  protected readonly logger = logger;
  protected readonly serviceName: string;
  protected readonly deps: TDeps;

  constructor(serviceName: string, deps: TDeps) {
    this.serviceName = serviceName;
    this.deps = deps;
  }

  /**
   * Release in-memory state held by the service. Called when the store closes.
   */
  async cleanup(): Promise<void> {
    // Override in subclasses if needed
  }

  /**
   * Execute an async operation with automatic logging and error handling.
   * @param operation The operation name for logging
   * @param fn The async function to execute
   * @param context Optional context object for logging
   */
  protected async execute<T>(
    operation: string,
    fn: () => Promise<T>,
    context?: LogContext
  ): Promise<T> {
    const startTime = Date.now();
    const logContext = context ? `, context: ${JSON.stringify(context)}` : '';

    this.logger.debug(`[${this.serviceName}] ${operation} started${logContext}`);

    try {
      const result = await fn();
      this.logger.debug(`[${this.serviceName}] ${operation} completed in ${Date.now() - startTime}ms`);
      return result;
    } catch (error) {
      this.logger.error(`[${this.serviceName}] ${operation} failed after ${Date.now() - startTime}ms:`, error);
      throw error;
    }
  }

  protected logInfo(message: string, ...args: unknown[]): void {
    this.logger.info(`[${this.serviceName}] ${message}`, ...args);
  }

  protected logDebug(message: string, ...args: unknown[]): void {
    this.logger.debug(`[${this.serviceName}] ${message}`, ...args);
  }

  protected logWarn(message: string, ...args: unknown[]): void {
    this.logger.warn(`[${this.serviceName}] ${message}`, ...args);
  }

  protected logError(message: string, error?: unknown, ...args: unknown[]): void {
    if (error) {
      this.logger.error(`[${this.serviceName}] ${message}`, error, ...args);
    } else {
      this.logger.error(`[${this.serviceName}] ${message}`, ...args);
    }
  }

  /**
   * Execute a function within a database transaction.
   * Note: The callback MUST be synchronous as better-sqlite3 doesn't support async transactions.
   */
  protected withTransaction<T>(
    db: Database.Database,
    fn: () => T
  ): T {
    const transaction = db.transaction(fn);

    try {
      const result = transaction();
      this.logDebug('Transaction completed successfully');
      return result;
    } catch (error) {
      this.logError('Transaction failed:', error);
      throw error;
    }
  }
}
