import Database from 'better-sqlite3';
import { AnalysisCacheModel } from '../models/AnalysisCacheModel';
import { DocumentModel } from '../models/DocumentModel';
import { InteractionModel } from '../models/InteractionModel';
import { SearchHistoryModel } from '../models/SearchHistoryModel';
import { TelemetryModel } from '../models/TelemetryModel';
import { DAY_MS } from '../utils/config';
import { BaseService } from './base/BaseService';
import { StorageUnavailableError } from './base/ServiceError';
import { ConfirmationGate } from './ConfirmationGate';
import type {
  BulkDeleteResult,
  BulkDeleteScope,
  CleanupResult,
  ExportSummary,
  HealthReport,
  StoreStats,
  TableCounts,
} from '../shared/types';

interface MaintenanceServiceDeps {
  db: Database.Database;
  analysisCacheModel: AnalysisCacheModel;
  documentModel: DocumentModel;
  interactionModel: InteractionModel;
  searchHistoryModel: SearchHistoryModel;
  telemetryModel: TelemetryModel;
  confirmationGate: ConfirmationGate;
  settings: { telemetryRetentionMs: number };
}

const STALE_CACHE_AGE_MS = 7 * DAY_MS;
const STALE_CACHE_THRESHOLD = 50;
const LARGE_STORE_BYTES = 50 * 1024 * 1024;
const POPULAR_WINDOW_MS = 30 * DAY_MS;
const POPULAR_LIMIT = 10;

function emptyCounts(): TableCounts {
  return { cache: 0, documents: 0, interactions: 0, searches: 0, telemetry: 0 };
}

/**
 * Whole-store operations: statistics, bulk deletes, expiry sweeps,
 * compaction and backups.
 */
export class MaintenanceService extends BaseService<MaintenanceServiceDeps> {
  constructor(deps: MaintenanceServiceDeps) {
    super('MaintenanceService', deps);
    this.logger.info("[MaintenanceService] Initialized.");
  }

  stats(): StoreStats {
    const { analysisCacheModel, documentModel, interactionModel, searchHistoryModel, telemetryModel } = this.deps;
    return {
      counts: {
        cache: analysisCacheModel.count(),
        documents: documentModel.count(),
        interactions: interactionModel.count(),
        searches: searchHistoryModel.count(),
        telemetry: telemetryModel.count(),
      },
      sizeBytes: this.readPragma('page_count') * this.readPragma('page_size'),
    };
  }

  /**
   * Deletes every row in the tables covered by `scope`, in one transaction.
   * Documents always take their interactions with them. No confirmation is asked.
   */
  bulkDelete(scope: BulkDeleteScope): BulkDeleteResult {
    const removed = emptyCounts();
    const all = scope === 'everything';

    this.withTransaction(this.deps.db, () => {
      if (all || scope === 'cache') {
        removed.cache = this.deps.analysisCacheModel.deleteAll();
      }
      if (all || scope === 'documents') {
        const { documents, interactions } = this.deps.documentModel.deleteAll();
        removed.documents = documents;
        removed.interactions = interactions;
      }
      if (all || scope === 'searches') {
        removed.searches = this.deps.searchHistoryModel.deleteAll();
      }
      if (all || scope === 'telemetry') {
        removed.telemetry = this.deps.telemetryModel.deleteAll();
      }
    });

    this.logInfo(`Bulk delete '${scope}' removed rows:`, removed);
    return removed;
  }

  /**
   * Runs bulkDelete only when the gate commits an earlier arm for this scope and session.
   * Returns null when there is nothing to commit.
   */
  confirmedBulkDelete(scope: BulkDeleteScope, sessionToken: string): BulkDeleteResult | null {
    if (!this.deps.confirmationGate.commit(scope, sessionToken)) {
      return null;
    }
    return this.bulkDelete(scope);
  }

  sweepExpired(): number {
    return this.deps.analysisCacheModel.sweepExpired();
  }

  /**
   * Rebuilds the database file to reclaim space left by deleted rows.
   */
  compact(): void {
    try {
      this.deps.db.exec('VACUUM');
      this.logInfo('Database compacted.');
    } catch (error) {
      this.logError('VACUUM failed:', error);
      throw new StorageUnavailableError('compact', error instanceof Error ? error.message : String(error));
    }
  }

  /**
   * Sweeps expired cache rows, purges telemetry past retention and compacts.
   */
  fullCleanup(telemetryRetentionMs: number = this.deps.settings.telemetryRetentionMs): CleanupResult {
    const expiredCacheRemoved = this.sweepExpired();
    const telemetryRemoved = this.deps.telemetryModel.purgeOlderThan(telemetryRetentionMs);
    this.compact();

    this.logInfo('Full cleanup complete', { expiredCacheRemoved, telemetryRemoved });
    return { expiredCacheRemoved, telemetryRemoved };
  }

  healthReport(): HealthReport {
    const stats = this.stats();
    const staleCacheEntries = this.deps.analysisCacheModel.countOlderThan(STALE_CACHE_AGE_MS);
    return {
      stats,
      staleCacheEntries,
      largeStore: stats.sizeBytes > LARGE_STORE_BYTES,
      staleCache: staleCacheEntries > STALE_CACHE_THRESHOLD,
    };
  }

  exportSummary(): ExportSummary {
    return {
      timestamp: new Date().toISOString(),
      stats: this.stats(),
      popular: this.deps.analysisCacheModel.popular(POPULAR_WINDOW_MS, POPULAR_LIMIT),
    };
  }

  /**
   * Copies the live database to `destinationPath` with SQLite's online backup.
   */
  async backup(destinationPath: string): Promise<void> {
    await this.execute('backup', async () => {
      try {
        const { totalPages } = await this.deps.db.backup(destinationPath);
        this.logInfo(`Backed up ${totalPages} pages to ${destinationPath}`);
      } catch (error) {
        throw new StorageUnavailableError('backup', error instanceof Error ? error.message : String(error));
      }
    }, { destinationPath });
  }

  private readPragma(name: 'page_count' | 'page_size'): number {
    const value = this.deps.db.pragma(name, { simple: true });
    if (typeof value !== 'number') {
      throw new StorageUnavailableError('stats', `PRAGMA ${name} returned ${String(value)}`);
    }
    return value;
  }
}
