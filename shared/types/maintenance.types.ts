import type { PopularSubject } from './cache.types';

// --- Maintenance and bulk-delete types ---

export type BulkDeleteScope = 'cache' | 'documents' | 'searches' | 'telemetry' | 'everything';

export interface TableCounts {
  cache: number;
  documents: number;
  interactions: number;
  searches: number;
  telemetry: number;
}

export interface StoreStats {
  counts: TableCounts;
  sizeBytes: number;
}

export interface CleanupResult {
  expiredCacheRemoved: number;
  telemetryRemoved: number;
}

export interface HealthReport {
  stats: StoreStats;
  staleCacheEntries: number;
  largeStore: boolean;
  staleCache: boolean;
}

/** Rows removed per table by a bulk delete. */
export type BulkDeleteResult = TableCounts;

export interface ExportSummary {
  /** ISO 8601 time the summary was taken. */
  timestamp: string;
  stats: StoreStats;
  popular: PopularSubject[];
}
