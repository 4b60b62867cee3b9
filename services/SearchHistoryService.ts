import { SearchHistoryModel } from '../models/SearchHistoryModel';
import { BaseService } from './base/BaseService';
import { TelemetryService } from './TelemetryService';
import type { MergerLookup, SearchRecord, SearchResult, TelemetryContext } from '../shared/types';

interface SearchHistoryServiceDeps {
  searchHistoryModel: SearchHistoryModel;
  telemetryService: TelemetryService;
}

export interface RecordSearchOptions {
  /** Overrides the count taken from the payload's table rows. */
  dealsFound?: number;
  telemetry?: TelemetryContext;
}

const TABLE_SEPARATOR = /^\|[\s:|-]+\|$/;

/**
 * Number of data rows in the markdown tables of a lookup result.
 * Each separator row (`|---|---|`) follows a header row; neither is a deal.
 */
export function countDeals(payload: string): number {
  const rows = payload
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.startsWith('|') && line.endsWith('|') && line.length > 1);
  const separators = rows.filter((row) => TABLE_SEPARATOR.test(row)).length;
  return Math.max(0, rows.length - 2 * separators);
}

/**
 * Runs merger/acquisition lookups and keeps every result as history.
 * Searches are never cached: repeating one adds a row and an `ma_search` event.
 */
export class SearchHistoryService extends BaseService<SearchHistoryServiceDeps> {
  constructor(deps: SearchHistoryServiceDeps) {
    super('SearchHistoryService', deps);
    this.logger.info("[SearchHistoryService] Initialized.");
  }

  /**
   * Calls the lookup and records its result. Nothing is recorded when the lookup fails.
   */
  async search(
    subject: string,
    timeframe: string,
    lookup: MergerLookup,
    telemetry?: TelemetryContext
  ): Promise<SearchResult> {
    return this.execute('search', async () => {
      const payload = await lookup(subject, timeframe);
      return this.recordSearch(subject, timeframe, payload, { telemetry });
    }, { subject, timeframe });
  }

  /**
   * Appends a search produced elsewhere and logs its `ma_search` event.
   * An empty payload is stored as null.
   */
  recordSearch(
    subject: string,
    timeframe: string,
    payload: string,
    options: RecordSearchOptions = {}
  ): SearchResult {
    const dealsFound = options.dealsFound ?? countDeals(payload);
    const searchId = this.deps.searchHistoryModel.append(
      subject,
      timeframe,
      payload.length > 0 ? payload : null,
      dealsFound
    );
    this.deps.telemetryService.log('ma_search', { subject, timeframe, dealsFound }, options.telemetry);

    this.logDebug(`Recorded search for ${subject} (${timeframe}): ${dealsFound} deals`);
    return { searchId, payload, dealsFound };
  }

  recent(limit?: number): SearchRecord[] {
    return this.deps.searchHistoryModel.recent(limit);
  }

  forSubject(subject: string): SearchRecord[] {
    return this.deps.searchHistoryModel.forSubject(subject);
  }

  purgeOlderThan(ageMs: number): number {
    return this.deps.searchHistoryModel.purgeOlderThan(ageMs);
  }

  deleteById(id: string): boolean {
    return this.deps.searchHistoryModel.deleteById(id);
  }
}
