import { v4 as uuidv4 } from 'uuid';
import Database from 'better-sqlite3';
import { logger } from '../utils/logger';
import { BaseModel, assertPositiveLimit } from './BaseModel';
import { MalformedInputError } from '../services/base/ServiceError';
import type { SearchRecord } from '../shared/types';

interface SearchHistoryRecord {
  id: string;
  subject: string;
  timeframe: string;
  payload: string | null;
  deals_found: number;
  created_at: number;
}

function mapRecordToSearch(record: SearchHistoryRecord): SearchRecord {
  return {
    id: record.id,
    subject: record.subject,
    timeframe: record.timeframe,
    payload: record.payload,
    dealsFound: record.deals_found,
    createdAt: record.created_at,
  };
}

/**
 * Log of merger/acquisition searches. Repeating a search adds a row,
 * so a subject's rows read as a trend over time.
 */
export class SearchHistoryModel extends BaseModel {
  protected readonly modelName = 'SearchHistoryModel';

  constructor(db: Database.Database) {
    super(db);
    logger.info("[SearchHistoryModel] Initialized.");
  }

  /**
   * Records a search and returns its id.
   */
  append(subject: string, timeframe: string, payload: string | null, dealsFound: number): string {
    if (!Number.isInteger(dealsFound) || dealsFound < 0) {
      throw new MalformedInputError(`Deals found must be a non-negative integer, got ${dealsFound}`);
    }

    const id = uuidv4();
    try {
      this.db.prepare(`
        INSERT INTO search_history (id, subject, timeframe, payload, deals_found, created_at)
        VALUES ($id, $subject, $timeframe, $payload, $dealsFound, $createdAt)
      `).run({
        id,
        subject,
        timeframe,
        payload,
        dealsFound,
        createdAt: Date.now(),
      });

      logger.debug("[SearchHistoryModel] Search logged:", { id, subject, timeframe, dealsFound });
      return id;
    } catch (error) {
      this.handleDbError(error, `append ${subject}`);
    }
  }

  recent(limit: number = 20): SearchRecord[] {
    assertPositiveLimit(limit);
    try {
      const records = this.db.prepare(`
        SELECT * FROM search_history
        ORDER BY created_at DESC, rowid DESC
        LIMIT ?
      `).all(limit) as SearchHistoryRecord[];
      return records.map(mapRecordToSearch);
    } catch (error) {
      this.handleDbError(error, 'recent');
    }
  }

  /**
   * Every search for a subject, oldest first.
   */
  forSubject(subject: string): SearchRecord[] {
    try {
      const records = this.db.prepare(`
        SELECT * FROM search_history
        WHERE subject = ?
        ORDER BY created_at ASC, rowid ASC
      `).all(subject) as SearchHistoryRecord[];
      return records.map(mapRecordToSearch);
    } catch (error) {
      this.handleDbError(error, `forSubject ${subject}`);
    }
  }

  /**
   * Delete searches created more than `ageMs` ago.
   */
  purgeOlderThan(ageMs: number): number {
    try {
      const result = this.db.prepare('DELETE FROM search_history WHERE created_at < ?')
        .run(Date.now() - ageMs);

      logger.info("[SearchHistoryModel] Purged old searches:", { deletedCount: result.changes, ageMs });
      return result.changes;
    } catch (error) {
      this.handleDbError(error, 'purgeOlderThan');
    }
  }

  deleteById(id: string): boolean {
    try {
      return this.db.prepare('DELETE FROM search_history WHERE id = ?').run(id).changes > 0;
    } catch (error) {
      this.handleDbError(error, `deleteById ${id}`);
    }
  }

  count(): number {
    try {
      const row = this.db.prepare('SELECT COUNT(*) AS count FROM search_history').get() as { count: number };
      return row.count;
    } catch (error) {
      this.handleDbError(error, 'count');
    }
  }

  deleteAll(): number {
    try {
      return this.db.prepare('DELETE FROM search_history').run().changes;
    } catch (error) {
      this.handleDbError(error, 'deleteAll');
    }
  }
}
