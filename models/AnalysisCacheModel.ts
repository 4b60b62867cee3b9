import Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../utils/logger';
import { fingerprint } from '../utils/fingerprint';
import { BaseModel, assertPositiveLimit } from './BaseModel';
import { MalformedInputError } from '../services/base/ServiceError';
import type {
  CacheEntry,
  CacheHistoryItem,
  CacheLookup,
  PopularSubject,
  QueryParameters,
} from '../shared/types';

interface CacheEntryRecord {
  id: string;
  subject: string;
  query_kind: string;
  fingerprint: string;
  payload: string;
  created_at: number;
  expires_at: number | null;
  source: string;
}

interface CacheHistoryRecord {
  subject: string;
  query_kind: string;
  created_at: number;
  expires_at: number | null;
  access_count: number;
}

function mapRecordToEntry(record: CacheEntryRecord): CacheEntry {
  return {
    id: record.id,
    subject: record.subject,
    queryKind: record.query_kind,
    fingerprint: record.fingerprint,
    payload: record.payload,
    createdAt: record.created_at,
    expiresAt: record.expires_at,
    source: record.source,
  };
}

export interface PutOptions {
  source?: string;
  /** Time-to-live in milliseconds. Omit for an entry that never expires. */
  ttlMs?: number;
}

const DEFAULT_SOURCE = 'openai';

// Live means no expiry, or an expiry still ahead of $now.
const LIVE = '(expires_at IS NULL OR expires_at > $now)';

/**
 * TTL-keyed store of computed text artifacts.
 * Expiry is lazy: reads filter expired rows, only sweepExpired() removes them.
 */
export class AnalysisCacheModel extends BaseModel {
  protected readonly modelName = 'AnalysisCacheModel';

  constructor(db: Database.Database) {
    super(db);
    logger.info('[AnalysisCacheModel] Initialized.');
  }

  get(subject: string, queryKind: string, parameters: QueryParameters = {}): CacheLookup {
    const key = fingerprint(subject, queryKind, parameters);
    const entry = this.getByFingerprint(key);
    if (!entry) {
      logger.debug(`[AnalysisCacheModel] Miss for ${subject}/${queryKind} (${key})`);
      return { found: false };
    }
    return {
      found: true,
      payload: entry.payload,
      cachedAt: entry.createdAt,
      expiresAt: entry.expiresAt,
    };
  }

  /**
   * Reads the live entry for a fingerprint, or null when absent or expired.
   */
  getByFingerprint(key: string): CacheEntry | null {
    try {
      const record = this.db.prepare(`
        SELECT * FROM analysis_cache
        WHERE fingerprint = $fingerprint AND ${LIVE}
      `).get({ fingerprint: key, now: Date.now() }) as CacheEntryRecord | undefined;
      return record ? mapRecordToEntry(record) : null;
    } catch (error) {
      this.handleDbError(error, 'getByFingerprint');
    }
  }

  /**
   * Writes through the cache. An existing row for the same fingerprint keeps
   * its id and takes the new payload, source, creation time and expiry.
   */
  put(
    subject: string,
    queryKind: string,
    parameters: QueryParameters,
    payload: string,
    options: PutOptions = {}
  ): CacheEntry {
    const { ttlMs } = options;
    if (ttlMs !== undefined && (!Number.isFinite(ttlMs) || ttlMs < 0)) {
      throw new MalformedInputError(`TTL must be a non-negative number of milliseconds, got ${ttlMs}`);
    }

    const key = fingerprint(subject, queryKind, parameters);
    const now = Date.now();
    const expiresAt = ttlMs === undefined ? null : now + ttlMs;

    try {
      const record = this.db.prepare(`
        INSERT INTO analysis_cache (id, subject, query_kind, fingerprint, payload, created_at, expires_at, source)
        VALUES ($id, $subject, $queryKind, $fingerprint, $payload, $createdAt, $expiresAt, $source)
        ON CONFLICT(fingerprint) DO UPDATE SET
          subject = excluded.subject,
          query_kind = excluded.query_kind,
          payload = excluded.payload,
          created_at = excluded.created_at,
          expires_at = excluded.expires_at,
          source = excluded.source
        RETURNING *
      `).get({
        id: uuidv4(),
        subject,
        queryKind,
        fingerprint: key,
        payload,
        createdAt: now,
        expiresAt,
        source: options.source ?? DEFAULT_SOURCE,
      }) as CacheEntryRecord;

      logger.debug(`[AnalysisCacheModel] Stored ${subject}/${queryKind}`, { fingerprint: key, expiresAt });
      return mapRecordToEntry(record);
    } catch (error) {
      this.handleDbError(error, 'put');
    }
  }

  /**
   * Deletes every row whose expiry has passed. Returns the number removed.
   */
  sweepExpired(): number {
    try {
      const result = this.db.prepare(`
        DELETE FROM analysis_cache
        WHERE expires_at IS NOT NULL AND expires_at <= $now
      `).run({ now: Date.now() });
      logger.info(`[AnalysisCacheModel] Swept ${result.changes} expired entries.`);
      return result.changes;
    } catch (error) {
      this.handleDbError(error, 'sweepExpired');
    }
  }

  /**
   * Subjects with the most live entries created within the window.
   * Ties go to the subject accessed most recently.
   */
  popular(windowMs: number, limit: number = 10): PopularSubject[] {
    assertPositiveLimit(limit);
    const now = Date.now();
    try {
      const rows = this.db.prepare(`
        SELECT subject, COUNT(*) AS count, MAX(created_at) AS last_access
        FROM analysis_cache
        WHERE created_at >= $since AND ${LIVE}
        GROUP BY subject
        ORDER BY count DESC, last_access DESC
        LIMIT $limit
      `).all({ since: now - windowMs, now, limit }) as { subject: string; count: number; last_access: number }[];

      return rows.map(row => ({ subject: row.subject, count: row.count, lastAccess: row.last_access }));
    } catch (error) {
      this.handleDbError(error, 'popular');
    }
  }

  /**
   * Live entries newest first, each with the number of live entries for its subject and kind.
   */
  listHistory(limit: number = 20): CacheHistoryItem[] {
    assertPositiveLimit(limit);
    try {
      const rows = this.db.prepare(`
        SELECT subject, query_kind, created_at, expires_at,
               COUNT(*) OVER (PARTITION BY subject, query_kind) AS access_count
        FROM analysis_cache
        WHERE ${LIVE}
        ORDER BY created_at DESC, rowid DESC
        LIMIT $limit
      `).all({ now: Date.now(), limit }) as CacheHistoryRecord[];

      return rows.map(row => ({
        subject: row.subject,
        queryKind: row.query_kind,
        createdAt: row.created_at,
        expiresAt: row.expires_at,
        accessCount: row.access_count,
      }));
    } catch (error) {
      this.handleDbError(error, 'listHistory');
    }
  }

  /**
   * Every live entry for a subject, newest first.
   */
  getAllForSubject(subject: string): CacheEntry[] {
    try {
      const records = this.db.prepare(`
        SELECT * FROM analysis_cache
        WHERE subject = $subject AND ${LIVE}
        ORDER BY created_at DESC, rowid DESC
      `).all({ subject, now: Date.now() }) as CacheEntryRecord[];
      return records.map(mapRecordToEntry);
    } catch (error) {
      this.handleDbError(error, 'getAllForSubject');
    }
  }

  /**
   * Deletes a subject's entries, optionally only those of one query kind.
   */
  deleteBySubject(subject: string, queryKind?: string): number {
    try {
      const result = queryKind === undefined
        ? this.db.prepare('DELETE FROM analysis_cache WHERE subject = ?').run(subject)
        : this.db.prepare('DELETE FROM analysis_cache WHERE subject = ? AND query_kind = ?').run(subject, queryKind);
      logger.info(`[AnalysisCacheModel] Deleted ${result.changes} entries for ${subject}${queryKind ? `/${queryKind}` : ''}.`);
      return result.changes;
    } catch (error) {
      this.handleDbError(error, 'deleteBySubject');
    }
  }

  /**
   * Counts rows created more than `ageMs` ago, expired or not.
   */
  countOlderThan(ageMs: number): number {
    try {
      const row = this.db.prepare('SELECT COUNT(*) AS count FROM analysis_cache WHERE created_at < ?')
        .get(Date.now() - ageMs) as { count: number };
      return row.count;
    } catch (error) {
      this.handleDbError(error, 'countOlderThan');
    }
  }

  count(): number {
    try {
      const row = this.db.prepare('SELECT COUNT(*) AS count FROM analysis_cache').get() as { count: number };
      return row.count;
    } catch (error) {
      this.handleDbError(error, 'count');
    }
  }

  deleteAll(): number {
    try {
      return this.db.prepare('DELETE FROM analysis_cache').run().changes;
    } catch (error) {
      this.handleDbError(error, 'deleteAll');
    }
  }
}
