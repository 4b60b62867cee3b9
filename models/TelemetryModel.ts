import { v4 as uuidv4 } from 'uuid';
import Database from 'better-sqlite3';
import { logger } from '../utils/logger';
import { BaseModel, assertPositiveLimit } from './BaseModel';
import type {
  DailyEventCount,
  EventKindCount,
  EventPayload,
  TelemetryContext,
  TelemetryEvent,
} from '../shared/types';

interface TelemetryEventRecord {
  id: string;
  event_kind: string;
  event_payload: string | null;
  session_token: string | null;
  user_agent: string | null;
  created_at: number;
}

function isPayloadObject(value: unknown): value is EventPayload {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parsePayload(json: string | null): EventPayload | null {
  if (json === null) {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(json);
    return isPayloadObject(parsed) ? parsed : { value: parsed };
  } catch {
    logger.warn("[TelemetryModel] Stored payload is not valid JSON; returning it as raw text.");
    return { raw: json };
  }
}

function mapRecordToEvent(record: TelemetryEventRecord): TelemetryEvent {
  return {
    id: record.id,
    eventKind: record.event_kind,
    eventPayload: parsePayload(record.event_payload),
    sessionToken: record.session_token,
    userAgent: record.user_agent,
    createdAt: record.created_at,
  };
}

/**
 * Append-only usage event log. Payloads are stored as opaque JSON blobs;
 * rows leave only through age-based purges or bulk deletes.
 */
export class TelemetryModel extends BaseModel {
  protected readonly modelName = 'TelemetryModel';

  constructor(db: Database.Database) {
    super(db);
    logger.info("[TelemetryModel] Initialized.");
  }

  /**
   * Add a new event and return its id.
   */
  log(eventKind: string, payload: EventPayload | null = null, context: TelemetryContext = {}): string {
    const id = uuidv4();

    try {
      this.db.prepare(`
        INSERT INTO telemetry_events (id, event_kind, event_payload, session_token, user_agent, created_at)
        VALUES ($id, $eventKind, $eventPayload, $sessionToken, $userAgent, $createdAt)
      `).run({
        id,
        eventKind,
        eventPayload: payload === null ? null : JSON.stringify(payload),
        sessionToken: context.sessionToken ?? null,
        userAgent: context.userAgent ?? null,
        createdAt: Date.now(),
      });

      logger.debug("[TelemetryModel] Event logged:", { id, eventKind });
      return id;
    } catch (error) {
      this.handleDbError(error, `log ${eventKind}`);
    }
  }

  recent(limit: number = 50): TelemetryEvent[] {
    assertPositiveLimit(limit);
    try {
      const records = this.db.prepare(`
        SELECT * FROM telemetry_events
        ORDER BY created_at DESC, rowid DESC
        LIMIT ?
      `).all(limit) as TelemetryEventRecord[];
      return records.map(mapRecordToEvent);
    } catch (error) {
      this.handleDbError(error, 'recent');
    }
  }

  /**
   * Event totals per UTC calendar day within the window, newest day first.
   */
  dailyCounts(windowMs: number): DailyEventCount[] {
    try {
      const rows = this.db.prepare(`
        SELECT strftime('%Y-%m-%d', created_at / 1000, 'unixepoch') AS day, COUNT(*) AS count
        FROM telemetry_events
        WHERE created_at >= ?
        GROUP BY day
        ORDER BY day DESC
      `).all(Date.now() - windowMs) as DailyEventCount[];
      return rows;
    } catch (error) {
      this.handleDbError(error, 'dailyCounts');
    }
  }

  /**
   * Event totals per kind within the window, most frequent first.
   */
  countsByKind(windowMs: number): EventKindCount[] {
    try {
      const rows = this.db.prepare(`
        SELECT event_kind, COUNT(*) AS count
        FROM telemetry_events
        WHERE created_at >= ?
        GROUP BY event_kind
        ORDER BY count DESC, event_kind ASC
      `).all(Date.now() - windowMs) as { event_kind: string; count: number }[];
      return rows.map(row => ({ eventKind: row.event_kind, count: row.count }));
    } catch (error) {
      this.handleDbError(error, 'countsByKind');
    }
  }

  /**
   * Delete events created more than `ageMs` ago.
   */
  purgeOlderThan(ageMs: number): number {
    try {
      const result = this.db.prepare('DELETE FROM telemetry_events WHERE created_at < ?')
        .run(Date.now() - ageMs);

      logger.info("[TelemetryModel] Purged old events:", { deletedCount: result.changes, ageMs });
      return result.changes;
    } catch (error) {
      this.handleDbError(error, 'purgeOlderThan');
    }
  }

  count(): number {
    try {
      const row = this.db.prepare('SELECT COUNT(*) AS count FROM telemetry_events').get() as { count: number };
      return row.count;
    } catch (error) {
      this.handleDbError(error, 'count');
    }
  }

  deleteAll(): number {
    try {
      return this.db.prepare('DELETE FROM telemetry_events').run().changes;
    } catch (error) {
      this.handleDbError(error, 'deleteAll');
    }
  }
}
