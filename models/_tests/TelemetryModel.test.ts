import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, vi } from 'vitest';
import Database from 'better-sqlite3';
import { TelemetryModel } from '../TelemetryModel';
import { setupTestDb, cleanTestDb } from './testUtils';

const HOUR = 60 * 60 * 1000;
const DAY = 24 * HOUR;
const START = new Date('2026-03-01T12:00:00.000Z');

describe('TelemetryModel', () => {
  let db: Database.Database;
  let model: TelemetryModel;

  beforeAll(() => {
    db = setupTestDb();
  });

  afterAll(() => {
    db.close();
  });

  beforeEach(() => {
    cleanTestDb(db);
    model = new TelemetryModel(db);
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(START);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('log / recent', () => {
    it('should store the payload and caller context', () => {
      const id = model.log('market_analysis', { subject: 'EV Batteries', nested: { ok: true } }, {
        sessionToken: 'session-1',
        userAgent: 'test-agent',
      });

      expect(model.recent(1)).toEqual([{
        id,
        eventKind: 'market_analysis',
        eventPayload: { subject: 'EV Batteries', nested: { ok: true } },
        sessionToken: 'session-1',
        userAgent: 'test-agent',
        createdAt: START.getTime(),
      }]);
    });

    it('should accept events without payload or context', () => {
      model.log('custom_kind');

      const [event] = model.recent(1);

      expect(event.eventPayload).toBeNull();
      expect(event.sessionToken).toBeNull();
      expect(event.userAgent).toBeNull();
    });

    it('should surface a payload that is not valid JSON as raw text', () => {
      db.prepare(`
        INSERT INTO telemetry_events (id, event_kind, event_payload, created_at)
        VALUES ('legacy', 'legacy_kind', 'not json', ?)
      `).run(START.getTime());

      expect(model.recent(1)[0].eventPayload).toEqual({ raw: 'not json' });
    });
  });

  describe('dailyCounts', () => {
    it('should count events per UTC day, newest day first', () => {
      vi.setSystemTime(new Date(START.getTime() - DAY));
      model.log('cache_hit');
      vi.setSystemTime(START);
      model.log('cache_hit');
      model.log('ma_search');
      vi.setSystemTime(new Date(START.getTime() + HOUR));

      expect(model.dailyCounts(7 * DAY)).toEqual([
        { day: '2026-03-01', count: 2 },
        { day: '2026-02-28', count: 1 },
      ]);
    });

    it('should ignore events outside the window', () => {
      vi.setSystemTime(new Date(START.getTime() - 10 * DAY));
      model.log('cache_hit');
      vi.setSystemTime(START);

      expect(model.dailyCounts(7 * DAY)).toEqual([]);
    });
  });

  describe('countsByKind', () => {
    it('should order kinds by count', () => {
      model.log('ma_search');
      model.log('cache_hit');
      model.log('cache_hit');

      expect(model.countsByKind(DAY)).toEqual([
        { eventKind: 'cache_hit', count: 2 },
        { eventKind: 'ma_search', count: 1 },
      ]);
    });
  });

  describe('purgeOlderThan / deleteAll', () => {
    it('should purge events older than the retention', () => {
      model.log('old');
      vi.setSystemTime(new Date(START.getTime() + 91 * DAY));
      model.log('new');

      expect(model.purgeOlderThan(90 * DAY)).toBe(1);
      expect(model.recent(10).map(e => e.eventKind)).toEqual(['new']);
    });

    it('should delete every event', () => {
      model.log('a');
      model.log('b');

      expect(model.deleteAll()).toBe(2);
      expect(model.count()).toBe(0);
    });
  });
});
