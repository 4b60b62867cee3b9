import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import Database from 'better-sqlite3';
import { TelemetryService } from '../TelemetryService';
import { TelemetryModel } from '../../models/TelemetryModel';
import { setupTestDb } from '../../models/_tests/testUtils';
import { logger } from '../../utils/logger';

// Mock logger so shape warnings can be asserted
vi.mock('../../utils/logger', () => ({
  logger: {
    trace: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const DAY = 24 * 60 * 60 * 1000;

describe('TelemetryService', () => {
  let db: Database.Database;
  let telemetryModel: TelemetryModel;
  let service: TelemetryService;

  beforeEach(() => {
    vi.mocked(logger.warn).mockClear();
    db = setupTestDb();
    telemetryModel = new TelemetryModel(db);
    service = new TelemetryService({ telemetryModel });
  });

  afterEach(() => {
    vi.useRealTimers();
    db.close();
  });

  describe('log', () => {
    it('should store a well-formed payload without warnings', () => {
      const id = service.log('ma_search', { subject: 'Fintech', timeframe: 'last 3 years', dealsFound: 4 });

      expect(service.recent(1)[0].id).toBe(id);
      expect(logger.warn).not.toHaveBeenCalled();
    });

    it('should warn about a mismatched payload and store it anyway', () => {
      service.log('ma_search', { subject: 'Fintech', dealsFound: 'many' });

      expect(logger.warn).toHaveBeenCalledTimes(1);
      expect(vi.mocked(logger.warn).mock.calls[0][0]).toBe(
        "[TelemetryService] Payload for 'ma_search' does not match its documented shape:"
      );
      expect(service.recent(1)[0].eventPayload).toEqual({ subject: 'Fintech', dealsFound: 'many' });
    });

    it('should accept extra fields on known kinds', () => {
      service.log('cache_hit', { subject: 'Solar', queryKind: 'global', region: 'EU' });

      expect(logger.warn).not.toHaveBeenCalled();
    });

    it('should accept unknown kinds with any payload', () => {
      service.log('dashboard_opened', { tab: 3 }, { userAgent: 'test-agent' });

      const [event] = service.recent(1);
      expect(event.eventKind).toBe('dashboard_opened');
      expect(event.userAgent).toBe('test-agent');
      expect(logger.warn).not.toHaveBeenCalled();
    });

    it('should accept known kinds without a payload', () => {
      service.log('market_analysis');

      expect(service.recent(1)[0].eventPayload).toBeNull();
      expect(logger.warn).not.toHaveBeenCalled();
    });
  });

  describe('reporting', () => {
    it('should delegate counts, purges and deletes to the model', () => {
      vi.useFakeTimers({ toFake: ['Date'] });
      vi.setSystemTime(new Date('2026-03-01T12:00:00.000Z'));
      service.log('cache_hit');
      service.log('cache_hit');
      service.log('ma_search');

      expect(service.countsByKind(DAY)).toEqual([
        { eventKind: 'cache_hit', count: 2 },
        { eventKind: 'ma_search', count: 1 },
      ]);
      expect(service.dailyCounts(DAY).map(d => d.count)).toEqual([3]);
      expect(service.purgeOlderThan(DAY)).toBe(0);
      expect(service.deleteAll()).toBe(3);
    });
  });
});
