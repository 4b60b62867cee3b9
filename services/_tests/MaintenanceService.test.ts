import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import Database from 'better-sqlite3';
import { initStore, closeStore, type Store } from '../../bootstrap/storeBootstrap';
import { loadConfig } from '../../utils/config';
import { StorageUnavailableError } from '../base/ServiceError';
import type { BulkDeleteScope, TableCounts } from '../../shared/types';

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
const START = new Date('2026-03-01T12:00:00.000Z');

function seed(store: Store): string {
  const { analysisCacheModel, documentModel, interactionModel, searchHistoryModel, telemetryModel } = store.models;
  analysisCacheModel.put('EV Batteries', 'global', {}, 'overview');
  analysisCacheModel.put('Solar', 'global', {}, 'solar');
  const documentId = documentModel.record('outlook.pdf', Buffer.from('pdf bytes'), 4, ['a', 'b']);
  interactionModel.append(documentId, 'What is CAGR?', '12%', 5, 3);
  interactionModel.append(documentId, 'Who leads?', 'Acme', 2, 1);
  searchHistoryModel.append('Fintech', 'last 3 years', null, 0);
  telemetryModel.log('market_analysis');
  return documentId;
}

describe('MaintenanceService', () => {
  let store: Store;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(START);
    store = initStore({ ...loadConfig({}, { loadDotenv: false }), dbPath: ':memory:' });
  });

  afterEach(async () => {
    vi.useRealTimers();
    await closeStore(store);
  });

  describe('stats', () => {
    it('should count rows per table and report the file size', () => {
      seed(store);

      const stats = store.services.maintenance.stats();

      expect(stats.counts).toEqual({ cache: 2, documents: 1, interactions: 2, searches: 1, telemetry: 1 });
      const pageCount = store.db.pragma('page_count', { simple: true });
      const pageSize = store.db.pragma('page_size', { simple: true });
      expect(stats.sizeBytes).toBe(Number(pageCount) * Number(pageSize));
      expect(stats.sizeBytes).toBeGreaterThan(0);
    });
  });

  describe('bulkDelete', () => {
    it('should leave zero counts after deleting everything', () => {
      seed(store);

      const removed = store.services.maintenance.bulkDelete('everything');

      expect(removed).toEqual({ cache: 2, documents: 1, interactions: 2, searches: 1, telemetry: 1 });
      expect(store.services.maintenance.stats().counts).toEqual({
        cache: 0, documents: 0, interactions: 0, searches: 0, telemetry: 0,
      });
    });

    it('should cascade documents to their interactions only', () => {
      seed(store);

      const removed = store.services.maintenance.bulkDelete('documents');

      expect(removed).toEqual({ cache: 0, documents: 1, interactions: 2, searches: 0, telemetry: 0 });
      expect(store.services.maintenance.stats().counts).toEqual({
        cache: 2, documents: 0, interactions: 0, searches: 1, telemetry: 1,
      });
    });

    const singleTableCases: [BulkDeleteScope, TableCounts][] = [
      ['cache', { cache: 2, documents: 0, interactions: 0, searches: 0, telemetry: 0 }],
      ['searches', { cache: 0, documents: 0, interactions: 0, searches: 1, telemetry: 0 }],
      ['telemetry', { cache: 0, documents: 0, interactions: 0, searches: 0, telemetry: 1 }],
    ];

    it.each(singleTableCases)('should clear only the %s table', (scope, expected) => {
      seed(store);

      expect(store.services.maintenance.bulkDelete(scope)).toEqual(expected);
    });

    it('should roll back every table when one delete fails', () => {
      seed(store);
      vi.spyOn(store.models.searchHistoryModel, 'deleteAll').mockImplementation(() => {
        throw new Error('disk I/O error');
      });

      expect(() => store.services.maintenance.bulkDelete('everything')).toThrow('disk I/O error');
      expect(store.services.maintenance.stats().counts).toEqual({
        cache: 2, documents: 1, interactions: 2, searches: 1, telemetry: 1,
      });
    });
  });

  describe('confirmedBulkDelete', () => {
    it('should delete nothing without an arm', () => {
      seed(store);

      expect(store.services.maintenance.confirmedBulkDelete('everything', 'session-1')).toBeNull();
      expect(store.services.maintenance.stats().counts.cache).toBe(2);
    });

    it('should delete once the gate commits', () => {
      seed(store);
      store.services.confirmationGate.arm('cache', 'session-1');

      expect(store.services.maintenance.confirmedBulkDelete('cache', 'session-1')).toMatchObject({ cache: 2 });
      expect(store.services.maintenance.confirmedBulkDelete('cache', 'session-1')).toBeNull();
    });
  });

  describe('cleanup', () => {
    it('should sweep expired cache rows and purge old telemetry', () => {
      const { analysisCacheModel, telemetryModel } = store.models;
      telemetryModel.log('ancient');
      analysisCacheModel.put('Old', 'global', {}, 'old', { ttlMs: DAY });
      vi.setSystemTime(new Date(START.getTime() + 91 * DAY));
      telemetryModel.log('recent');
      analysisCacheModel.put('New', 'global', {}, 'new', { ttlMs: DAY });

      const result = store.services.maintenance.fullCleanup();

      expect(result).toEqual({ expiredCacheRemoved: 1, telemetryRemoved: 1 });
      expect(analysisCacheModel.count()).toBe(1);
      expect(telemetryModel.recent(10).map(e => e.eventKind)).toEqual(['recent']);
    });

    it('should take an explicit telemetry retention', () => {
      store.models.telemetryModel.log('yesterday');
      vi.setSystemTime(new Date(START.getTime() + 2 * DAY));

      expect(store.services.maintenance.fullCleanup(DAY).telemetryRemoved).toBe(1);
    });

    it('should delegate sweeps to the cache', () => {
      store.models.analysisCacheModel.put('A', 'global', {}, 'a', { ttlMs: 0 });

      expect(store.services.maintenance.sweepExpired()).toBe(1);
    });

    it('should compact without error', () => {
      seed(store);
      store.services.maintenance.bulkDelete('everything');

      expect(() => store.services.maintenance.compact()).not.toThrow();
    });

    it('should raise StorageUnavailableError when VACUUM cannot run', () => {
      store.db.exec('BEGIN');
      try {
        expect(() => store.services.maintenance.compact()).toThrow(StorageUnavailableError);
        expect(() => store.services.maintenance.compact()).toThrow(/^Storage unavailable during compact/);
      } finally {
        store.db.exec('ROLLBACK');
      }
    });
  });

  describe('healthReport', () => {
    it('should flag more than fifty cache rows older than a week', () => {
      for (let i = 0; i < 51; i++) {
        store.models.analysisCacheModel.put(`Subject ${i}`, 'global', {}, 'text');
      }
      vi.setSystemTime(new Date(START.getTime() + 8 * DAY));

      const report = store.services.maintenance.healthReport();

      expect(report.staleCacheEntries).toBe(51);
      expect(report.staleCache).toBe(true);
      expect(report.largeStore).toBe(false);
      expect(report.stats.counts.cache).toBe(51);
    });

    it('should report a clean cache at the threshold', () => {
      for (let i = 0; i < 50; i++) {
        store.models.analysisCacheModel.put(`Subject ${i}`, 'global', {}, 'text');
      }
      vi.setSystemTime(new Date(START.getTime() + 8 * DAY));

      expect(store.services.maintenance.healthReport().staleCache).toBe(false);
    });
  });

  describe('exportSummary', () => {
    it('should snapshot the time, stats and popular subjects', () => {
      seed(store);
      store.models.analysisCacheModel.put('EV Batteries', 'vertical', {}, 'vertical');

      const summary = store.services.maintenance.exportSummary();

      expect(summary.timestamp).toBe('2026-03-01T12:00:00.000Z');
      expect(summary.stats.counts.cache).toBe(3);
      expect(summary.popular).toEqual([
        { subject: 'EV Batteries', count: 2, lastAccess: START.getTime() },
        { subject: 'Solar', count: 1, lastAccess: START.getTime() },
      ]);
      expect(JSON.parse(JSON.stringify(summary))).toEqual(summary);
    });
  });

  describe('backup', () => {
    it('should copy the database to the destination', async () => {
      vi.useRealTimers();
      const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'research-store-backup-'));
      const destination = path.join(dir, 'backup.db');
      const fileStore = initStore({ ...loadConfig({}, { loadDotenv: false }), dbPath: path.join(dir, 'live.db') });
      seed(fileStore);

      try {
        await fileStore.services.maintenance.backup(destination);

        const copy = new Database(destination, { readonly: true });
        const row = copy.prepare('SELECT COUNT(*) AS count FROM interactions').get() as { count: number };
        copy.close();
        expect(row.count).toBe(2);
      } finally {
        await closeStore(fileStore);
        fs.rmSync(dir, { recursive: true, force: true });
      }
    });

    it('should raise StorageUnavailableError when the destination directory is missing', async () => {
      vi.useRealTimers();
      const destination = path.join(os.tmpdir(), 'research-store-missing-dir', 'nested', 'backup.db');

      const attempt = store.services.maintenance.backup(destination);

      await expect(attempt).rejects.toThrow(StorageUnavailableError);
      await expect(attempt).rejects.toThrow(/^Storage unavailable during backup/);
    });
  });
});
