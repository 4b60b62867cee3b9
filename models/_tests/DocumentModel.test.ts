import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, vi } from 'vitest';
import Database from 'better-sqlite3';
import { DocumentModel, reconstructChunkRanges } from '../DocumentModel';
import { InteractionModel } from '../InteractionModel';
import { MalformedInputError, NotFoundError } from '../../services/base/ServiceError';
import { DEFAULT_COST_RATES } from '../../utils/config';
import { contentHash } from '../../utils/fingerprint';
import { setupTestDb, cleanTestDb } from './testUtils';

const START = new Date('2026-03-01T12:00:00.000Z');

describe('reconstructChunkRanges', () => {
  it('should split evenly divisible pages into contiguous ranges covering 1..P', () => {
    const ranges = reconstructChunkRanges({
      pageCount: 12,
      chunkHandles: ['a', 'b', 'c'],
      chunkRanges: null,
    });

    expect(ranges).toEqual([
      { handle: 'a', startPage: 1, endPage: 4 },
      { handle: 'b', startPage: 5, endPage: 8 },
      { handle: 'c', startPage: 9, endPage: 12 },
    ]);
  });

  it('should floor pages per chunk when the split is uneven', () => {
    const ranges = reconstructChunkRanges({
      pageCount: 10,
      chunkHandles: ['a', 'b', 'c'],
      chunkRanges: null,
    });

    expect(ranges).toEqual([
      { handle: 'a', startPage: 1, endPage: 3 },
      { handle: 'b', startPage: 4, endPage: 6 },
      { handle: 'c', startPage: 7, endPage: 9 },
    ]);
  });

  it('should give surplus chunks the last page when chunks outnumber pages', () => {
    const ranges = reconstructChunkRanges({
      pageCount: 2,
      chunkHandles: ['a', 'b', 'c'],
      chunkRanges: null,
    });

    expect(ranges).toEqual([
      { handle: 'a', startPage: 1, endPage: 1 },
      { handle: 'b', startPage: 2, endPage: 2 },
      { handle: 'c', startPage: 2, endPage: 2 },
    ]);
  });

  it('should return an empty list for zero chunks', () => {
    expect(reconstructChunkRanges({ pageCount: 5, chunkHandles: [], chunkRanges: null })).toEqual([]);
  });

  it('should prefer exact ranges stored at ingestion', () => {
    const exact = [
      { handle: 'a', startPage: 1, endPage: 7 },
      { handle: 'b', startPage: 8, endPage: 10 },
    ];

    expect(reconstructChunkRanges({ pageCount: 10, chunkHandles: ['a', 'b'], chunkRanges: exact })).toEqual(exact);
  });
});

describe('DocumentModel', () => {
  let db: Database.Database;
  let model: DocumentModel;
  let interactions: InteractionModel;
  const bytes = Buffer.from('%PDF-1.4 quarterly market report');

  beforeAll(() => {
    db = setupTestDb();
  });

  afterAll(() => {
    db.close();
  });

  beforeEach(() => {
    cleanTestDb(db);
    model = new DocumentModel(db);
    interactions = new InteractionModel(db, DEFAULT_COST_RATES);
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(START);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('record / findByContent', () => {
    it('should find identical bytes recorded under another name', () => {
      const id = model.record('report.pdf', bytes, 12, ['file-1', 'file-2', 'file-3']);

      const found = model.findByContent(contentHash(Buffer.from('%PDF-1.4 quarterly market report')));

      expect(found).not.toBeNull();
      expect(found?.id).toBe(id);
      expect(found?.displayName).toBe('report.pdf');
      expect(found?.pageCount).toBe(12);
      expect(found?.chunkCount).toBe(3);
      expect(found?.chunkHandles).toEqual(['file-1', 'file-2', 'file-3']);
      expect(found?.chunkRanges).toBeNull();
      expect(found?.byteSize).toBe(bytes.byteLength);
      expect(found?.status).toBe('processed');
    });

    it('should return null for unknown content', () => {
      expect(model.findByContent(contentHash(Buffer.from('other')))).toBeNull();
    });

    it('should return the most recently processed record when the hash repeats', () => {
      model.record('first.pdf', bytes, 5, ['a']);
      vi.setSystemTime(new Date(START.getTime() + 1000));
      const second = model.record('second.pdf', bytes, 5, ['b']);

      expect(model.findByContent(contentHash(bytes))?.id).toBe(second);
    });

    it('should skip records that are not processed', () => {
      const id = model.record('report.pdf', bytes, 5, ['a']);
      model.updateStatus(id, 'archived');

      expect(model.findByContent(contentHash(bytes))).toBeNull();
    });

    it('should store exact chunk ranges', () => {
      const ranges = [
        { handle: 'a', startPage: 1, endPage: 7 },
        { handle: 'b', startPage: 8, endPage: 10 },
      ];
      const id = model.record('report.pdf', bytes, 10, ['a', 'b'], ranges);

      expect(model.getById(id)?.chunkRanges).toEqual(ranges);
    });

    it('should reject ranges that do not match the handles', () => {
      expect(() => model.record('report.pdf', bytes, 10, ['a', 'b'], [{ handle: 'a', startPage: 1, endPage: 10 }]))
        .toThrow(MalformedInputError);
    });

    it('should reject a negative page count', () => {
      expect(() => model.record('report.pdf', bytes, -1, ['a'])).toThrow(MalformedInputError);
    });
  });

  describe('updateStatus', () => {
    it('should throw NotFoundError for a missing document', () => {
      expect(() => model.updateStatus('missing', 'failed')).toThrow(NotFoundError);
    });
  });

  describe('listSessions', () => {
    it('should list processed documents newest first with interaction stats', () => {
      const older = model.record('older.pdf', Buffer.from('one'), 3, ['a']);
      vi.setSystemTime(new Date(START.getTime() + 1000));
      const newer = model.record('newer.pdf', Buffer.from('two'), 4, ['b', 'c']);
      vi.setSystemTime(new Date(START.getTime() + 2000));
      interactions.append(older, 'Q1', 'A1', 1, 1);
      vi.setSystemTime(new Date(START.getTime() + 3000));
      interactions.append(older, 'Q2', 'A2', 1, 1);

      const sessions = model.listSessions(10);

      expect(sessions).toEqual([
        { id: newer, displayName: 'newer.pdf', pageCount: 4, chunkCount: 2, processedAt: START.getTime() + 1000, interactionCount: 0, lastQuestionAt: null },
        { id: older, displayName: 'older.pdf', pageCount: 3, chunkCount: 1, processedAt: START.getTime(), interactionCount: 2, lastQuestionAt: START.getTime() + 3000 },
      ]);
    });
  });

  describe('deleteDocument', () => {
    it('should cascade to the document interactions', () => {
      const id = model.record('report.pdf', bytes, 5, ['a']);
      const other = model.record('other.pdf', Buffer.from('other'), 5, ['b']);
      interactions.append(id, 'Q1', 'A1', 1, 1);
      interactions.append(id, 'Q2', 'A2', 1, 1);
      interactions.append(other, 'Q3', 'A3', 1, 1);

      const result = model.deleteDocument(id);

      expect(result).toEqual({ documents: 1, interactions: 2 });
      expect(interactions.history(id, 'newest-first')).toEqual([]);
      expect(interactions.history(other, 'newest-first')).toHaveLength(1);
      expect(model.exists(id)).toBe(false);
    });

    it('should report zero rows for an unknown id', () => {
      expect(model.deleteDocument('missing')).toEqual({ documents: 0, interactions: 0 });
    });
  });

  describe('deleteAll', () => {
    it('should remove every document and interaction', () => {
      const id = model.record('report.pdf', bytes, 5, ['a']);
      interactions.append(id, 'Q1', 'A1', 1, 1);

      expect(model.deleteAll()).toEqual({ documents: 1, interactions: 1 });
      expect(model.count()).toBe(0);
      expect(interactions.count()).toBe(0);
    });
  });
});
