import Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../utils/logger';
import { contentHash } from '../utils/fingerprint';
import { BaseModel, assertPositiveLimit } from './BaseModel';
import { MalformedInputError, NotFoundError } from '../services/base/ServiceError';
import type {
  ChunkRange,
  DocumentDeletionResult,
  DocumentRecord,
  DocumentSessionSummary,
  DocumentStatus,
} from '../shared/types';

// --- Database Record Types (snake_case) ---
interface DocumentDbRecord {
  id: string;
  display_name: string;
  content_hash: string;
  byte_size: number;
  page_count: number;
  chunk_count: number;
  chunk_handles_json: string;
  chunk_ranges_json: string | null;
  processed_at: number;
  status: DocumentStatus;
}

interface DocumentSessionDbRecord {
  id: string;
  display_name: string;
  page_count: number;
  chunk_count: number;
  processed_at: number;
  interaction_count: number;
  last_question_at: number | null;
}

function mapRecordToDocument(record: DocumentDbRecord): DocumentRecord {
  return {
    id: record.id,
    displayName: record.display_name,
    contentHash: record.content_hash,
    byteSize: record.byte_size,
    pageCount: record.page_count,
    chunkCount: record.chunk_count,
    chunkHandles: JSON.parse(record.chunk_handles_json) as string[],
    chunkRanges: record.chunk_ranges_json ? JSON.parse(record.chunk_ranges_json) as ChunkRange[] : null,
    processedAt: record.processed_at,
    status: record.status,
  };
}

/**
 * Derives per-chunk page ranges for a stored document.
 *
 * Records that kept their exact ranges at ingestion return those. Older
 * records fall back to even division: chunk i covers
 * [i * pagesPerChunk + 1, min((i + 1) * pagesPerChunk, pageCount)], with
 * pagesPerChunk = floor(pageCount / chunkCount). The fallback misreports
 * coverage when the original split was uneven.
 */
export function reconstructChunkRanges(
  record: Pick<DocumentRecord, 'pageCount' | 'chunkHandles' | 'chunkRanges'>
): ChunkRange[] {
  if (record.chunkRanges && record.chunkRanges.length === record.chunkHandles.length) {
    return record.chunkRanges.map(range => ({ ...range }));
  }

  const chunkCount = record.chunkHandles.length;
  if (chunkCount === 0) {
    return [];
  }

  // More chunks than pages: one page each, surplus chunks share the last page
  const pagesPerChunk = Math.max(1, Math.floor(record.pageCount / chunkCount));

  return record.chunkHandles.map((handle, i) => ({
    handle,
    startPage: Math.min(i * pagesPerChunk + 1, record.pageCount),
    endPage: Math.min((i + 1) * pagesPerChunk, record.pageCount),
  }));
}

/**
 * Content-addressed record of ingested documents and their external chunk handles.
 * Dedup is the caller's decision: record() never looks for an existing hash.
 */
export class DocumentModel extends BaseModel {
  protected readonly modelName = 'DocumentModel';

  constructor(db: Database.Database) {
    super(db);
    logger.info('[DocumentModel] Initialized.');
  }

  /**
   * Most recently processed record with this content hash, or null.
   */
  findByContent(hash: string): DocumentRecord | null {
    try {
      const record = this.db.prepare(`
        SELECT * FROM documents
        WHERE content_hash = ? AND status = 'processed'
        ORDER BY processed_at DESC, rowid DESC
        LIMIT 1
      `).get(hash) as DocumentDbRecord | undefined;
      return record ? mapRecordToDocument(record) : null;
    } catch (error) {
      this.handleDbError(error, `findByContent ${hash}`);
    }
  }

  /**
   * Inserts a new document record and returns its id.
   * @param chunkRanges Exact page spans per handle, when the pipeline reported them.
   */
  record(
    displayName: string,
    content: Buffer | Uint8Array,
    pageCount: number,
    chunkHandles: string[],
    chunkRanges?: ChunkRange[]
  ): string {
    if (!Number.isInteger(pageCount) || pageCount < 0) {
      throw new MalformedInputError(`Page count must be a non-negative integer, got ${pageCount}`);
    }
    if (chunkRanges && chunkRanges.length !== chunkHandles.length) {
      throw new MalformedInputError(
        `Got ${chunkRanges.length} chunk ranges for ${chunkHandles.length} chunk handles`
      );
    }

    const id = uuidv4();
    const hash = contentHash(content);

    try {
      this.db.prepare(`
        INSERT INTO documents (
          id, display_name, content_hash, byte_size, page_count, chunk_count,
          chunk_handles_json, chunk_ranges_json, processed_at, status
        ) VALUES (
          $id, $displayName, $contentHash, $byteSize, $pageCount, $chunkCount,
          $chunkHandlesJson, $chunkRangesJson, $processedAt, 'processed'
        )
      `).run({
        id,
        displayName,
        contentHash: hash,
        byteSize: content.byteLength,
        pageCount,
        chunkCount: chunkHandles.length,
        chunkHandlesJson: JSON.stringify(chunkHandles),
        chunkRangesJson: chunkRanges ? JSON.stringify(chunkRanges) : null,
        processedAt: Date.now(),
      });

      logger.info('[DocumentModel] Recorded document', { id, displayName, contentHash: hash, chunks: chunkHandles.length });
      return id;
    } catch (error) {
      this.handleDbError(error, `record ${displayName}`);
    }
  }

  getById(id: string): DocumentRecord | null {
    try {
      const record = this.db.prepare('SELECT * FROM documents WHERE id = ?').get(id) as DocumentDbRecord | undefined;
      return record ? mapRecordToDocument(record) : null;
    } catch (error) {
      this.handleDbError(error, `getById ${id}`);
    }
  }

  exists(id: string): boolean {
    try {
      return this.db.prepare('SELECT 1 FROM documents WHERE id = ?').get(id) !== undefined;
    } catch (error) {
      this.handleDbError(error, `exists ${id}`);
    }
  }

  updateStatus(id: string, status: DocumentStatus): void {
    try {
      const result = this.db.prepare('UPDATE documents SET status = ? WHERE id = ?').run(status, id);
      if (result.changes === 0) {
        throw new NotFoundError('Document', id);
      }
      logger.info(`[DocumentModel] Document ${id} status set to ${status}.`);
    } catch (error) {
      this.handleDbError(error, `updateStatus ${id}`);
    }
  }

  /**
   * Processed documents, newest first, with their interaction count and last question time.
   */
  listSessions(limit: number = 15): DocumentSessionSummary[] {
    assertPositiveLimit(limit);
    try {
      const rows = this.db.prepare(`
        SELECT d.id, d.display_name, d.page_count, d.chunk_count, d.processed_at,
               COUNT(i.id) AS interaction_count,
               MAX(i.created_at) AS last_question_at
        FROM documents d
        LEFT JOIN interactions i ON i.document_id = d.id
        WHERE d.status = 'processed'
        GROUP BY d.id
        ORDER BY d.processed_at DESC, d.rowid DESC
        LIMIT ?
      `).all(limit) as DocumentSessionDbRecord[];

      return rows.map(row => ({
        id: row.id,
        displayName: row.display_name,
        pageCount: row.page_count,
        chunkCount: row.chunk_count,
        processedAt: row.processed_at,
        interactionCount: row.interaction_count,
        lastQuestionAt: row.last_question_at,
      }));
    } catch (error) {
      this.handleDbError(error, 'listSessions');
    }
  }

  /**
   * Deletes a document and its interactions in one transaction.
   * Deleting an unknown id is a no-op that reports zero rows.
   */
  deleteDocument(id: string): DocumentDeletionResult {
    try {
      return this.transaction(() => {
        const interactions = this.db.prepare('DELETE FROM interactions WHERE document_id = ?').run(id).changes;
        const documents = this.db.prepare('DELETE FROM documents WHERE id = ?').run(id).changes;
        logger.info(`[DocumentModel] Deleted document ${id}`, { documents, interactions });
        return { documents, interactions };
      });
    } catch (error) {
      this.handleDbError(error, `deleteDocument ${id}`);
    }
  }

  /**
   * Deletes every document and interaction in one transaction.
   */
  deleteAll(): DocumentDeletionResult {
    try {
      return this.transaction(() => {
        const interactions = this.db.prepare('DELETE FROM interactions').run().changes;
        const documents = this.db.prepare('DELETE FROM documents').run().changes;
        return { documents, interactions };
      });
    } catch (error) {
      this.handleDbError(error, 'deleteAll');
    }
  }

  count(): number {
    try {
      const row = this.db.prepare('SELECT COUNT(*) AS count FROM documents').get() as { count: number };
      return row.count;
    } catch (error) {
      this.handleDbError(error, 'count');
    }
  }
}
