import Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../utils/logger';
import { BaseModel } from './BaseModel';
import { MalformedInputError, NotFoundError } from '../services/base/ServiceError';
import type { CostRates, HistoryOrder, InteractionRecord } from '../shared/types';

interface InteractionDbRecord {
  id: string;
  document_id: string;
  question: string;
  answer: string;
  query_token_estimate: number;
  response_token_estimate: number;
  cost_estimate: number;
  created_at: number;
}

function mapRecordToInteraction(record: InteractionDbRecord): InteractionRecord {
  return {
    id: record.id,
    documentId: record.document_id,
    question: record.question,
    answer: record.answer,
    queryTokenEstimate: record.query_token_estimate,
    responseTokenEstimate: record.response_token_estimate,
    costEstimate: record.cost_estimate,
    createdAt: record.created_at,
  };
}

/**
 * Cost of one exchange at per-1000-token rates.
 */
export function estimateCost(queryTokens: number, responseTokens: number, rates: CostRates): number {
  return (queryTokens * rates.inputPer1k + responseTokens * rates.outputPer1k) / 1000;
}

/**
 * Append-only question/answer log, each row a child of a document.
 * The cost estimate is fixed at write time and never recomputed.
 */
export class InteractionModel extends BaseModel {
  protected readonly modelName = 'InteractionModel';
  private readonly rates: CostRates;

  constructor(db: Database.Database, rates: CostRates) {
    super(db);
    this.rates = rates;
    logger.info('[InteractionModel] Initialized.');
  }

  /**
   * Records a question asked against a document and returns the new id.
   * @throws NotFoundError when the document does not exist.
   */
  append(
    documentId: string,
    question: string,
    answer: string,
    queryTokens: number,
    responseTokens: number
  ): string {
    if (!(queryTokens >= 0) || !(responseTokens >= 0)) {
      throw new MalformedInputError(`Token estimates must be non-negative, got ${queryTokens}/${responseTokens}`);
    }

    const id = uuidv4();
    const costEstimate = this.costFor(queryTokens, responseTokens);

    try {
      this.transaction(() => {
        const parent = this.db.prepare('SELECT 1 FROM documents WHERE id = ?').get(documentId);
        if (parent === undefined) {
          throw new NotFoundError('Document', documentId);
        }

        this.db.prepare(`
          INSERT INTO interactions (
            id, document_id, question, answer,
            query_token_estimate, response_token_estimate, cost_estimate, created_at
          ) VALUES (
            $id, $documentId, $question, $answer,
            $queryTokens, $responseTokens, $costEstimate, $createdAt
          )
        `).run({
          id,
          documentId,
          question,
          answer,
          queryTokens,
          responseTokens,
          costEstimate,
          createdAt: Date.now(),
        });
      });

      logger.debug('[InteractionModel] Interaction recorded', { id, documentId, costEstimate });
      return id;
    } catch (error) {
      this.handleDbError(error, `append to document ${documentId}`);
    }
  }

  costFor(queryTokens: number, responseTokens: number): number {
    return estimateCost(queryTokens, responseTokens, this.rates);
  }

  /**
   * Interactions for a document. Display wants newest first; replaying a
   * session wants the original order, so callers always say which.
   */
  history(documentId: string, order: HistoryOrder): InteractionRecord[] {
    const direction = order === 'newest-first' ? 'DESC' : 'ASC';
    try {
      const records = this.db.prepare(`
        SELECT * FROM interactions
        WHERE document_id = ?
        ORDER BY created_at ${direction}, rowid ${direction}
      `).all(documentId) as InteractionDbRecord[];
      return records.map(mapRecordToInteraction);
    } catch (error) {
      this.handleDbError(error, `history for document ${documentId}`);
    }
  }

  /**
   * Deletes the interactions of a document whose question matches exactly.
   */
  deleteOne(documentId: string, questionText: string): number {
    try {
      const result = this.db.prepare('DELETE FROM interactions WHERE document_id = ? AND question = ?')
        .run(documentId, questionText);
      logger.info(`[InteractionModel] Deleted ${result.changes} interaction(s) from document ${documentId}.`);
      return result.changes;
    } catch (error) {
      this.handleDbError(error, `deleteOne for document ${documentId}`);
    }
  }

  deleteAll(documentId: string): number {
    try {
      const result = this.db.prepare('DELETE FROM interactions WHERE document_id = ?').run(documentId);
      logger.info(`[InteractionModel] Deleted all ${result.changes} interaction(s) from document ${documentId}.`);
      return result.changes;
    } catch (error) {
      this.handleDbError(error, `deleteAll for document ${documentId}`);
    }
  }

  /**
   * Sum of cost estimates, for one document or the whole store.
   */
  totalCost(documentId?: string): number {
    try {
      const row = (documentId === undefined
        ? this.db.prepare('SELECT COALESCE(SUM(cost_estimate), 0) AS total FROM interactions').get()
        : this.db.prepare('SELECT COALESCE(SUM(cost_estimate), 0) AS total FROM interactions WHERE document_id = ?').get(documentId)
      ) as { total: number };
      return row.total;
    } catch (error) {
      this.handleDbError(error, 'totalCost');
    }
  }

  count(): number {
    try {
      const row = this.db.prepare('SELECT COUNT(*) AS count FROM interactions').get() as { count: number };
      return row.count;
    } catch (error) {
      this.handleDbError(error, 'count');
    }
  }
}
