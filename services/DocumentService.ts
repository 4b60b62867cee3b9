import { DocumentModel, reconstructChunkRanges } from '../models/DocumentModel';
import { InteractionModel } from '../models/InteractionModel';
import { contentHash } from '../utils/fingerprint';
import { BaseService } from './base/BaseService';
import { MalformedInputError, NotFoundError } from './base/ServiceError';
import { TelemetryService } from './TelemetryService';
import type {
  AnsweringService,
  ChunkRange,
  ChunkingPipeline,
  DocumentSession,
  EventKind,
  EventPayload,
  IngestResult,
  QuestionResult,
  TelemetryContext,
} from '../shared/types';

interface DocumentServiceDeps {
  documentModel: DocumentModel;
  interactionModel: InteractionModel;
  telemetryService: TelemetryService;
}

const TOKENS_PER_WORD = 1.3;

/**
 * Rough token count used for cost estimates: whitespace-separated words times 1.3, rounded.
 */
export function estimateTokens(text: string): number {
  const words = text.split(/\s+/).filter((word) => word.length > 0).length;
  return Math.round(words * TOKENS_PER_WORD);
}

function validateChunks(chunks: ChunkRange[]): void {
  if (chunks.length === 0) {
    throw new MalformedInputError('Chunking pipeline returned no chunks');
  }
  chunks.forEach((chunk, i) => {
    if (!Number.isInteger(chunk.startPage) || !Number.isInteger(chunk.endPage)
      || chunk.startPage < 1 || chunk.endPage < chunk.startPage) {
      throw new MalformedInputError(
        `Chunk ${i} (${chunk.handle}) has invalid page range ${chunk.startPage}-${chunk.endPage}`
      );
    }
  });
}

/**
 * Ingests documents once per distinct content and records questions asked against them.
 */
export class DocumentService extends BaseService<DocumentServiceDeps> {
  constructor(deps: DocumentServiceDeps) {
    super('DocumentService', deps);
    this.logger.info("[DocumentService] Initialized.");
  }

  /**
   * Returns the chunks for `content`, running the chunking pipeline only when
   * no processed document with the same bytes exists.
   */
  async ingest(
    displayName: string,
    content: Buffer,
    pipeline: ChunkingPipeline,
    telemetry?: TelemetryContext
  ): Promise<IngestResult> {
    const hash = contentHash(content);
    const existing = this.deps.documentModel.findByContent(hash);
    if (existing) {
      this.logInfo(`'${displayName}' matches '${existing.displayName}'; reusing ${existing.chunkCount} chunks.`);
      return {
        documentId: existing.id,
        chunks: reconstructChunkRanges(existing),
        reused: true,
      };
    }

    return this.execute('ingest', async () => {
      const chunks = await pipeline(content);
      validateChunks(chunks);

      const pageCount = Math.max(...chunks.map((chunk) => chunk.endPage));
      const documentId = this.deps.documentModel.record(
        displayName,
        content,
        pageCount,
        chunks.map((chunk) => chunk.handle),
        chunks
      );

      this.recordEvent('document_upload', {
        displayName,
        byteSize: content.byteLength,
        pageCount,
        chunkCount: chunks.length,
      }, telemetry);

      return { documentId, chunks: chunks.map((chunk) => ({ ...chunk })), reused: false };
    }, { displayName, contentHash: hash });
  }

  /**
   * Asks the answering service about a document and logs the exchange.
   * @throws NotFoundError when the document does not exist.
   */
  async askQuestion(
    documentId: string,
    question: string,
    answer: AnsweringService,
    telemetry?: TelemetryContext
  ): Promise<QuestionResult> {
    const document = this.deps.documentModel.getById(documentId);
    if (!document) {
      throw new NotFoundError('Document', documentId);
    }

    return this.execute('askQuestion', async () => {
      const response = await answer(question, reconstructChunkRanges(document));
      const queryTokens = estimateTokens(question);
      const responseTokens = estimateTokens(response);

      const interactionId = this.deps.interactionModel.append(
        documentId,
        question,
        response,
        queryTokens,
        responseTokens
      );

      this.recordEvent('document_question', {
        documentId,
        questionLength: question.length,
        answerLength: response.length,
      }, telemetry);

      return {
        interactionId,
        answer: response,
        costEstimate: this.deps.interactionModel.costFor(queryTokens, responseTokens),
      };
    }, { documentId });
  }

  /**
   * The document and its interactions in the order they were asked, or null.
   */
  restoreSession(documentId: string): DocumentSession | null {
    const document = this.deps.documentModel.getById(documentId);
    if (!document) {
      return null;
    }
    return {
      document,
      interactions: this.deps.interactionModel.history(documentId, 'oldest-first'),
    };
  }

  private recordEvent(kind: EventKind, payload: EventPayload, context?: TelemetryContext): void {
    this.deps.telemetryService.log(kind, payload, context);
  }
}
