// --- Document dedup and interaction types ---

export type DocumentStatus = 'processed' | 'archived' | 'failed';

/** Page span covered by one externally stored chunk, 1-based and inclusive. */
export interface ChunkRange {
  handle: string;
  startPage: number;
  endPage: number;
}

export interface DocumentRecord {
  id: string;
  displayName: string;
  contentHash: string;
  byteSize: number;
  pageCount: number;
  chunkCount: number;
  chunkHandles: string[];
  /** Exact ranges captured at ingestion; null for records that predate them. */
  chunkRanges: ChunkRange[] | null;
  processedAt: number;
  status: DocumentStatus;
}

export interface DocumentSessionSummary {
  id: string;
  displayName: string;
  pageCount: number;
  chunkCount: number;
  processedAt: number;
  interactionCount: number;
  lastQuestionAt: number | null;
}

export interface DocumentDeletionResult {
  documents: number;
  interactions: number;
}

export interface InteractionRecord {
  id: string;
  documentId: string;
  question: string;
  answer: string;
  queryTokenEstimate: number;
  responseTokenEstimate: number;
  costEstimate: number;
  createdAt: number;
}

export type HistoryOrder = 'newest-first' | 'oldest-first';

/** Per-1000-token prices used to derive an interaction's cost estimate. */
export interface CostRates {
  inputPer1k: number;
  outputPer1k: number;
}

/** One chunk as returned by the external chunking/upload pipeline. */
export type ChunkUpload = ChunkRange;

export type ChunkingPipeline = (content: Buffer) => Promise<ChunkUpload[]>;

export interface IngestResult {
  documentId: string;
  chunks: ChunkRange[];
  reused: boolean;
}

export interface DocumentSession {
  document: DocumentRecord;
  interactions: InteractionRecord[];
}

/** Answers a question from the document's stored chunks. */
export type AnsweringService = (question: string, chunks: ChunkRange[]) => Promise<string>;

export interface QuestionResult {
  interactionId: string;
  answer: string;
  costEstimate: number;
}
