import { z } from 'zod';
import type { KnownEventKind } from '../types';

/**
 * Payload shapes for the event kinds the store itself emits.
 * Extra fields are allowed; these document the fields each kind is expected to carry.
 */
export const MarketAnalysisEventSchema = z.object({
  subject: z.string(),
  queryKind: z.string(),
  resultLength: z.number().int().nonnegative(),
}).passthrough();

export const CacheHitEventSchema = z.object({
  subject: z.string(),
  queryKind: z.string(),
}).passthrough();

export const DocumentUploadEventSchema = z.object({
  displayName: z.string(),
  byteSize: z.number().int().nonnegative(),
  pageCount: z.number().int().nonnegative(),
  chunkCount: z.number().int().nonnegative(),
}).passthrough();

export const DocumentQuestionEventSchema = z.object({
  documentId: z.string(),
  questionLength: z.number().int().nonnegative(),
  answerLength: z.number().int().nonnegative(),
}).passthrough();

export const MaSearchEventSchema = z.object({
  subject: z.string(),
  timeframe: z.string(),
  dealsFound: z.number().int().nonnegative(),
}).passthrough();

export const EventPayloadSchemas = {
  market_analysis: MarketAnalysisEventSchema,
  cache_hit: CacheHitEventSchema,
  document_upload: DocumentUploadEventSchema,
  document_question: DocumentQuestionEventSchema,
  ma_search: MaSearchEventSchema,
} satisfies Record<KnownEventKind, z.ZodTypeAny>;

export function isKnownEventKind(kind: string): kind is KnownEventKind {
  return Object.prototype.hasOwnProperty.call(EventPayloadSchemas, kind);
}

export type MarketAnalysisEvent = z.infer<typeof MarketAnalysisEventSchema>;
export type CacheHitEvent = z.infer<typeof CacheHitEventSchema>;
export type DocumentUploadEvent = z.infer<typeof DocumentUploadEventSchema>;
export type DocumentQuestionEvent = z.infer<typeof DocumentQuestionEventSchema>;
export type MaSearchEvent = z.infer<typeof MaSearchEventSchema>;
