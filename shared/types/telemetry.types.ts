// --- Usage telemetry types ---

export type KnownEventKind =
  | 'market_analysis'
  | 'cache_hit'
  | 'document_upload'
  | 'document_question'
  | 'ma_search';

export type EventKind = KnownEventKind | (string & {});

/** Structured event data; stored as a JSON blob whose shape is not enforced. */
export type EventPayload = Record<string, unknown>;

export interface TelemetryEvent {
  id: string;
  eventKind: string;
  eventPayload: EventPayload | null;
  sessionToken: string | null;
  userAgent: string | null;
  createdAt: number;
}

export interface TelemetryContext {
  sessionToken?: string;
  userAgent?: string;
}

export interface DailyEventCount {
  /** UTC calendar day, YYYY-MM-DD. */
  day: string;
  count: number;
}

export interface EventKindCount {
  eventKind: string;
  count: number;
}
