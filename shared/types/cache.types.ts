// --- Analysis cache types ---

/** JSON-representable value accepted as a cache parameter. */
export type ParameterValue =
  | string
  | number
  | boolean
  | null
  | ParameterValue[]
  | { [key: string]: ParameterValue };

/** Unordered parameter set that, with subject and query kind, identifies a cache entry. */
export type QueryParameters = Record<string, ParameterValue>;

/** Text-producing analyses the dashboard caches. Other kinds are allowed. */
export type KnownQueryKind =
  | 'global'
  | 'vertical'
  | 'horizontal'
  | 'metrics'
  | 'top_companies'
  | 'mergers'
  | 'web_insights';

export type QueryKind = KnownQueryKind | (string & {});

export interface CacheEntry {
  id: string;
  subject: string;
  queryKind: string;
  fingerprint: string;
  payload: string;
  createdAt: number;
  /** Null means the entry never expires. */
  expiresAt: number | null;
  source: string;
}

export type CacheLookup =
  | { found: true; payload: string; cachedAt: number; expiresAt: number | null }
  | { found: false };

export interface CacheRequest {
  subject: string;
  queryKind: QueryKind;
  parameters?: QueryParameters;
}

export interface PopularSubject {
  subject: string;
  count: number;
  lastAccess: number;
}

export interface CacheHistoryItem {
  subject: string;
  queryKind: string;
  createdAt: number;
  expiresAt: number | null;
  /** Live entries sharing this subject and query kind. */
  accessCount: number;
}

export interface ComputeResult {
  payload: string;
  cacheHit: boolean;
}
