// --- Merger/acquisition search history types ---

export interface SearchRecord {
  id: string;
  subject: string;
  timeframe: string;
  payload: string | null;
  dealsFound: number;
  createdAt: number;
}

/** Produces the merger/acquisition table text for a subject and timeframe. */
export type MergerLookup = (subject: string, timeframe: string) => Promise<string>;

export interface SearchResult {
  searchId: string;
  payload: string;
  dealsFound: number;
}
