// FAQ knowledge model — the shapes shared by sources, store, matcher and bot

/** A row exactly as a data source produced it: column header → cell text. */
export type RawRow = Record<string, string>;

export interface KnowledgeEntry {
  readonly category: string;      // "General" when the sheet leaves it blank
  readonly question: string;
  readonly answer: string;
  readonly priority: number;      // integer, higher wins score ties
  readonly last_updated?: string; // ISO 8601 date string "YYYY-MM-DD"
}

export interface KnowledgeSnapshot {
  readonly entries: readonly KnowledgeEntry[];
  readonly fetched_at: number;    // epoch milliseconds
  readonly skipped_rows: number;  // rows without a question or answer
  readonly source: string;
}

export interface MatchResult {
  entry: KnowledgeEntry;
  score: number;                  // 0..100
}

export interface CategoryCount {
  category: string;
  count: number;
}

export interface KnowledgeStats {
  total_questions: number;
  categories: number;
  category_breakdown: CategoryCount[];
  skipped_rows: number;
  fetched_at: string;             // ISO 8601 timestamp
  source: string;
  stale: boolean;
  last_error?: string;
}

export interface StoreStatus {
  loaded: boolean;
  stale: boolean;
  fetched_at?: string;
  entries?: number;
  last_error?: string;
}
