import type { KnowledgeEntry, KnowledgeSnapshot, RawRow } from "../src/model.js";
import type { DataSource } from "../src/sources.js";

export function entry(overrides: Partial<KnowledgeEntry> = {}): KnowledgeEntry {
  return {
    category: "General",
    question: "What is the leave policy",
    answer: "See the intranet",
    priority: 0,
    ...overrides,
  };
}

export function snapshotOf(entries: KnowledgeEntry[], fetched_at = 0): KnowledgeSnapshot {
  return { entries, fetched_at, skipped_rows: 0, source: "test" };
}

/** In-memory source: serves `rows`, or throws `failure` when it is set. */
export class FakeSource implements DataSource {
  readonly name = "fake";
  rows: RawRow[];
  failure: Error | null = null;
  calls = 0;
  modifiedAt: number | undefined = undefined;
  lastSignal: AbortSignal | undefined;

  constructor(rows: RawRow[] = []) {
    this.rows = rows;
  }

  async fetchRows(signal?: AbortSignal): Promise<RawRow[]> {
    this.calls++;
    this.lastSignal = signal;
    if (this.failure) throw this.failure;
    return this.rows;
  }

  async lastModified(): Promise<number | undefined> {
    return this.modifiedAt;
  }
}

export const SAMPLE_ROWS: RawRow[] = [
  { Category: "HR", Question: "How many vacation days do I get", Answer: "20 working days per year", Priority: "2" },
  { Category: "HR", Question: "What is the leave policy", Answer: "See the leave policy page", Priority: "1" },
  { Category: "IT", Question: "How do I reset my password", Answer: "Use the self-service portal", Priority: "" },
  { Category: "Finance", Question: "How do I submit an expense report", Answer: "Upload receipts to the expense tool", Priority: "3" },
];
