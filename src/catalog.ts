// Category queries over a snapshot — pure functions, no I/O

import type { CategoryCount, KnowledgeEntry, KnowledgeSnapshot } from "./model.js";

export function listCategories(snapshot: KnowledgeSnapshot): string[] {
  const seen = new Set<string>();
  for (const entry of snapshot.entries) {
    if (entry.category) seen.add(entry.category);
  }
  return [...seen].sort();
}

export function entriesInCategory(
  snapshot: KnowledgeSnapshot,
  category: string
): KnowledgeEntry[] {
  const wanted = category.trim().toLowerCase();
  return snapshot.entries.filter((e) => e.category.toLowerCase() === wanted);
}

export function categoryBreakdown(snapshot: KnowledgeSnapshot): CategoryCount[] {
  const counts = new Map<string, number>();
  for (const entry of snapshot.entries) {
    counts.set(entry.category, (counts.get(entry.category) ?? 0) + 1);
  }
  return [...counts]
    .map(([category, count]) => ({ category, count }))
    .sort((a, b) =>
      b.count - a.count || (a.category < b.category ? -1 : a.category > b.category ? 1 : 0)
    );
}

export interface SnapshotSummary {
  total_questions: number;
  categories: number;
  category_breakdown: CategoryCount[];
  skipped_rows: number;
  fetched_at: string;
  source: string;
}

export function summarize(snapshot: KnowledgeSnapshot): SnapshotSummary {
  const breakdown = categoryBreakdown(snapshot);
  return {
    total_questions: snapshot.entries.length,
    categories: breakdown.length,
    category_breakdown: breakdown,
    skipped_rows: snapshot.skipped_rows,
    fetched_at: new Date(snapshot.fetched_at).toISOString(),
    source: snapshot.source,
  };
}
