// Question matching — ranks snapshot entries by token-sort similarity

import { entriesInCategory } from "./catalog.js";
import type { KnowledgeEntry, KnowledgeSnapshot, MatchResult } from "./model.js";
import { ratio, tokenSort, tokenSortRatio } from "./similarity.js";

export const DEFAULT_THRESHOLD = 60;
export const DEFAULT_MAX_RESULTS = 5;

export interface MatchOptions {
  threshold?: number;
  maxResults?: number;
}

function rank(
  query: string,
  entries: readonly KnowledgeEntry[],
  options: MatchOptions
): MatchResult[] {
  const { threshold = DEFAULT_THRESHOLD, maxResults = DEFAULT_MAX_RESULTS } = options;
  const sortedQuery = tokenSort(query);
  if (!sortedQuery || entries.length === 0 || maxResults < 1) return [];

  const results: MatchResult[] = [];
  for (const entry of entries) {
    const score = ratio(sortedQuery, tokenSort(entry.question));
    if (score >= threshold) results.push({ entry, score });
  }

  // Array.prototype.sort is stable, so equal score and priority keep table order.
  results.sort((a, b) => b.score - a.score || b.entry.priority - a.entry.priority);
  return results.slice(0, Math.floor(maxResults));
}

/**
 * Score every question in the snapshot against `query` and return the ones at
 * or above the threshold, best first. Never throws; an empty query or snapshot
 * gives an empty list.
 */
export function match(
  query: string,
  snapshot: KnowledgeSnapshot,
  options: MatchOptions = {}
): MatchResult[] {
  return rank(query, snapshot.entries, options);
}

export function matchInCategory(
  query: string,
  snapshot: KnowledgeSnapshot,
  category: string,
  options: MatchOptions = {}
): MatchResult[] {
  return rank(query, entriesInCategory(snapshot, category), options);
}

export interface SnapshotProvider {
  getSnapshot(): Promise<KnowledgeSnapshot>;
}

/** Binds match options to a store so callers only pass the question text. */
export class QuestionMatcher {
  private readonly store: SnapshotProvider;
  readonly options: Required<MatchOptions>;

  constructor(store: SnapshotProvider, options: MatchOptions = {}) {
    this.store = store;
    this.options = {
      threshold: options.threshold ?? DEFAULT_THRESHOLD,
      maxResults: options.maxResults ?? DEFAULT_MAX_RESULTS,
    };
  }

  async query(text: string): Promise<MatchResult[]> {
    return match(text, await this.store.getSnapshot(), this.options);
  }

  async best(text: string): Promise<MatchResult | undefined> {
    const [top] = await this.query(text);
    return top;
  }

  async queryCategory(text: string, category: string): Promise<MatchResult[]> {
    return matchInCategory(text, await this.store.getSnapshot(), category, this.options);
  }

  similarity(a: string, b: string): number {
    return tokenSortRatio(a, b);
  }
}
