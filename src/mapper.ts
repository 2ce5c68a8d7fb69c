// Knowledge snapshot → MCP resource mapping — pure functions, no I/O

import { categoryBreakdown, entriesInCategory, listCategories } from "./catalog.js";
import type { KnowledgeEntry, KnowledgeSnapshot, MatchResult } from "./model.js";

// --- URI construction ---

export function toSlug(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-|-$/g, "");
}

export function buildIndexUri(slug: string): string {
  return `faq://${slug}/index`;
}

export function buildCategoryUri(slug: string, category: string): string {
  return `faq://${slug}/category/${encodeURIComponent(category)}`;
}

/** Inverse of buildCategoryUri; null when the URI is not a category of `slug`. */
export function parseCategoryUri(slug: string, uri: string): string | null {
  const prefix = `faq://${slug}/category/`;
  if (!uri.startsWith(prefix)) return null;
  try {
    return decodeURIComponent(uri.slice(prefix.length));
  } catch {
    // malformed percent-encoding is simply not one of ours
    return null;
  }
}

// --- MCP Resource shapes ---
// Plain objects matching the MCP resource schema, kept free of SDK types.

export interface McpResourceMeta {
  uri: string;
  name: string;
  title: string;
  description: string;
  mimeType: string;
  annotations: {
    audience: Array<"user" | "assistant">;
    priority: number;
    lastModified?: string;
  };
}

function latestUpdate(entries: readonly KnowledgeEntry[]): string | undefined {
  let latest: string | undefined;
  for (const e of entries) {
    if (e.last_updated && (!latest || e.last_updated > latest)) latest = e.last_updated;
  }
  return latest;
}

export function buildIndexResource(
  snapshot: KnowledgeSnapshot,
  slug: string,
  name: string
): McpResourceMeta {
  const n = snapshot.entries.length;
  return {
    uri: buildIndexUri(slug),
    name: "index",
    title: `FAQ index: ${name}`,
    description:
      `Categories of all ${n} question(s) in '${name}'. ` +
      `Read this first, then open a category or call the search_faq tool.`,
    mimeType: "application/json",
    annotations: {
      audience: ["assistant", "user"],
      priority: 1.0,
    },
  };
}

export function buildCategoryResource(
  snapshot: KnowledgeSnapshot,
  slug: string,
  category: string
): McpResourceMeta {
  const entries = entriesInCategory(snapshot, category);
  const annotations: McpResourceMeta["annotations"] = {
    audience: ["assistant", "user"],
    priority: 0.7,
  };
  const updated = latestUpdate(entries);
  if (updated) annotations.lastModified = `${updated}T00:00:00Z`;

  return {
    uri: buildCategoryUri(slug, category),
    name: toSlug(category) || "category",
    title: category,
    description: `${entries.length} question(s) with answers in category '${category}'.`,
    mimeType: "text/markdown",
    annotations,
  };
}

export function buildResourceList(
  snapshot: KnowledgeSnapshot,
  slug: string,
  name: string
): McpResourceMeta[] {
  return [
    buildIndexResource(snapshot, slug, name),
    ...listCategories(snapshot).map((c) => buildCategoryResource(snapshot, slug, c)),
  ];
}

// --- Serialization ---

export function indexToJson(snapshot: KnowledgeSnapshot, slug: string, name: string): string {
  const payload = {
    name,
    source: snapshot.source,
    fetched_at: new Date(snapshot.fetched_at).toISOString(),
    total_questions: snapshot.entries.length,
    skipped_rows: snapshot.skipped_rows,
    categories: categoryBreakdown(snapshot).map(({ category, count }) => ({
      category,
      count,
      uri: buildCategoryUri(slug, category),
    })),
  };
  return JSON.stringify(payload, null, 2);
}

export function categoryToMarkdown(category: string, entries: readonly KnowledgeEntry[]): string {
  const parts = [`# ${category}`, ""];
  for (const e of entries) {
    parts.push(`## ${e.question}`, "", e.answer, "");
    if (e.last_updated) parts.push(`_Last updated: ${e.last_updated}_`, "");
  }
  return parts.join("\n");
}

export function matchesToJson(query: string, results: readonly MatchResult[]): string {
  const payload = {
    query,
    matches: results.map(({ entry, score }) => {
      const item: Record<string, unknown> = {
        score,
        question: entry.question,
        answer: entry.answer,
        category: entry.category,
        priority: entry.priority,
      };
      if (entry.last_updated) item["last_updated"] = entry.last_updated;
      return item;
    }),
  };
  return JSON.stringify(payload, null, 2);
}
