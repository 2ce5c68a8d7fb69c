// Knowledge table parsing — raw rows in, frozen entries out
// Also turns CSV text, YAML documents and sheet value grids into raw rows.

import { parse as parseCsvText } from "csv-parse/sync";
import yaml from "js-yaml";
import type { KnowledgeEntry, RawRow } from "./model.js";

export const DEFAULT_CATEGORY = "General";

// --- Column names ---

/** "Last Updated", "last-updated" and "LAST_UPDATED" all become "last_updated". */
export function normalizeColumn(name: string): string {
  return name.trim().toLowerCase().replace(/[\s_-]+/g, "_");
}

function columnLookup(row: RawRow): Map<string, string> {
  const lookup = new Map<string, string>();
  for (const [key, value] of Object.entries(row)) {
    const column = normalizeColumn(key);
    if (!lookup.has(column)) lookup.set(column, value);
  }
  return lookup;
}

// --- Cell coercion ---

export function toPriority(value: string | undefined): number {
  if (value === undefined) return 0;
  const trimmed = value.trim();
  if (!trimmed) return 0;
  const n = Number(trimmed);
  return Number.isFinite(n) ? Math.trunc(n) : 0;
}

export function toDateString(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const s = value.trim();
  if (!s) return undefined;
  if (/^\d{4}-\d{2}-\d{2}/.test(s)) return s.slice(0, 10);
  const ms = Date.parse(s);
  if (Number.isNaN(ms)) return undefined;
  return new Date(ms).toISOString().slice(0, 10);
}

// --- Rows → entries ---

/** Returns null for a malformed row (no question or no answer). */
export function parseRow(row: RawRow): KnowledgeEntry | null {
  const cells = columnLookup(row);
  const question = (cells.get("question") ?? "").trim();
  const answer = (cells.get("answer") ?? "").trim();
  if (!question || !answer) return null;

  const entry: KnowledgeEntry = {
    category: (cells.get("category") ?? "").trim() || DEFAULT_CATEGORY,
    question,
    answer,
    priority: toPriority(cells.get("priority")),
    last_updated: toDateString(cells.get("last_updated") ?? cells.get("updated")),
  };
  return Object.freeze(entry);
}

export interface ParsedRows {
  entries: KnowledgeEntry[];
  skipped: number;
}

export function parseRows(rows: readonly RawRow[]): ParsedRows {
  const entries: KnowledgeEntry[] = [];
  let skipped = 0;
  for (const row of rows) {
    const entry = parseRow(row);
    if (entry) entries.push(entry);
    else skipped++;
  }
  return { entries, skipped };
}

// --- Untyped documents → raw rows ---

function cellText(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (value instanceof Date) return value.toISOString().slice(0, 10);
  return String(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Keep only object-shaped records and stringify their cells. */
export function toRawRows(records: unknown): RawRow[] {
  if (!Array.isArray(records)) return [];
  const rows: RawRow[] = [];
  for (const record of records) {
    if (!isRecord(record)) continue;
    const row: RawRow = {};
    for (const [key, value] of Object.entries(record)) {
      row[key] = cellText(value);
    }
    rows.push(row);
  }
  return rows;
}

/** A value grid whose first row is the header, as the Sheets API returns it. */
export function rowsFromTable(values: readonly (readonly unknown[])[]): RawRow[] {
  if (values.length === 0) return [];
  const header = values[0].map(cellText);
  return values.slice(1).map((cells) => {
    const row: RawRow = {};
    header.forEach((column, i) => {
      if (column) row[column] = cellText(cells[i]);
    });
    return row;
  });
}

export function parseCsv(text: string, delimiter = ","): RawRow[] {
  const records: unknown = parseCsvText(text, {
    columns: true,
    bom: true,
    trim: true,
    skip_empty_lines: true,
    relax_column_count: true,
    delimiter,
  });
  return toRawRows(records);
}

/**
 * Accepts either a top-level list of rows or a mapping with an `entries` list.
 * Uses YAML safe load — no arbitrary type instantiation.
 */
export function parseYaml(text: string): RawRow[] {
  const data = yaml.load(text, { schema: yaml.DEFAULT_SCHEMA });
  if (Array.isArray(data)) return toRawRows(data);
  if (isRecord(data)) return toRawRows(data["entries"]);
  throw new Error("YAML knowledge file must be a list of rows or have an 'entries' list");
}
