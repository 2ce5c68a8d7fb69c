// Data sources — where the knowledge table comes from
// The store only sees `fetchRows()`; files and Google Sheets are interchangeable.

import { readFile, stat } from "node:fs/promises";
import { basename, extname, resolve } from "node:path";
import { google } from "googleapis";
import type { RawRow } from "./model.js";
import { parseCsv, parseYaml, rowsFromTable } from "./parser.js";

export interface DataSource {
  /** Shown in logs, stats and error messages. */
  readonly name: string;
  fetchRows(signal?: AbortSignal): Promise<RawRow[]>;
  /** Epoch ms of the last change, when the source can tell. */
  lastModified?(): Promise<number | undefined>;
}

// --- Local files ---

type FileFormat = "csv" | "tsv" | "yaml";

const EXT_TO_FORMAT: Record<string, FileFormat> = {
  ".csv": "csv",
  ".txt": "csv",
  ".tsv": "tsv",
  ".yaml": "yaml",
  ".yml": "yaml",
};

export function fileSource(filePath: string): DataSource {
  const resolved = resolve(filePath);
  const format = EXT_TO_FORMAT[extname(resolved).toLowerCase()];
  if (!format) {
    throw new Error(
      `Unsupported knowledge file type: ${basename(resolved)} (expected .csv, .tsv, .txt, .yaml or .yml)`
    );
  }

  return {
    name: basename(resolved),
    async fetchRows(signal) {
      const text = await readFile(resolved, { encoding: "utf-8", signal });
      if (format === "yaml") return parseYaml(text);
      return parseCsv(text, format === "tsv" ? "\t" : ",");
    },
    async lastModified() {
      try {
        return (await stat(resolved)).mtimeMs;
      } catch {
        // a missing file surfaces from fetchRows instead
        return undefined;
      }
    },
  };
}

// --- Google Sheets ---

export interface GoogleSheetOptions {
  spreadsheetId: string;
  range?: string;
  /** Service-account key file; read-only spreadsheet scope is requested. */
  keyFile?: string;
  /** API key, enough for sheets shared publicly. */
  apiKey?: string;
}

const SHEETS_SCOPE = "https://www.googleapis.com/auth/spreadsheets.readonly";

export function googleSheetSource(options: GoogleSheetOptions): DataSource {
  const { spreadsheetId, range = "Sheet1", keyFile, apiKey } = options;
  const auth =
    apiKey ?? new google.auth.GoogleAuth({ keyFile, scopes: [SHEETS_SCOPE] });
  const sheets = google.sheets({ version: "v4", auth });

  return {
    name: `sheet ${spreadsheetId} (${range})`,
    async fetchRows(signal) {
      const res = await sheets.spreadsheets.values.get(
        { spreadsheetId, range },
        { signal }
      );
      const values: unknown[][] = res.data.values ?? [];
      return rowsFromTable(values);
    },
  };
}
