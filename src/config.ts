// Environment configuration, validated with zod
// The CLI loads `.env` through dotenv before calling loadConfig().

import { z } from "zod";
import type { LogLevel } from "./log.js";

const blankAsUnset = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const optionalText = z.preprocess(blankAsUnset, z.string().trim().optional());

const EnvSchema = z.object({
  TELEGRAM_BOT_TOKEN: optionalText,
  TELEGRAM_API_ROOT: z.preprocess(blankAsUnset, z.string().trim().url().optional()),
  KNOWLEDGE_SOURCE: z.preprocess(blankAsUnset, z.enum(["file", "sheets"]).optional()),
  CSV_FILE_PATH: z.preprocess(blankAsUnset, z.string().trim().default("knowledge_base.csv")),
  GOOGLE_SHEET_ID: optionalText,
  GOOGLE_SHEET_RANGE: z.preprocess(blankAsUnset, z.string().trim().default("Sheet1")),
  GOOGLE_APPLICATION_CREDENTIALS: optionalText,
  GOOGLE_API_KEY: optionalText,
  MAX_SEARCH_RESULTS: z.preprocess(blankAsUnset, z.coerce.number().int().min(1).default(5)),
  SIMILARITY_THRESHOLD: z.preprocess(blankAsUnset, z.coerce.number().min(0).max(100).default(60)),
  CACHE_DURATION_MINUTES: z.preprocess(blankAsUnset, z.coerce.number().min(0).default(5)),
  FETCH_TIMEOUT_MS: z.preprocess(blankAsUnset, z.coerce.number().int().min(1).default(10_000)),
  KEEP_ALIVE_PORT: z.preprocess(blankAsUnset, z.coerce.number().int().min(0).max(65_535).default(3000)),
  LOG_LEVEL: z.preprocess(blankAsUnset, z.enum(["debug", "info", "warn", "error"]).default("info")),
});

export type SourceConfig =
  | { kind: "file"; path: string }
  | {
      kind: "sheets";
      spreadsheetId: string;
      range: string;
      keyFile?: string;
      apiKey?: string;
    };

export interface BotConfig {
  telegramToken?: string;
  /** Self-hosted Bot API server; the public one when unset. */
  telegramApiRoot?: string;
  source: SourceConfig;
  maxResults: number;
  similarityThreshold: number;
  cacheDurationMinutes: number;
  fetchTimeoutMs: number;
  keepAlivePort: number;
  logLevel: LogLevel;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): BotConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const lines = parsed.error.issues.map(
      (issue) => `  ${issue.path.join(".")}: ${issue.message}`
    );
    throw new Error(`Invalid configuration:\n${lines.join("\n")}`);
  }
  const vars = parsed.data;

  const kind = vars.KNOWLEDGE_SOURCE ?? (vars.GOOGLE_SHEET_ID ? "sheets" : "file");
  let source: SourceConfig;
  if (kind === "sheets") {
    if (!vars.GOOGLE_SHEET_ID) {
      throw new Error(
        "Invalid configuration:\n  GOOGLE_SHEET_ID: required when KNOWLEDGE_SOURCE is 'sheets'"
      );
    }
    source = {
      kind: "sheets",
      spreadsheetId: vars.GOOGLE_SHEET_ID,
      range: vars.GOOGLE_SHEET_RANGE,
      keyFile: vars.GOOGLE_APPLICATION_CREDENTIALS,
      apiKey: vars.GOOGLE_API_KEY,
    };
  } else {
    source = { kind: "file", path: vars.CSV_FILE_PATH };
  }

  return {
    telegramToken: vars.TELEGRAM_BOT_TOKEN,
    telegramApiRoot: vars.TELEGRAM_API_ROOT,
    source,
    maxResults: vars.MAX_SEARCH_RESULTS,
    similarityThreshold: vars.SIMILARITY_THRESHOLD,
    cacheDurationMinutes: vars.CACHE_DURATION_MINUTES,
    fetchTimeoutMs: vars.FETCH_TIMEOUT_MS,
    keepAlivePort: vars.KEEP_ALIVE_PORT,
    logLevel: vars.LOG_LEVEL,
  };
}

export function requireTelegramToken(config: BotConfig): string {
  if (!config.telegramToken) {
    throw new Error("TELEGRAM_BOT_TOKEN environment variable is required to run the bot");
  }
  return config.telegramToken;
}
