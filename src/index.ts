// FAQ bot — public library surface
// Import this to embed the matcher, the knowledge store or the MCP server.

export { KnowledgeStore } from "./store.js";
export { QuestionMatcher, match, matchInCategory, DEFAULT_THRESHOLD, DEFAULT_MAX_RESULTS } from "./matcher.js";
export { normalize, tokenSort, ratio, tokenSortRatio } from "./similarity.js";
export { listCategories, entriesInCategory, categoryBreakdown, summarize } from "./catalog.js";
export { parseRow, parseRows, parseCsv, parseYaml, rowsFromTable } from "./parser.js";
export { fileSource, googleSheetSource } from "./sources.js";
export { DataSourceUnavailable } from "./errors.js";
export { loadConfig } from "./config.js";
export { createHandlers } from "./handlers.js";
export { createFaqBot } from "./bot.js";
export { startKeepAlive, createKeepAliveServer } from "./keep-alive.js";
export { createFaqMcpServer } from "./server.js";
export type {
  KnowledgeEntry,
  KnowledgeSnapshot,
  KnowledgeStats,
  MatchResult,
  RawRow,
  StoreStatus,
} from "./model.js";
export type { KnowledgeStoreOptions } from "./store.js";
export type { MatchOptions, SnapshotProvider } from "./matcher.js";
export type { DataSource, GoogleSheetOptions } from "./sources.js";
export type { BotConfig, SourceConfig } from "./config.js";
export type { FaqHandlers, HandlerDeps } from "./handlers.js";
export type { Reply, KeyboardButton } from "./replies.js";
export type { FaqServerOptions, FaqMcpServer } from "./server.js";
