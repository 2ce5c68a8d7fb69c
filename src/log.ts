// Diagnostics go to stderr so stdout stays clean for the MCP stdio transport
// and for `faq-bot ask` output.

export type LogLevel = "debug" | "info" | "warn" | "error";

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };
const LABEL: Record<LogLevel, string> = {
  debug: "debug",
  info: "info",
  warn: "warning",
  error: "error",
};

let minimum: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  minimum = level;
}

function write(level: LogLevel, message: string): void {
  if (RANK[level] < RANK[minimum]) return;
  process.stderr.write(`[faq-bot] ${LABEL[level]}: ${message}\n`);
}

export const log = {
  debug: (message: string) => write("debug", message),
  info: (message: string) => write("info", message),
  warn: (message: string) => write("warn", message),
  error: (message: string) => write("error", message),
};
