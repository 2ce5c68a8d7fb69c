#!/usr/bin/env node
// FAQ bot CLI
// Usage: faq-bot [bot|mcp|ask] [question...] [--source file] [--transport stdio|http] [--port 8000]

import { parseArgs } from "node:util";
import * as dotenv from "dotenv";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createFaqBot } from "./bot.js";
import { loadConfig, requireTelegramToken, type BotConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { createHandlers } from "./handlers.js";
import { startKeepAlive } from "./keep-alive.js";
import { log, setLogLevel } from "./log.js";
import { QuestionMatcher } from "./matcher.js";
import { createFaqMcpServer } from "./server.js";
import { fileSource, googleSheetSource, type DataSource } from "./sources.js";
import { KnowledgeStore } from "./store.js";

function printUsage(): void {
  process.stderr.write(
    `Usage: faq-bot [command] [options]

Commands:
  bot                 Run the Telegram bot (default)
  mcp                 Serve the knowledge base over MCP
  ask <question...>   Print the best matches for a question and exit

Options:
  --source <path>     Knowledge file (.csv, .tsv, .yaml); overrides CSV_FILE_PATH
  --transport <type>  MCP transport: stdio (default) or http
  --port <number>     Port for the MCP HTTP transport (default: 8000)
  --help, -h          Show this help

Configuration is read from the environment and from ./.env.
See .env.example for the available variables.
`
  );
}

function createSource(config: BotConfig): DataSource {
  const { source } = config;
  if (source.kind === "sheets") {
    return googleSheetSource({
      spreadsheetId: source.spreadsheetId,
      range: source.range,
      keyFile: source.keyFile,
      apiKey: source.apiKey,
    });
  }
  return fileSource(source.path);
}

async function runBot(config: BotConfig, store: KnowledgeStore, matcher: QuestionMatcher) {
  const token = requireTelegramToken(config);
  if (config.keepAlivePort > 0) {
    await startKeepAlive({ port: config.keepAlivePort, status: () => store.status() });
  }

  const bot = createFaqBot(
    token,
    createHandlers({ store, matcher }),
    config.telegramApiRoot ? { telegram: { apiRoot: config.telegramApiRoot } } : {}
  );
  process.once("SIGINT", () => bot.stop("SIGINT"));
  process.once("SIGTERM", () => bot.stop("SIGTERM"));

  // Warm the cache; a failure here is not fatal, questions retry the fetch.
  try {
    await store.getSnapshot();
  } catch (err) {
    log.warn(errorMessage(err));
  }

  await bot.launch({ dropPendingUpdates: true }, () => {
    log.info("bot is running and polling for updates");
  });
}

async function runMcp(
  store: KnowledgeStore,
  matcher: QuestionMatcher,
  transport: string,
  port: number
) {
  const faqServer = createFaqMcpServer(store, matcher.options);

  if (transport === "http") {
    const { StreamableHTTPServerTransport } = await import(
      "@modelcontextprotocol/sdk/server/streamableHttp.js"
    );
    const http = await import("node:http");

    const sessionTransport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined, // stateless
    });
    await faqServer.server.connect(sessionTransport);

    const httpServer = http.createServer((req, res) => {
      sessionTransport.handleRequest(req, res).catch((err: unknown) => {
        log.error(`MCP request failed: ${errorMessage(err)}`);
        if (!res.headersSent) res.writeHead(500);
        res.end();
      });
    });
    httpServer.listen(port, () => {
      log.info(`MCP HTTP transport listening on http://localhost:${port}/mcp`);
    });
  } else {
    await faqServer.server.connect(new StdioServerTransport());
  }
}

async function runAsk(matcher: QuestionMatcher, question: string): Promise<number> {
  if (!question.trim()) {
    process.stderr.write("Error: ask needs a question\n");
    return 2;
  }
  const results = await matcher.query(question);
  if (results.length === 0) {
    process.stdout.write(`No answer scored ${matcher.options.threshold} or more.\n`);
    return 1;
  }
  for (const { entry, score } of results) {
    process.stdout.write(
      `[${score}] ${entry.category} / ${entry.question}\n    ${entry.answer}\n`
    );
  }
  return 0;
}

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    args: process.argv.slice(2),
    options: {
      source: { type: "string" },
      transport: { type: "string", default: "stdio" },
      port: { type: "string", default: "8000" },
      help: { type: "boolean", default: false, short: "h" },
    },
    allowPositionals: true,
  });

  if (values.help) {
    printUsage();
    process.exit(0);
  }

  dotenv.config();
  const config = loadConfig();
  if (values.source) config.source = { kind: "file", path: values.source };
  setLogLevel(config.logLevel);

  const store = new KnowledgeStore(createSource(config), {
    cacheDurationMinutes: config.cacheDurationMinutes,
    fetchTimeoutMs: config.fetchTimeoutMs,
  });
  const matcher = new QuestionMatcher(store, {
    threshold: config.similarityThreshold,
    maxResults: config.maxResults,
  });

  const [command = "bot", ...rest] = positionals;
  switch (command) {
    case "bot":
      await runBot(config, store, matcher);
      break;
    case "mcp":
      await runMcp(store, matcher, values.transport, parseInt(values.port, 10));
      break;
    case "ask":
      process.exitCode = await runAsk(matcher, rest.join(" "));
      break;
    default:
      process.stderr.write(`Error: unknown command '${command}'\n\n`);
      printUsage();
      process.exit(2);
  }
}

main().catch((err) => {
  process.stderr.write(`Fatal: ${errorMessage(err)}\n`);
  process.exit(1);
});
