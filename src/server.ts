// FAQ MCP Server
// Exposes the knowledge base as MCP resources plus a search_faq tool.

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  ReadResourceRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { entriesInCategory, listCategories } from "./catalog.js";
import { DataSourceUnavailable } from "./errors.js";
import { log } from "./log.js";
import {
  buildIndexUri,
  buildResourceList,
  categoryToMarkdown,
  indexToJson,
  matchesToJson,
  parseCategoryUri,
  toSlug,
} from "./mapper.js";
import { match, matchInCategory, type MatchOptions } from "./matcher.js";
import type { KnowledgeStore } from "./store.js";

export interface FaqServerOptions extends MatchOptions {
  /** Display name; its slug becomes the URI authority. */
  name?: string;
}

export interface FaqMcpServer {
  server: Server;
  slug: string;
}

export const SEARCH_TOOL = "search_faq";

const SearchArgs = z.object({
  query: z.string(),
  category: z.string().optional(),
  limit: z.number().int().min(1).max(50).optional(),
});

const SEARCH_INPUT_SCHEMA = {
  type: "object" as const,
  properties: {
    query: { type: "string", description: "The question to look up" },
    category: { type: "string", description: "Only search this category" },
    limit: { type: "integer", minimum: 1, maximum: 50, description: "Maximum matches" },
  },
  required: ["query"],
};

/**
 * Create an MCP Server backed by a knowledge store. Resources and the tool
 * read through the store, so they follow its cache and refresh rules.
 */
export function createFaqMcpServer(
  store: KnowledgeStore,
  options: FaqServerOptions = {}
): FaqMcpServer {
  const name = options.name ?? "Employee FAQ";
  const slug = toSlug(name) || "faq";
  const indexUri = buildIndexUri(slug);

  const server = new Server(
    { name: `faq-${slug}`, version: "0.1.0" },
    {
      capabilities: {
        resources: {},
        tools: {},
      },
    }
  );

  log.info(`MCP server '${name}' over ${store.sourceName}; start with ${indexUri}`);

  // --- resources ---

  server.setRequestHandler(ListResourcesRequestSchema, async () => {
    const snapshot = await store.getSnapshot();
    return { resources: buildResourceList(snapshot, slug, name) };
  });

  server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
    const uri = request.params.uri;
    const snapshot = await store.getSnapshot();

    if (uri === indexUri) {
      return {
        contents: [{ uri, mimeType: "application/json", text: indexToJson(snapshot, slug, name) }],
      };
    }

    const requested = parseCategoryUri(slug, uri);
    if (requested === null) {
      throw new Error(`Unknown resource URI: ${uri}`);
    }
    const category = listCategories(snapshot).find(
      (c) => c.toLowerCase() === requested.toLowerCase()
    );
    if (!category) {
      throw new Error(`No category '${requested}'`);
    }
    return {
      contents: [
        {
          uri,
          mimeType: "text/markdown",
          text: categoryToMarkdown(category, entriesInCategory(snapshot, category)),
        },
      ],
    };
  });

  // --- tools ---

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: [
      {
        name: SEARCH_TOOL,
        description:
          "Find the knowledge base questions closest to a free-text question, " +
          "tolerating typos and word order, and return their answers ranked by similarity.",
        inputSchema: SEARCH_INPUT_SCHEMA,
      },
    ],
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    if (request.params.name !== SEARCH_TOOL) {
      throw new Error(`Unknown tool: ${request.params.name}`);
    }
    const parsed = SearchArgs.safeParse(request.params.arguments ?? {});
    if (!parsed.success) {
      return {
        content: [{ type: "text" as const, text: `Invalid arguments: ${parsed.error.message}` }],
        isError: true,
      };
    }
    const { query, category, limit } = parsed.data;
    const matchOptions: MatchOptions = {
      threshold: options.threshold,
      maxResults: limit ?? options.maxResults,
    };

    try {
      const snapshot = await store.getSnapshot();
      const results = category
        ? matchInCategory(query, snapshot, category, matchOptions)
        : match(query, snapshot, matchOptions);
      return { content: [{ type: "text" as const, text: matchesToJson(query, results) }] };
    } catch (err) {
      if (!(err instanceof DataSourceUnavailable)) throw err;
      return { content: [{ type: "text" as const, text: err.message }], isError: true };
    }
  });

  return { server, slug };
}
