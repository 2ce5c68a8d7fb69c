import { afterAll, beforeAll, describe, it, expect } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { setLogLevel } from "../src/log.js";
import { createFaqMcpServer, type FaqServerOptions } from "../src/server.js";
import { KnowledgeStore } from "../src/store.js";
import { FakeSource, SAMPLE_ROWS } from "./helpers.js";

async function connectClient(options: FaqServerOptions = {}, source = new FakeSource(SAMPLE_ROWS)) {
  const store = new KnowledgeStore(source, { now: () => 1_000_000, retries: 0 });
  const { server } = createFaqMcpServer(store, options);

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);

  const client = new Client({ name: "test-client", version: "0.1.0" }, { capabilities: {} });
  await client.connect(clientTransport);

  return client;
}

function textOf(result: { content?: unknown; [key: string]: unknown }): string {
  const content = result.content as Array<{ type: string; text: string }>;
  return content[0].text;
}

beforeAll(() => setLogLevel("error"));
afterAll(() => setLogLevel("info"));

describe("createFaqMcpServer", () => {
  it("derives the URI slug from the display name", () => {
    const store = new KnowledgeStore(new FakeSource());
    expect(createFaqMcpServer(store).slug).toBe("employee-faq");
    expect(createFaqMcpServer(store, { name: "IT Help Desk" }).slug).toBe("it-help-desk");
    expect(createFaqMcpServer(store, { name: "???" }).slug).toBe("faq");
  });
});

describe("resources/list", () => {
  it("returns the index followed by one resource per category", async () => {
    const client = await connectClient();
    const { resources } = await client.listResources();

    expect(resources.map((r) => r.uri)).toEqual([
      "faq://employee-faq/index",
      "faq://employee-faq/category/Finance",
      "faq://employee-faq/category/HR",
      "faq://employee-faq/category/IT",
    ]);
    expect(resources[0].mimeType).toBe("application/json");
    expect(resources[2].mimeType).toBe("text/markdown");
    expect(resources[2].description).toBe("2 question(s) with answers in category 'HR'.");
    await client.close();
  });
});

describe("resources/read", () => {
  it("reads the index as JSON", async () => {
    const client = await connectClient();
    const result = await client.readResource({ uri: "faq://employee-faq/index" });
    expect(result.contents).toHaveLength(1);

    const content = result.contents[0] as { uri: string; mimeType?: string; text?: string };
    expect(content.mimeType).toBe("application/json");
    expect(JSON.parse(content.text ?? "")).toEqual({
      name: "Employee FAQ",
      source: "fake",
      fetched_at: "1970-01-01T00:16:40.000Z",
      total_questions: 4,
      skipped_rows: 0,
      categories: [
        { category: "HR", count: 2, uri: "faq://employee-faq/category/HR" },
        { category: "Finance", count: 1, uri: "faq://employee-faq/category/Finance" },
        { category: "IT", count: 1, uri: "faq://employee-faq/category/IT" },
      ],
    });
    await client.close();
  });

  it("reads a category as markdown, matching its name case-insensitively", async () => {
    const client = await connectClient();
    const result = await client.readResource({ uri: "faq://employee-faq/category/hr" });

    const content = result.contents[0] as { uri: string; mimeType?: string; text?: string };
    expect(content.uri).toBe("faq://employee-faq/category/hr");
    expect(content.mimeType).toBe("text/markdown");
    expect(content.text).toBe(
      [
        "# HR",
        "",
        "## How many vacation days do I get",
        "",
        "20 working days per year",
        "",
        "## What is the leave policy",
        "",
        "See the leave policy page",
        "",
      ].join("\n")
    );
    await client.close();
  });

  it("rejects unknown URIs and categories", async () => {
    const client = await connectClient();
    await expect(client.readResource({ uri: "faq://other/index" })).rejects.toThrow(
      "Unknown resource URI"
    );
    await expect(
      client.readResource({ uri: "faq://employee-faq/category/Legal" })
    ).rejects.toThrow("No category 'Legal'");
    await client.close();
  });
});

describe("tools", () => {
  it("lists the search tool", async () => {
    const client = await connectClient();
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name)).toEqual(["search_faq"]);
    expect(tools[0].inputSchema.required).toEqual(["query"]);
    await client.close();
  });

  it("returns ranked matches as JSON", async () => {
    const client = await connectClient();
    const result = await client.callTool({
      name: "search_faq",
      arguments: { query: "How many vacation days do I get?", limit: 1 },
    });

    expect(result.isError).toBeFalsy();
    expect(JSON.parse(textOf(result))).toEqual({
      query: "How many vacation days do I get?",
      matches: [
        {
          score: 100,
          question: "How many vacation days do I get",
          answer: "20 working days per year",
          category: "HR",
          priority: 2,
        },
      ],
    });
    await client.close();
  });

  it("restricts the search to a category", async () => {
    const client = await connectClient();
    const result = await client.callTool({
      name: "search_faq",
      arguments: { query: "leave policy", category: "IT" },
    });
    expect(JSON.parse(textOf(result)).matches).toEqual([]);
    await client.close();
  });

  it("flags invalid arguments", async () => {
    const client = await connectClient();
    const result = await client.callTool({ name: "search_faq", arguments: { limit: 0 } });
    expect(result.isError).toBe(true);
    expect(textOf(result).startsWith("Invalid arguments:")).toBe(true);
    await client.close();
  });

  it("reports an unavailable source as a tool error", async () => {
    const source = new FakeSource(SAMPLE_ROWS);
    source.failure = new Error("offline");
    const client = await connectClient({}, source);

    const result = await client.callTool({ name: "search_faq", arguments: { query: "leave" } });
    expect(result.isError).toBe(true);
    expect(textOf(result)).toBe("Knowledge source unavailable: fake (offline)");
    await client.close();
  });

  it("rejects unknown tools", async () => {
    const client = await connectClient();
    await expect(client.callTool({ name: "delete_faq", arguments: {} })).rejects.toThrow(
      "Unknown tool: delete_faq"
    );
    await client.close();
  });
});
