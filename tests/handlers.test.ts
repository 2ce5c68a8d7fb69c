import { afterAll, beforeAll, describe, it, expect } from "vitest";
import { createHandlers } from "../src/handlers.js";
import { setLogLevel } from "../src/log.js";
import { QuestionMatcher } from "../src/matcher.js";
import type { RawRow } from "../src/model.js";
import { EMPTY_TEXT, UNAVAILABLE_TEXT } from "../src/replies.js";
import { KnowledgeStore } from "../src/store.js";
import { FakeSource, SAMPLE_ROWS } from "./helpers.js";

const START = 1_000_000;

function setup(rows: RawRow[] = SAMPLE_ROWS, threshold = 90) {
  const source = new FakeSource(rows);
  const store = new KnowledgeStore(source, { now: () => START, retries: 0 });
  const matcher = new QuestionMatcher(store, { threshold });
  return { source, handlers: createHandlers({ store, matcher }) };
}

beforeAll(() => setLogLevel("error"));
afterAll(() => setLogLevel("info"));

describe("question", () => {
  it("answers with the best match", async () => {
    const { handlers } = setup();
    const replies = await handlers.question("how many vacation days do i get?");

    expect(replies).toEqual([
      {
        text: [
          "🎯 *Here is what I found* (score: 100%)",
          "",
          "*Question:* How many vacation days do I get",
          "",
          "*Answer:* 20 working days per year",
          "",
          "*Category:* HR",
        ].join("\n"),
      },
    ]);
  });

  it("adds the other matches as alternatives", async () => {
    const { handlers } = setup(
      [
        { Question: "leave policy", Answer: "a1", Priority: "1" },
        { Question: "policy leave", Answer: "a2" },
        { Question: "leave policies", Answer: "a3" },
      ],
      80
    );
    const replies = await handlers.question("Leave policy");

    expect(replies).toHaveLength(2);
    expect(replies[0].text).toContain("*Answer:* a1");
    expect(replies[0].text).toContain("💡 Found 3 related answers");
    expect(replies[1].text).toBe(
      [
        "🔍 *Other similar questions:*",
        "",
        "*1.* policy leave",
        "_Score: 100%_",
        "",
        "*2.* leave policies",
        "_Score: 85%_",
        "",
        "Ask a more specific question to get exactly the answer you need!",
      ].join("\n")
    );
  });

  it("suggests rephrasing when nothing is close enough", async () => {
    const { handlers } = setup();
    const [reply] = await handlers.question("printer toner");
    expect(reply.text.split("\n")[0]).toBe('🤔 *I could not find a good answer to:* "printer toner"');
  });

  it("reports an empty knowledge base", async () => {
    const { handlers } = setup([{ Question: "no answer" }]);
    expect(await handlers.question("anything")).toEqual([{ text: EMPTY_TEXT }]);
  });

  it("reports an unavailable source", async () => {
    const { source, handlers } = setup();
    source.failure = new Error("offline");
    expect(await handlers.question("leave policy")).toEqual([{ text: UNAVAILABLE_TEXT }]);
  });
});

describe("categories", () => {
  it("offers one button per category", async () => {
    const { handlers } = setup();
    const reply = await handlers.categories();
    expect(reply.keyboard).toEqual([
      [
        { text: "Finance", callback_data: "cat_Finance" },
        { text: "HR", callback_data: "cat_HR" },
      ],
      [{ text: "IT", callback_data: "cat_IT" }],
    ]);
  });

  it("reports an unavailable source", async () => {
    const { source, handlers } = setup();
    source.failure = new Error("offline");
    expect(await handlers.categories()).toEqual({ text: UNAVAILABLE_TEXT });
  });
});

describe("category", () => {
  it("lists the questions of the tapped category", async () => {
    const { handlers } = setup();
    expect((await handlers.category("cat_HR")).text).toBe(
      [
        "📋 *Questions in HR:*",
        "",
        "• How many vacation days do I get",
        "• What is the leave policy",
        "",
        "Just type your question to get an answer!",
      ].join("\n")
    );
  });

  it("resolves categories whose callback data was truncated", async () => {
    const long = "Benefits and compensation for contractors working remotely abroad";
    const { handlers } = setup([{ Category: long, Question: "q", Answer: "a" }]);

    const data = (await handlers.categories()).keyboard?.[0][0].callback_data ?? "";
    expect(data).not.toBe(`cat_${long}`);
    expect((await handlers.category(data)).text.split("\n")[0]).toBe(`📋 *Questions in ${long}:*`);
  });

  it("reports an unknown category", async () => {
    const { handlers } = setup();
    expect((await handlers.category("cat_Legal")).text).toBe("No questions found in category: Legal");
  });
});

describe("stats", () => {
  it("summarizes the knowledge base", async () => {
    const { handlers } = setup();
    expect((await handlers.stats()).text).toBe(
      [
        "📊 *Knowledge base statistics:*",
        "",
        "• Total questions: 4",
        "• Categories: 3",
        "• Last updated: 1970-01-01T00:16:40.000Z",
        "",
        "*By category:*",
        "• HR: 2",
        "• Finance: 1",
        "• IT: 1",
      ].join("\n")
    );
  });
});

describe("refresh", () => {
  it("reloads and reports the question count", async () => {
    const { source, handlers } = setup();
    await handlers.categories();
    const reply = await handlers.refresh();

    expect(reply.text).toBe("✅ Knowledge base refreshed: 4 question(s) loaded.");
    expect(source.calls).toBe(2);
  });

  it("reports a failed reload", async () => {
    const { source, handlers } = setup();
    source.failure = new Error("offline");
    expect((await handlers.refresh()).text).toBe(
      "❌ Failed to refresh the knowledge base. Please try again later."
    );
  });
});

describe("static replies", () => {
  it("welcomes and explains the commands", () => {
    const { handlers } = setup();
    expect(handlers.start().text.split("\n")[0]).toBe(
      "👋 *Hi! I answer questions from our team knowledge base.*"
    );
    expect(handlers.help().text).toContain("/refresh - reload the knowledge base");
  });
});
