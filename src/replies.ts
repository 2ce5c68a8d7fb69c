// Chat reply rendering — pure functions, no I/O
// Output is Telegram legacy Markdown; anything taken from the sheet or the
// user is escaped before it is embedded.

import type { KnowledgeEntry, KnowledgeStats, MatchResult } from "./model.js";

export interface KeyboardButton {
  text: string;
  callback_data: string;
}

export interface Reply {
  text: string;
  keyboard?: KeyboardButton[][];
}

export const CATEGORY_CALLBACK_PREFIX = "cat_";
const CALLBACK_DATA_MAX_BYTES = 64;
export const CATEGORY_PREVIEW_LIMIT = 10;
export const MAX_ALTERNATIVES = 3;

export function escapeMarkdown(text: string): string {
  return text.replace(/([_*`[])/g, "\\$1");
}

// --- Category buttons ---

/** `cat_<category>`, cut on a character boundary to Telegram's 64-byte limit. */
export function categoryCallbackData(category: string): string {
  let data = CATEGORY_CALLBACK_PREFIX;
  for (const ch of category) {
    if (Buffer.byteLength(data + ch, "utf8") > CALLBACK_DATA_MAX_BYTES) break;
    data += ch;
  }
  return data;
}

export function categoryKeyboard(categories: readonly string[]): KeyboardButton[][] {
  const rows: KeyboardButton[][] = [];
  for (let i = 0; i < categories.length; i += 2) {
    rows.push(
      categories
        .slice(i, i + 2)
        .map((c) => ({ text: c, callback_data: categoryCallbackData(c) }))
    );
  }
  return rows;
}

// --- Static texts ---

export function welcomeReply(): Reply {
  return {
    text: [
      "👋 *Hi! I answer questions from our team knowledge base.*",
      "",
      "*How to use me:*",
      "• Just type your question and I will look it up.",
      "• Use /categories to see the available topics.",
      "• Use /help for more information.",
      "",
      "*For example:*",
      '• "How many vacation days do I get?"',
      '• "Who do I ask about expense reports?"',
    ].join("\n"),
  };
}

export function helpReply(): Reply {
  return {
    text: [
      "📚 *Available commands:*",
      "",
      "/start - welcome message and instructions",
      "/help - this help message",
      "/categories - list knowledge base categories",
      "/stats - knowledge base statistics",
      "/refresh - reload the knowledge base",
      "",
      "*Asking questions:*",
      "Type your question as a normal message. I find the closest questions in the knowledge base, even with typos or a different word order.",
      "",
      "*Tips:*",
      "• Ask clear, specific questions",
      "• Use the key words of the topic",
      "• Rephrase if the answer is not what you need",
    ].join("\n"),
  };
}

export const UNAVAILABLE_TEXT =
  "Sorry, the knowledge base is unavailable right now. Please try again later.";
export const EMPTY_TEXT =
  "Sorry, the knowledge base is currently empty. Please try again later or contact support.";
export const ERROR_TEXT =
  "Sorry, I ran into an error while handling your request. Please try again later.";
export const REFRESHING_TEXT = "🔄 Refreshing the knowledge base...";

// --- Knowledge base views ---

export function categoriesReply(categories: readonly string[]): Reply {
  if (categories.length === 0) {
    return { text: "No categories are available at the moment." };
  }
  return {
    text: "📋 *Available categories:*\n\nTap a category to see its questions:",
    keyboard: categoryKeyboard(categories),
  };
}

export function categoryQuestionsReply(
  category: string,
  entries: readonly KnowledgeEntry[]
): Reply {
  if (entries.length === 0) {
    return { text: `No questions found in category: ${escapeMarkdown(category)}` };
  }
  const lines = [`📋 *Questions in ${escapeMarkdown(category)}:*`, ""];
  for (const entry of entries.slice(0, CATEGORY_PREVIEW_LIMIT)) {
    lines.push(`• ${escapeMarkdown(entry.question)}`);
  }
  if (entries.length > CATEGORY_PREVIEW_LIMIT) {
    lines.push("", `... and ${entries.length - CATEGORY_PREVIEW_LIMIT} more questions`);
  }
  lines.push("", "Just type your question to get an answer!");
  return { text: lines.join("\n") };
}

export function statsReply(stats: KnowledgeStats): Reply {
  const lines = [
    "📊 *Knowledge base statistics:*",
    "",
    `• Total questions: ${stats.total_questions}`,
    `• Categories: ${stats.categories}`,
    `• Last updated: ${stats.fetched_at}`,
  ];
  if (stats.skipped_rows > 0) lines.push(`• Skipped rows: ${stats.skipped_rows}`);
  if (stats.stale) lines.push("• ⚠️ Showing cached data, the source could not be reached");
  if (stats.category_breakdown.length > 0) {
    lines.push("", "*By category:*");
    for (const { category, count } of stats.category_breakdown) {
      lines.push(`• ${escapeMarkdown(category)}: ${count}`);
    }
  }
  return { text: lines.join("\n") };
}

export function refreshedReply(total: number): Reply {
  return { text: `✅ Knowledge base refreshed: ${total} question(s) loaded.` };
}

export function refreshFailedReply(): Reply {
  return { text: "❌ Failed to refresh the knowledge base. Please try again later." };
}

// --- Answers ---

export function answerReply(best: MatchResult, totalMatches: number): Reply {
  const { entry, score } = best;
  const lines = [
    `🎯 *Here is what I found* (score: ${score}%)`,
    "",
    `*Question:* ${escapeMarkdown(entry.question)}`,
    "",
    `*Answer:* ${escapeMarkdown(entry.answer)}`,
    "",
    `*Category:* ${escapeMarkdown(entry.category)}`,
  ];
  if (totalMatches > 1) lines.push("", `💡 Found ${totalMatches} related answers`);
  return { text: lines.join("\n") };
}

export function alternativesReply(alternatives: readonly MatchResult[]): Reply | null {
  if (alternatives.length === 0) return null;
  const lines = ["🔍 *Other similar questions:*", ""];
  alternatives.slice(0, MAX_ALTERNATIVES).forEach((alt, i) => {
    lines.push(`*${i + 1}.* ${escapeMarkdown(alt.entry.question)}`);
    lines.push(`_Score: ${alt.score}%_`, "");
  });
  lines.push("Ask a more specific question to get exactly the answer you need!");
  return { text: lines.join("\n") };
}

export function noMatchReply(question: string): Reply {
  return {
    text: [
      `🤔 *I could not find a good answer to:* "${escapeMarkdown(question)}"`,
      "",
      "*Try the following:*",
      "• Rephrase the question with other key words",
      "• Use more specific terms",
      "• Check the available topics with /categories",
    ].join("\n"),
  };
}
