// Chat command handlers — transport-free, each returns the replies to send
// bot.ts maps Telegram updates onto these.

import { entriesInCategory, listCategories } from "./catalog.js";
import { DataSourceUnavailable } from "./errors.js";
import { log } from "./log.js";
import { match, type QuestionMatcher } from "./matcher.js";
import type { KnowledgeSnapshot } from "./model.js";
import {
  alternativesReply,
  answerReply,
  categoriesReply,
  categoryCallbackData,
  categoryQuestionsReply,
  CATEGORY_CALLBACK_PREFIX,
  EMPTY_TEXT,
  helpReply,
  noMatchReply,
  refreshedReply,
  refreshFailedReply,
  statsReply,
  UNAVAILABLE_TEXT,
  welcomeReply,
  type Reply,
} from "./replies.js";
import type { KnowledgeStore } from "./store.js";

export interface HandlerDeps {
  store: KnowledgeStore;
  matcher: QuestionMatcher;
}

export interface FaqHandlers {
  start(): Reply;
  help(): Reply;
  categories(): Promise<Reply>;
  /** `data` is the button's callback data, `cat_<category>`. */
  category(data: string): Promise<Reply>;
  stats(): Promise<Reply>;
  refresh(): Promise<Reply>;
  question(text: string): Promise<Reply[]>;
}

// DataSourceUnavailable becomes a user-facing reply; anything else propagates.
async function orUnavailable(produce: () => Promise<Reply>): Promise<Reply> {
  try {
    return await produce();
  } catch (err) {
    if (err instanceof DataSourceUnavailable) {
      log.warn(err.message);
      return { text: UNAVAILABLE_TEXT };
    }
    throw err;
  }
}

export function createHandlers({ store, matcher }: HandlerDeps): FaqHandlers {
  return {
    start: welcomeReply,
    help: helpReply,

    categories: () =>
      orUnavailable(async () => categoriesReply(listCategories(await store.getSnapshot()))),

    category: (data) =>
      orUnavailable(async () => {
        const snapshot = await store.getSnapshot();
        const category =
          listCategories(snapshot).find((c) => categoryCallbackData(c) === data) ??
          data.slice(CATEGORY_CALLBACK_PREFIX.length);
        return categoryQuestionsReply(category, entriesInCategory(snapshot, category));
      }),

    stats: () => orUnavailable(async () => statsReply(await store.stats())),

    async refresh() {
      try {
        const snapshot = await store.refresh();
        return refreshedReply(snapshot.entries.length);
      } catch (err) {
        if (!(err instanceof DataSourceUnavailable)) throw err;
        log.warn(`refresh failed: ${err.message}`);
        return refreshFailedReply();
      }
    },

    async question(text) {
      let snapshot: KnowledgeSnapshot;
      try {
        snapshot = await store.getSnapshot();
      } catch (err) {
        if (!(err instanceof DataSourceUnavailable)) throw err;
        log.warn(err.message);
        return [{ text: UNAVAILABLE_TEXT }];
      }
      if (snapshot.entries.length === 0) return [{ text: EMPTY_TEXT }];

      const matches = match(text, snapshot, matcher.options);
      log.info(`${matches.length} match(es) for "${text}"`);
      if (matches.length === 0) return [noMatchReply(text)];

      const [best, ...rest] = matches;
      const replies = [answerReply(best, matches.length)];
      const alternatives = alternativesReply(rest);
      if (alternatives) replies.push(alternatives);
      return replies;
    },
  };
}
