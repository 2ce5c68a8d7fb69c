// Telegram bot — maps telegraf updates onto the transport-free handlers

import { Markup, Telegraf, type Context } from "telegraf";
import { message } from "telegraf/filters";
import { errorMessage } from "./errors.js";
import type { FaqHandlers } from "./handlers.js";
import { log } from "./log.js";
import { CATEGORY_CALLBACK_PREFIX, ERROR_TEXT, REFRESHING_TEXT, type Reply } from "./replies.js";

export function replyExtra(reply: Reply) {
  return {
    parse_mode: "Markdown" as const,
    reply_markup: reply.keyboard
      ? Markup.inlineKeyboard(
          reply.keyboard.map((row) =>
            row.map((b) => Markup.button.callback(b.text, b.callback_data))
          )
        ).reply_markup
      : undefined,
  };
}

async function send(ctx: Context, replies: Reply | Reply[]): Promise<void> {
  for (const reply of Array.isArray(replies) ? replies : [replies]) {
    await ctx.reply(reply.text, replyExtra(reply));
  }
}

const CATEGORY_ACTION = new RegExp(`^${CATEGORY_CALLBACK_PREFIX}`);

/** `options.telegram.apiRoot` points the bot at a self-hosted Bot API server. */
export function createFaqBot(
  token: string,
  handlers: FaqHandlers,
  options: Partial<Telegraf.Options<Context>> = {}
): Telegraf {
  const bot = new Telegraf(token, options);

  bot.start((ctx) => send(ctx, handlers.start()));
  bot.help((ctx) => send(ctx, handlers.help()));
  bot.command("categories", async (ctx) => send(ctx, await handlers.categories()));
  bot.command("stats", async (ctx) => send(ctx, await handlers.stats()));
  bot.command("refresh", async (ctx) => {
    await ctx.reply(REFRESHING_TEXT);
    await send(ctx, await handlers.refresh());
  });

  bot.action(CATEGORY_ACTION, async (ctx) => {
    await ctx.answerCbQuery();
    const reply = await handlers.category(ctx.match.input);
    await ctx.editMessageText(reply.text, { parse_mode: "Markdown" });
  });

  bot.on(message("text"), async (ctx) => {
    const text = ctx.message.text;
    // unknown commands fall through to here
    if (text.startsWith("/")) return send(ctx, handlers.help());
    const who = ctx.from?.username ?? String(ctx.from?.id ?? "unknown");
    log.info(`question from ${who}: ${text}`);
    await send(ctx, await handlers.question(text));
  });

  bot.catch(async (err, ctx) => {
    log.error(`update ${ctx.update.update_id} failed: ${errorMessage(err)}`);
    try {
      await ctx.reply(ERROR_TEXT);
    } catch (replyErr) {
      log.error(`could not send error reply: ${errorMessage(replyErr)}`);
    }
  });

  return bot;
}
