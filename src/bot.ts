import { Telegraf } from "telegraf";
import { message } from "telegraf/filters";
import type { CommandDispatcher } from "./dispatcher.js";
import type { Logger } from "./logging.js";
import type { Reply } from "./types.js";

interface InputBuffer {
  source: Buffer;
  filename: string;
}

/** The part of a Telegraf context replies go through. */
export interface ReplyTarget {
  reply(text: string, extra?: { parse_mode: "Markdown" }): Promise<unknown>;
  replyWithDocument(document: InputBuffer, extra: { caption: string }): Promise<unknown>;
  replyWithPhoto(photo: InputBuffer, extra: { caption: string }): Promise<unknown>;
}

/** Sends replies one after another, in order. */
export async function sendReplies(ctx: ReplyTarget, replies: Reply[]): Promise<void> {
  for (const reply of replies) {
    switch (reply.kind) {
      case "document":
        await ctx.replyWithDocument(
          { source: Buffer.from(reply.content, "utf8"), filename: reply.filename },
          { caption: reply.caption },
        );
        break;
      case "photo":
        await ctx.replyWithPhoto({ source: reply.content, filename: reply.filename }, { caption: reply.caption });
        break;
      case "text":
        if (reply.markdown) {
          await ctx.reply(reply.text, { parse_mode: "Markdown" });
        } else {
          await ctx.reply(reply.text);
        }
    }
  }
}

export function createBot(token: string, dispatcher: CommandDispatcher, logger: Logger): Telegraf {
  const bot = new Telegraf(token);

  const onText = async (ctx: ReplyTarget, text: string) => {
    await sendReplies(ctx, await dispatcher.handle(text));
  };

  bot.start((ctx) => onText(ctx, ctx.message.text));
  bot.help((ctx) => onText(ctx, ctx.message.text));
  bot.command(["models", "forecast"], (ctx) => onText(ctx, ctx.message.text));

  bot.on(message("location"), (ctx) => {
    const { latitude, longitude } = ctx.message.location;
    return sendReplies(ctx, dispatcher.handleLocation(latitude, longitude));
  });

  bot.on(message("text"), (ctx) => onText(ctx, ctx.message.text));

  bot.catch((error, ctx) => {
    logger.error(`Failed to handle update ${ctx.update.update_id}`, error);
  });

  return bot;
}
