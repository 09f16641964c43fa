import { Bot, InputFile } from 'grammy';

import type { TelegramBotLike } from './bot.js';

/** Adapts a grammy `Bot` to the narrow surface the PDF bot uses. */
export function createGrammyBot(token: string): TelegramBotLike {
  const bot = new Bot(token);

  return {
    on: (event, handler) => {
      bot.on(event, (ctx) =>
        handler({
          chat: { id: ctx.message.chat.id, type: ctx.message.chat.type },
          from: ctx.message.from ? { id: ctx.message.from.id } : undefined,
          message: {
            message_id: ctx.message.message_id,
            document: ctx.message.document,
          },
          reply: (text) => ctx.reply(text),
          replyWithDocument: (filePath) => ctx.replyWithDocument(new InputFile(filePath)),
        }),
      );
    },
    catch: (handler) => {
      bot.catch((err) => handler(err.error));
    },
    getFile: (fileId) => bot.api.getFile(fileId),
    start: () => bot.start(),
    stop: () => bot.stop(),
  };
}
