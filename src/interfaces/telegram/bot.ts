import path from 'node:path';

import { RULES_FILE } from '../../runtime/botConfig.js';
import {
  ConfigurationUnavailableError,
  DownloadFailedError,
  PageSelectionFailedError,
  describeError,
} from '../../runtime/errors.js';
import type { SubstitutionEngine } from '../../pdf/substitution.js';
import { appendJsonl, type EventLogRecord } from '../../utils/logging.js';
import { createRuntimeLogger, serializeError } from '../../utils/runtimeLogger.js';
import { createDocumentFetcher, type DocumentFetcher } from './documentFetcher.js';
import { createGrammyBot } from './grammyBot.js';
import type { AuthorizationPredicate } from './policy.js';

type TelegramDocument = {
  file_id: string;
  file_unique_id?: string;
  file_name?: string;
  mime_type?: string;
  file_size?: number;
};

export type TelegramContext = {
  chat: { id: number; type: string };
  from?: { id?: number | string };
  message: {
    message_id: number;
    document?: TelegramDocument;
  };
  reply: (text: string) => Promise<unknown>;
  replyWithDocument: (filePath: string) => Promise<unknown>;
};

export type TelegramBotLike = {
  on: (event: 'message', handler: (ctx: TelegramContext) => Promise<void>) => void;
  catch: (handler: (err: unknown) => Promise<void> | void) => void;
  getFile: (fileId: string) => Promise<{ file_path?: string }>;
  start: () => Promise<void>;
  stop: () => Promise<void>;
};

type PdfBotDeps = {
  appendJsonl: typeof appendJsonl;
  createBot: (token: string) => TelegramBotLike;
};

export type PdfBotOptions = {
  token: string;
  authorize: AuthorizationPredicate;
  engine: SubstitutionEngine;
  fetcher?: DocumentFetcher;
  /** Where `events.jsonl` and `runtime.jsonl` go; null disables the files. */
  logDir?: string | null;
  bot?: TelegramBotLike;
  now?: () => Date;
  deps?: Partial<PdfBotDeps>;
};

export type PdfBot = {
  bot: TelegramBotLike;
  /** Long-polls until `stop()` is called or `signal` aborts. */
  start: (signal?: AbortSignal) => Promise<void>;
  stop: () => Promise<void>;
};

export const PDF_SUFFIX = '.pdf';

export function isPdfDocument(document: TelegramDocument | undefined): document is TelegramDocument & {
  file_name: string;
} {
  return typeof document?.file_name === 'string' && document.file_name.endsWith(PDF_SUFFIX);
}

export function buildFailureReply(fileName: string, err: unknown): string {
  if (err instanceof DownloadFailedError) {
    return `Could not download ${fileName} from Telegram. Please try again.`;
  }
  if (err instanceof PageSelectionFailedError) {
    return `${fileName} has no pages to process.`;
  }
  if (err instanceof ConfigurationUnavailableError) {
    return `Could not read the replacement rules. Check ${path.basename(err.path) || RULES_FILE}.`;
  }

  const normalized = describeError(err).trim();
  if (!normalized) {
    return `Could not process ${fileName}.`;
  }
  const clipped = normalized.length > 280 ? `${normalized.slice(0, 277)}...` : normalized;
  return `Could not process ${fileName}: ${clipped}`;
}

/**
 * Wires one Telegram bot: every message goes through `authorize`, and authorized PDF
 * documents are fetched, rewritten and sent back to the chat they came from.
 */
export function createPdfBot(options: PdfBotOptions): PdfBot {
  const { token, authorize, engine, logDir = null, now = () => new Date(), deps = {} } = options;

  if (!token) {
    throw new Error('Missing Telegram bot token');
  }

  const { appendJsonl: appendJsonlImpl, createBot } = {
    appendJsonl,
    createBot: createGrammyBot,
    ...deps,
  };

  const runtimeLogger = createRuntimeLogger({ logDir, component: 'telegram.bot' });
  const bot = options.bot ?? createBot(token);
  const fetcher =
    options.fetcher ??
    createDocumentFetcher({
      token,
      getFile: (fileId) => bot.getFile(fileId),
      logger: runtimeLogger.child('fetcher'),
    });

  const writeLog = async (record: EventLogRecord) => {
    if (logDir) {
      await appendJsonlImpl(path.join(logDir, 'events.jsonl'), record);
    }

    if (record.type === 'document.failed' || record.type === 'telegram.error') {
      runtimeLogger.error(record.type, record.data);
    } else if (record.type === 'sender.denied') {
      runtimeLogger.warn(record.type, record.data);
    } else {
      runtimeLogger.info(record.type, record.data);
    }
  };

  const handleDocument = async (ctx: TelegramContext) => {
    const document = ctx.message.document;
    if (!isPdfDocument(document)) return;

    const receivedAtMs = now().getTime();
    const elapsedMs = () => Math.max(0, now().getTime() - receivedAtMs);
    const fileName = document.file_name;

    await writeLog({
      ts: now().toISOString(),
      type: 'document.received',
      data: {
        chatId: ctx.chat.id,
        messageId: ctx.message.message_id,
        fileId: document.file_id,
        filename: fileName,
        sizeBytes: document.file_size ?? null,
      },
    });

    try {
      await fetcher.withDocument({ fileId: document.file_id, fileName }, (original) =>
        engine.withSubstitutedDocument(original, async (copy) => {
          await ctx.replyWithDocument(copy);
        }),
      );
    } catch (err) {
      await writeLog({
        ts: now().toISOString(),
        type: 'document.failed',
        data: {
          chatId: ctx.chat.id,
          messageId: ctx.message.message_id,
          filename: fileName,
          durationMs: elapsedMs(),
          error: serializeError(err),
        },
      });

      await ctx.reply(buildFailureReply(fileName, err));
      return;
    }

    await writeLog({
      ts: now().toISOString(),
      type: 'document.processed',
      data: {
        chatId: ctx.chat.id,
        messageId: ctx.message.message_id,
        filename: fileName,
        durationMs: elapsedMs(),
      },
    });
  };

  bot.on('message', async (ctx) => {
    const decision = authorize({ chat: ctx.chat, fromId: ctx.from?.id });

    if (!decision.allow) {
      await writeLog({
        ts: now().toISOString(),
        type: 'sender.denied',
        data: {
          chatId: ctx.chat.id,
          userId: decision.userId,
          reason: decision.reason ?? 'unknown',
        },
      });
      return;
    }

    await writeLog({
      ts: now().toISOString(),
      type: 'telegram.update',
      data: {
        chatId: ctx.chat.id,
        userId: decision.userId,
        messageId: ctx.message.message_id,
        hasDocument: Boolean(ctx.message.document),
      },
    });

    await handleDocument(ctx);
  });

  bot.catch(async (err) => {
    await writeLog({
      ts: now().toISOString(),
      type: 'telegram.error',
      data: { error: serializeError(err) },
    });
  });

  const stop = () => bot.stop();

  const start = async (signal?: AbortSignal) => {
    if (signal?.aborted) return;

    const onAbort = () => {
      stop().catch((err) => {
        runtimeLogger.error('bot.stop failed', { error: serializeError(err) });
      });
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    runtimeLogger.info('polling started');
    try {
      await bot.start();
    } finally {
      signal?.removeEventListener('abort', onAbort);
      runtimeLogger.info('polling stopped');
    }
  };

  return { bot, start, stop };
}
