// Interview Assistant Bot - Telegram adapter (grammY)
// Classifies inbound messages into router events and implements the
// router's Messenger over the Bot API.

import { Bot, GrammyError, HttpError, type BotConfig, type Context } from "grammy";
import type { Message } from "grammy/types";
import { hydrateFiles, type FileFlavor } from "@grammyjs/files";
import type { MessageRef } from "./types.js";
import type { Messenger, SendOptions, SessionRouter } from "./session-router.js";
import { isKnownCommand, normalizeCommand } from "./command-suggester.js";
import { TransportError, describeError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";

// ─── Inbound classification ─────────────────────────────────────────────────────

export type InboundEvent =
  | { type: "command"; chatId: number; command: string }
  | { type: "text"; chatId: number; text: string }
  | { type: "audio" | "voice"; chatId: number; fileId: string; mimeType: string | null; caption: string | null }
  | { type: "unsupported"; chatId: number };

/**
 * Maps a Telegram message to the event the router understands. Text that
 * starts with "/" is a command token, known or not.
 */
export function classifyMessage(message: Message): InboundEvent {
  const chatId = message.chat.id;

  if (message.audio) {
    return {
      type: "audio",
      chatId,
      fileId: message.audio.file_id,
      mimeType: message.audio.mime_type ?? null,
      caption: message.caption ?? null,
    };
  }

  if (message.voice) {
    return {
      type: "voice",
      chatId,
      fileId: message.voice.file_id,
      mimeType: message.voice.mime_type ?? null,
      caption: message.caption ?? null,
    };
  }

  if (message.text !== undefined) {
    if (message.text.startsWith("/")) {
      const token = message.text.split(/\s+/, 1)[0];
      return { type: "command", chatId, command: normalizeCommand(token) };
    }
    return { type: "text", chatId, text: message.text };
  }

  return { type: "unsupported", chatId };
}

// ─── Dispatch ───────────────────────────────────────────────────────────────────

/** The router entry points the dispatcher calls. */
export type RouterHandlers = Pick<
  SessionRouter,
  | "handleStart"
  | "handleReset"
  | "handleHelp"
  | "handleUnknownCommand"
  | "handleText"
  | "handleAudio"
  | "handleVoice"
  | "handleUnsupported"
>;

/** Resolves the current message's file; `download` writes it to a path. */
export type FileFetcher = () => Promise<{ download(path?: string): Promise<string> }>;

export async function dispatchEvent(event: InboundEvent, router: RouterHandlers, getFile: FileFetcher): Promise<void> {
  switch (event.type) {
    case "command":
      if (!isKnownCommand(event.command)) {
        return router.handleUnknownCommand(event.chatId, event.command);
      }
      switch (event.command) {
        case "start":
          return router.handleStart(event.chatId);
        case "new":
          return router.handleReset(event.chatId);
        case "help":
          return router.handleHelp(event.chatId);
      }
      return;
    case "text":
      return router.handleText({ chatId: event.chatId, text: event.text });
    case "audio":
    case "voice": {
      const audioEvent = {
        chatId: event.chatId,
        mimeType: event.mimeType,
        caption: event.caption,
        download: async (targetPath: string) => {
          const file = await getFile();
          await file.download(targetPath);
        },
      };
      return event.type === "audio" ? router.handleAudio(audioEvent) : router.handleVoice(audioEvent);
    }
    case "unsupported":
      return router.handleUnsupported(event.chatId);
  }
}

// ─── Outbound ───────────────────────────────────────────────────────────────────

/** The slice of the Bot API the messenger calls. */
export interface TelegramSendApi {
  sendMessage(chatId: number, text: string, other?: { parse_mode?: "HTML" }): Promise<{ message_id: number }>;
  deleteMessage(chatId: number, messageId: number): Promise<unknown>;
  editMessageText(chatId: number, messageId: number, text: string): Promise<unknown>;
}

export class TelegramMessenger implements Messenger {
  private readonly api: TelegramSendApi;

  constructor(api: TelegramSendApi) {
    this.api = api;
  }

  async sendText(chatId: number, text: string, options: SendOptions = {}): Promise<MessageRef> {
    try {
      const sent = await this.api.sendMessage(chatId, text, options.html ? { parse_mode: "HTML" } : undefined);
      return { chatId, messageId: sent.message_id };
    } catch (err) {
      throw new TransportError(`sendMessage to ${chatId} failed`, err);
    }
  }

  async deleteMessage(ref: MessageRef): Promise<void> {
    try {
      await this.api.deleteMessage(ref.chatId, ref.messageId);
    } catch (err) {
      throw new TransportError(`deleteMessage ${ref.messageId} in ${ref.chatId} failed`, err);
    }
  }

  async editText(ref: MessageRef, text: string): Promise<void> {
    try {
      await this.api.editMessageText(ref.chatId, ref.messageId, text);
    } catch (err) {
      throw new TransportError(`editMessageText ${ref.messageId} in ${ref.chatId} failed`, err);
    }
  }
}

// ─── Bot factory ────────────────────────────────────────────────────────────────

export type BotContext = FileFlavor<Context>;

export type InterviewBot = Bot<BotContext>;

export const BOT_COMMANDS = [
  { command: "start", description: "Начать сначала" },
  { command: "new", description: "Новый разговор" },
  { command: "help", description: "Справка" },
];

/**
 * Creates the grammY bot with file hydration and error logging. Messages are
 * not handled until {@link attachRouter} is called.
 */
export function createBot(
  token: string,
  logger: Logger = createLogger("Bot"),
  config?: BotConfig<BotContext>,
): InterviewBot {
  const bot = new Bot<BotContext>(token, config);
  bot.api.config.use(hydrateFiles(bot.token));

  bot.catch((err) => {
    const cause = err.error;
    if (cause instanceof GrammyError) {
      logger.error(`Bot API error in update ${err.ctx.update.update_id}: ${cause.description}`);
    } else if (cause instanceof HttpError) {
      logger.error(`Could not reach Telegram in update ${err.ctx.update.update_id}: ${describeError(cause.error)}`);
    } else {
      logger.error(`Unhandled error in update ${err.ctx.update.update_id}: ${describeError(cause)}`);
    }
  });

  return bot;
}

/**
 * Hands every inbound message to the router and acknowledges the update
 * without waiting for it: a chat's lock can be held for a whole
 * transcription, longer than a webhook request stays open.
 */
export function attachRouter(bot: InterviewBot, router: RouterHandlers, logger: Logger = createLogger("Bot")): void {
  bot.on("message", (ctx) => {
    const event = classifyMessage(ctx.message);
    const updateId = ctx.update.update_id;
    logger.debug(`Update ${updateId}: ${event.type} from ${event.chatId}`);
    dispatchEvent(event, router, () => ctx.getFile()).catch((err: unknown) => {
      logger.error(`Dispatch failed for update ${updateId}: ${describeError(err)}`);
    });
  });
}
