// Interview Assistant Bot - Entry point
// Wires up all dependencies and starts the bot in polling or webhook mode.

import "dotenv/config";
import OpenAI from "openai";
import { webhookCallback } from "grammy";
import { loadConfig, type AppConfig } from "./config.js";
import { ConfigError, describeError } from "./errors.js";
import { createLogger } from "./logger.js";
import { TranscriptionClient, type OpenAITranscriptionClient } from "./transcription-client.js";
import { ChatClient, type OpenAIChatClient } from "./chat-client.js";
import { ConversationStore, MemorySessionBackend } from "./conversation-store.js";
import { MediaDownloader } from "./media-downloader.js";
import { SessionRouter } from "./session-router.js";
import { BOT_COMMANDS, TelegramMessenger, attachRouter, createBot } from "./bot.js";
import { createAppServer } from "./server.js";

export const APP_NAME = "Interview Assistant Bot";
export const APP_VERSION = "0.1.0";

const logFatal = (msg: string) => console.error(`[FATAL] [${new Date().toISOString()}] ${msg}`);

// ─── Configuration ──────────────────────────────────────────────────────────────

let config: AppConfig;
try {
  config = loadConfig();
} catch (err) {
  logFatal(err instanceof ConfigError ? err.message : describeError(err));
  process.exit(1);
}

const logInit = createLogger("Init", config.logLevel);
logInit.info(`${APP_NAME} v${APP_VERSION} starting in ${config.mode} mode`);

// ─── API clients ────────────────────────────────────────────────────────────────

// The SDK retries failed requests by default; provider calls here are single-shot.
const openai = new OpenAI({ apiKey: config.openaiApiKey, maxRetries: 0 });

const transcriptionApi: OpenAITranscriptionClient = {
  audio: {
    transcriptions: {
      create: async (params, options) => {
        const result = await openai.audio.transcriptions.create(params, options);
        return { text: result.text };
      },
    },
  },
};

const chatApi: OpenAIChatClient = {
  chat: {
    completions: {
      create: (params, options) => openai.chat.completions.create(params, options),
    },
  },
};

// ─── Pipeline components ────────────────────────────────────────────────────────

const transcription = new TranscriptionClient(transcriptionApi, {
  model: config.transcriptionModel,
  languageHint: config.transcriptionLanguage,
  timeoutMs: config.openaiTimeoutMs,
  logger: createLogger("TranscriptionClient", config.logLevel),
});

const chat = new ChatClient(chatApi, {
  model: config.chatModel,
  timeoutMs: config.openaiTimeoutMs,
  logger: createLogger("ChatClient", config.logLevel),
});

const store = new ConversationStore(
  new MemorySessionBackend({ ttlMs: config.sessionTtlMinutes * 60_000 }),
);

const downloader = new MediaDownloader(config.downloadsDir, createLogger("MediaDownloader", config.logLevel));

const botLogger = createLogger("Bot", config.logLevel);
const bot = createBot(config.telegramToken, botLogger);

const router = new SessionRouter({
  store,
  transcription,
  chat,
  downloader,
  messenger: new TelegramMessenger(bot.api),
  logger: createLogger("SessionRouter", config.logLevel),
});

attachRouter(bot, router, botLogger);

// ─── Start ──────────────────────────────────────────────────────────────────────

const server = createAppServer({
  logger: createLogger("Server", config.logLevel),
  webhook:
    config.mode === "webhook"
      ? { path: config.webhookPath, handler: webhookCallback(bot, "express") }
      : undefined,
});

async function start(): Promise<void> {
  await bot.init();
  await bot.api.setMyCommands(BOT_COMMANDS);
  await server.listen(config.port);

  if (config.mode === "webhook" && config.webhookUrl) {
    const url = new URL(config.webhookPath, config.webhookUrl).toString();
    await bot.api.setWebhook(url);
    logInit.info(`@${bot.botInfo.username} receiving updates at ${url}`);
    return;
  }

  logInit.info(`@${bot.botInfo.username} polling for updates`);
  // Resolves only when polling stops; start() deletes any webhook first.
  bot.start().catch((err: unknown) => {
    logFatal(`Polling stopped: ${describeError(err)}`);
    process.exit(1);
  });
}

async function shutdown(signal: string): Promise<void> {
  logInit.info(`${signal} received, shutting down`);
  if (bot.isRunning()) await bot.stop();
  await server.close();
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      logFatal(`Shutdown failed: ${describeError(err)}`);
      process.exit(1);
    });
  });
}

start().catch((err: unknown) => {
  logFatal(`Startup failed: ${describeError(err)}`);
  process.exit(1);
});
