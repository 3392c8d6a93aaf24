// Interview Assistant Bot - Configuration
// All environment variables are read here so the rest of the app stays
// env-agnostic and testable. The entry point loads `.env` via dotenv.

import { ConfigError } from "./errors.js";
import { isLogLevel, type LogLevel } from "./logger.js";

export type BotMode = "polling" | "webhook";

export interface AppConfig {
  telegramToken: string;
  openaiApiKey: string;
  transcriptionModel: string;
  chatModel: string;
  /** ISO-639-1 hint for the speech-to-text provider; null lets it detect. */
  transcriptionLanguage: string | null;
  openaiTimeoutMs: number;
  downloadsDir: string;
  /** Idle time after which a session is dropped; 0 keeps sessions forever. */
  sessionTtlMinutes: number;
  mode: BotMode;
  webhookUrl: string | null;
  webhookPath: string;
  port: number;
  logLevel: LogLevel;
}

const DEFAULTS = {
  transcriptionModel: "gpt-4o-mini-transcribe",
  chatModel: "gpt-4o-mini",
  openaiTimeoutMs: 120_000,
  downloadsDir: "downloads",
  sessionTtlMinutes: 0,
  webhookPath: "/telegram/webhook",
  port: 3000,
} as const;

function required(env: NodeJS.ProcessEnv, name: string): string {
  const value = env[name]?.trim();
  if (!value) {
    throw new ConfigError(`${name} is not set. Add it to your .env file.`);
  }
  return value;
}

function optional(env: NodeJS.ProcessEnv, name: string): string | null {
  const value = env[name]?.trim();
  return value ? value : null;
}

function nonNegativeInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = optional(env, name);
  if (raw === null) return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new ConfigError(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return parsed;
}

/**
 * Builds the typed configuration from an environment map.
 *
 * @throws ConfigError when a required variable is missing or a value is malformed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const telegramToken = required(env, "TELEGRAM_BOT_TOKEN");
  const openaiApiKey = required(env, "OPENAI_API_KEY");

  const modeRaw = optional(env, "BOT_MODE") ?? "polling";
  if (modeRaw !== "polling" && modeRaw !== "webhook") {
    throw new ConfigError(`BOT_MODE must be "polling" or "webhook", got "${modeRaw}"`);
  }

  const webhookUrl = optional(env, "WEBHOOK_URL");
  if (modeRaw === "webhook" && webhookUrl === null) {
    throw new ConfigError("WEBHOOK_URL is required when BOT_MODE is webhook");
  }

  const webhookPath = optional(env, "WEBHOOK_PATH") ?? DEFAULTS.webhookPath;
  if (!webhookPath.startsWith("/")) {
    throw new ConfigError(`WEBHOOK_PATH must start with "/", got "${webhookPath}"`);
  }

  const logLevel = optional(env, "LOG_LEVEL") ?? "info";
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(`LOG_LEVEL must be one of debug, info, warn, error, got "${logLevel}"`);
  }

  const openaiTimeoutMs = nonNegativeInt(env, "OPENAI_TIMEOUT_MS", DEFAULTS.openaiTimeoutMs);
  if (openaiTimeoutMs === 0) {
    throw new ConfigError("OPENAI_TIMEOUT_MS must be greater than 0");
  }

  return {
    telegramToken,
    openaiApiKey,
    transcriptionModel: optional(env, "TRANSCRIPTION_MODEL") ?? DEFAULTS.transcriptionModel,
    chatModel: optional(env, "CHAT_MODEL") ?? DEFAULTS.chatModel,
    transcriptionLanguage: optional(env, "TRANSCRIPTION_LANGUAGE"),
    openaiTimeoutMs,
    downloadsDir: optional(env, "DOWNLOADS_DIR") ?? DEFAULTS.downloadsDir,
    sessionTtlMinutes: nonNegativeInt(env, "SESSION_TTL_MINUTES", DEFAULTS.sessionTtlMinutes),
    mode: modeRaw,
    webhookUrl,
    webhookPath,
    port: nonNegativeInt(env, "PORT", DEFAULTS.port),
    logLevel,
  };
}
