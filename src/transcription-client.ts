// Interview Assistant Bot - Transcription Client
// One-shot speech-to-text through the OpenAI audio transcriptions API.
// No retries: a failure (timeout included) surfaces as TranscriptionFailedError.

import { File } from "node:buffer";
import type { AudioFormat, TranscriptionKind } from "./types.js";
import { mimeTypeFor } from "./audio-format.js";
import { TranscriptionFailedError } from "./errors.js";
import { INTERVIEW_TRANSCRIPTION_PROMPT, VOICE_TRANSCRIPTION_PROMPT } from "./prompts.js";
import { createLogger, type Logger } from "./logger.js";

// ─── OpenAI transcription client interface (for testability / dependency injection) ──

/**
 * Minimal interface for the OpenAI audio transcriptions API surface we use.
 * Mirrors `audio.transcriptions.create()` with the default `json` response
 * format, which returns text only.
 */
export interface OpenAITranscriptionClient {
  audio: {
    transcriptions: {
      create(
        params: {
          file: File;
          model: string;
          prompt?: string;
          language?: string;
        },
        options?: { timeout?: number },
      ): Promise<{ text: string }>;
    };
  };
}

export interface TranscriptionClientOptions {
  model?: string;
  /** Passed as the provider's `language` parameter when set. */
  languageHint?: string | null;
  timeoutMs?: number;
  logger?: Logger;
}

export interface TranscribeOptions {
  /** Container of the audio, as resolved from its MIME type. */
  format: AudioFormat;
  kind: TranscriptionKind;
}

const DEFAULT_MODEL = "gpt-4o-mini-transcribe";
const DEFAULT_TIMEOUT_MS = 120_000;

const PROMPTS: Record<TranscriptionKind, string> = {
  interview: INTERVIEW_TRANSCRIPTION_PROMPT,
  voice: VOICE_TRANSCRIPTION_PROMPT,
};

export class TranscriptionClient {
  private readonly client: OpenAITranscriptionClient;
  private readonly model: string;
  private readonly languageHint: string | null;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(client: OpenAITranscriptionClient, options: TranscriptionClientOptions = {}) {
    this.client = client;
    this.model = options.model ?? DEFAULT_MODEL;
    this.languageHint = options.languageHint ?? null;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = options.logger ?? createLogger("TranscriptionClient");
  }

  /**
   * Transcribes one audio payload and returns the plain-text transcript.
   * Callers resolve the format first (see `resolveAudioFormat`), so an
   * unsupported MIME type never reaches this point.
   *
   * @throws TranscriptionFailedError on provider errors, timeouts, or an empty transcript.
   */
  async transcribe(audio: Buffer, options: TranscribeOptions): Promise<string> {
    const { format } = options;
    const file = toUploadFile(audio, format);

    const started = Date.now();
    let text: string;
    try {
      const response = await this.client.audio.transcriptions.create(
        {
          file,
          model: this.model,
          prompt: PROMPTS[options.kind],
          ...(this.languageHint ? { language: this.languageHint } : {}),
        },
        { timeout: this.timeoutMs },
      );
      text = response.text;
    } catch (err) {
      throw new TranscriptionFailedError(`Transcription request failed (${this.model})`, err);
    }

    const transcript = text.trim();
    if (transcript.length === 0) {
      throw new TranscriptionFailedError("Transcription returned no text");
    }

    this.logger.info(
      `Transcribed ${audio.byteLength} bytes of ${format} (${options.kind}) in ${Date.now() - started}ms, ${transcript.length} chars`,
    );
    return transcript;
  }
}

function toUploadFile(audio: Buffer, format: AudioFormat): File {
  return new File([audio], `audio.${format}`, { type: mimeTypeFor(format) });
}
