// Interview Assistant Bot - Shared TypeScript interfaces and types

// ─── Session State Machine ──────────────────────────────────────────────────────

export enum SessionPhase {
  AWAITING_AUDIO = "awaiting_audio",
  CHATTING = "chatting",
}

// ─── Dialogue ───────────────────────────────────────────────────────────────────

export type TurnRole = "system" | "user" | "assistant";

/** One role-tagged message of the prompt sent to the language model. */
export interface Turn {
  role: TurnRole;
  content: string;
}

// ─── Transport references ───────────────────────────────────────────────────────

/** Handle to a message the bot has sent, used to edit or delete it later. */
export interface MessageRef {
  chatId: number;
  messageId: number;
}

// ─── Session ────────────────────────────────────────────────────────────────────

export interface Session {
  phase: SessionPhase;
  /** Text received before any audio, newline-joined in arrival order. */
  pendingQuery: string | null;
  /** Number of texts folded into pendingQuery. */
  pendingCount: number;
  /** Literal prompt history; empty until a transcription succeeds. */
  dialogue: Turn[];
  /** The "send the audio first" notice, if one is visible. */
  pendingWarningRef: MessageRef | null;
  /** The latest "unsupported media" notice, if one is visible. */
  unsupportedNoticeRef: MessageRef | null;
  createdAt: Date;
  updatedAt: Date;
}

// ─── Audio ──────────────────────────────────────────────────────────────────────

export type AudioFormat = "mp3" | "ogg" | "m4a" | "wav";

/**
 * Which fixed instruction the transcription request carries.
 * "interview" renders turn-taking as Interviewer/Applicant lines,
 * "voice" is a verbatim transcription of a short user message.
 */
export type TranscriptionKind = "interview" | "voice";

// ─── Inbound events ─────────────────────────────────────────────────────────────

/** Writes the referenced media to the given path. */
export type MediaDownload = (targetPath: string) => Promise<void>;

export interface AudioEvent {
  chatId: number;
  mimeType: string | null;
  caption: string | null;
  download: MediaDownload;
}

export interface TextEvent {
  chatId: number;
  text: string;
}

// ─── Deferred ───────────────────────────────────────────────────────────────────

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}
