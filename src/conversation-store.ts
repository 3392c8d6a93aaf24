// Interview Assistant Bot - Conversation Store
// Per-identity session records kept in a keyed store. The router loads a
// session, derives the next one, and saves it; records are never mutated
// in place.

import { SessionPhase } from "./types.js";
import type { MessageRef, Session, Turn } from "./types.js";
import { buildInitialDialogue } from "./prompts.js";

// ─── Backend ────────────────────────────────────────────────────────────────────

/** Keyed storage the store sits on. Async so a networked store can back it. */
export interface SessionBackend {
  get(chatId: number): Promise<Session | null>;
  set(chatId: number, session: Session): Promise<void>;
  delete(chatId: number): Promise<void>;
}

/**
 * In-memory backend. With a TTL, a session untouched for longer than the TTL
 * is dropped the next time it is read.
 */
export class MemorySessionBackend implements SessionBackend {
  private readonly entries = new Map<number, { session: Session; expiresAt: number }>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: { ttlMs?: number; now?: () => number } = {}) {
    this.ttlMs = options.ttlMs ?? 0;
    this.now = options.now ?? Date.now;
  }

  async get(chatId: number): Promise<Session | null> {
    const entry = this.entries.get(chatId);
    if (!entry) return null;
    if (this.ttlMs > 0 && this.now() > entry.expiresAt) {
      this.entries.delete(chatId);
      return null;
    }
    return entry.session;
  }

  async set(chatId: number, session: Session): Promise<void> {
    const expiresAt = this.ttlMs > 0 ? this.now() + this.ttlMs : Number.POSITIVE_INFINITY;
    this.entries.set(chatId, { session, expiresAt });
  }

  async delete(chatId: number): Promise<void> {
    this.entries.delete(chatId);
  }

  get size(): number {
    return this.entries.size;
  }
}

// ─── Session transitions ────────────────────────────────────────────────────────

export function createSession(now: Date = new Date()): Session {
  return {
    phase: SessionPhase.AWAITING_AUDIO,
    pendingQuery: null,
    pendingCount: 0,
    dialogue: [],
    pendingWarningRef: null,
    unsupportedNoticeRef: null,
    createdAt: now,
    updatedAt: now,
  };
}

/** Appends a text that arrived before any audio; texts join with "\n". */
export function queuePendingQuery(session: Session, text: string): Session {
  return {
    ...session,
    pendingQuery: session.pendingQuery === null ? text : `${session.pendingQuery}\n${text}`,
    pendingCount: session.pendingCount + 1,
  };
}

/**
 * Picks the query to run once audio processing completes. A caption wins
 * over queued text; the queue is discarded either way.
 */
export function selectInitialQuery(session: Session, caption: string | null): string | null {
  if (caption !== null && caption.trim().length > 0) {
    return caption;
  }
  return session.pendingQuery;
}

/**
 * Enters CHATTING with a fresh dialogue built from the transcript. The
 * pending queue and the waiting-notice reference are cleared in the same
 * record, since the notice is deleted alongside this transition.
 */
export function startChatting(session: Session, transcript: string): Session {
  return {
    ...session,
    phase: SessionPhase.CHATTING,
    dialogue: buildInitialDialogue(transcript),
    pendingQuery: null,
    pendingCount: 0,
    pendingWarningRef: null,
  };
}

export function withDialogue(session: Session, dialogue: Turn[]): Session {
  return { ...session, dialogue };
}

export function withPendingWarning(session: Session, ref: MessageRef | null): Session {
  return { ...session, pendingWarningRef: ref };
}

export function withUnsupportedNotice(session: Session, ref: MessageRef | null): Session {
  return { ...session, unsupportedNoticeRef: ref };
}

// ─── Store ──────────────────────────────────────────────────────────────────────

export class ConversationStore {
  private readonly backend: SessionBackend;
  private readonly now: () => Date;

  constructor(backend: SessionBackend = new MemorySessionBackend(), now: () => Date = () => new Date()) {
    this.backend = backend;
    this.now = now;
  }

  /** Returns the identity's session, creating and saving it on first use. */
  async get(chatId: number): Promise<Session> {
    const existing = await this.backend.get(chatId);
    if (existing) return existing;

    const session = createSession(this.now());
    await this.backend.set(chatId, session);
    return session;
  }

  async save(chatId: number, session: Session): Promise<Session> {
    const saved = { ...session, updatedAt: this.now() };
    await this.backend.set(chatId, saved);
    return saved;
  }

  /**
   * Replaces the session with a fresh one. Returns the previous record so
   * the caller can clean up notices it still references.
   */
  async reset(chatId: number): Promise<{ previous: Session | null; session: Session }> {
    const previous = await this.backend.get(chatId);
    const session = createSession(this.now());
    await this.backend.set(chatId, session);
    return { previous, session };
  }
}
