// Interview Assistant Bot - Session Router
// The per-identity state machine that decides, for each inbound event, what
// to run and what to queue.
//
//   AWAITING_AUDIO --audio/voice, transcription ok--> CHATTING
//   AWAITING_AUDIO --text--> AWAITING_AUDIO (queued in pendingQuery)
//   CHATTING --text or voice--> CHATTING (chat call)
//   CHATTING --audio--> CHATTING (new transcript, dialogue reinitialized)
//   any --reset--> AWAITING_AUDIO
//
// Every public handler runs under the identity's lock and catches its own
// failures; nothing propagates to the transport.

import { SessionPhase } from "./types.js";
import type { AudioEvent, MessageRef, Session, TextEvent, TranscriptionKind } from "./types.js";
import type { TranscriptionClient } from "./transcription-client.js";
import type { ChatClient, ChatExchange } from "./chat-client.js";
import {
  ConversationStore,
  queuePendingQuery,
  selectInitialQuery,
  startChatting,
  withDialogue,
  withPendingWarning,
  withUnsupportedNotice,
} from "./conversation-store.js";
import type { DownloadedMedia, MediaDownloader } from "./media-downloader.js";
import { KeyedLock } from "./keyed-lock.js";
import { resolveAudioFormat } from "./audio-format.js";
import { suggestCommands, normalizeCommand } from "./command-suggester.js";
import { UnsupportedFormatError, describeError } from "./errors.js";
import { MESSAGES, awaitingAudioNotice, unknownCommandNotice } from "./messages.js";
import { splitMessage } from "./utils.js";
import { createLogger, type Logger } from "./logger.js";

// ─── Outbound transport interface ───────────────────────────────────────────────

export interface SendOptions {
  /** Render the text with the platform's HTML subset (e.g. `<b>`). */
  html?: boolean;
}

/**
 * What the router needs from the messaging platform. Implementations throw
 * TransportError; the router never lets one escape a handler.
 */
export interface Messenger {
  sendText(chatId: number, text: string, options?: SendOptions): Promise<MessageRef>;
  deleteMessage(ref: MessageRef): Promise<void>;
  editText(ref: MessageRef, text: string): Promise<void>;
}

// ─── Dependency injection interface ─────────────────────────────────────────────

export interface SessionRouterDeps {
  store: ConversationStore;
  transcription: TranscriptionClient;
  chat: ChatClient;
  messenger: Messenger;
  downloader: MediaDownloader;
  lock?: KeyedLock;
  logger?: Logger;
}

export class SessionRouter {
  private readonly store: ConversationStore;
  private readonly transcription: TranscriptionClient;
  private readonly chat: ChatClient;
  private readonly messenger: Messenger;
  private readonly downloader: MediaDownloader;
  private readonly lock: KeyedLock;
  private readonly logger: Logger;

  constructor(deps: SessionRouterDeps) {
    this.store = deps.store;
    this.transcription = deps.transcription;
    this.chat = deps.chat;
    this.messenger = deps.messenger;
    this.downloader = deps.downloader;
    this.lock = deps.lock ?? new KeyedLock();
    this.logger = deps.logger ?? createLogger("SessionRouter");
  }

  // ─── Commands ─────────────────────────────────────────────────────────────────

  /** `/start`: fresh session and a welcome. */
  async handleStart(chatId: number): Promise<void> {
    await this.guard(chatId, "start", async () => {
      await this.resetSession(chatId);
      await this.notify(chatId, MESSAGES.welcome);
    });
  }

  /** `/new`: clears phase, dialogue and the pending queue. */
  async handleReset(chatId: number): Promise<void> {
    await this.guard(chatId, "reset", async () => {
      await this.resetSession(chatId);
      await this.notify(chatId, MESSAGES.newConversation);
    });
  }

  async handleHelp(chatId: number): Promise<void> {
    await this.guard(chatId, "help", async () => {
      await this.notify(chatId, MESSAGES.help);
    });
  }

  async handleUnknownCommand(chatId: number, token: string): Promise<void> {
    await this.guard(chatId, "unknown command", async () => {
      const command = normalizeCommand(token);
      const suggestions = suggestCommands(command);
      this.logger.debug(`Unknown command "${command}" from ${chatId}, suggestions: [${suggestions.join(", ")}]`);
      await this.notify(chatId, unknownCommandNotice(command, suggestions));
    });
  }

  // ─── Messages ─────────────────────────────────────────────────────────────────

  /** Freestanding text: a chat query while CHATTING, queued otherwise. */
  async handleText(event: TextEvent): Promise<void> {
    await this.guard(event.chatId, "text", async () => {
      const session = await this.store.get(event.chatId);

      if (session.phase === SessionPhase.CHATTING) {
        await this.runQuery(event.chatId, session, event.text, MESSAGES.queryProcessing);
        return;
      }

      await this.queueText(event.chatId, session, event.text);
    });
  }

  /** An audio file: always treated as a (new) interview recording. */
  async handleAudio(event: AudioEvent): Promise<void> {
    await this.guard(event.chatId, "audio", async () => {
      const session = await this.store.get(event.chatId);
      await this.processInterview(event, session);
    });
  }

  /**
   * A voice message: the interview recording while AWAITING_AUDIO, a spoken
   * query while CHATTING.
   */
  async handleVoice(event: AudioEvent): Promise<void> {
    await this.guard(event.chatId, "voice", async () => {
      const session = await this.store.get(event.chatId);

      if (session.phase === SessionPhase.CHATTING) {
        await this.processVoiceQuery(event, session);
        return;
      }

      await this.processInterview(event, session);
    });
  }

  /** Anything that is not audio, voice or text. Never touches the phase. */
  async handleUnsupported(chatId: number): Promise<void> {
    await this.guard(chatId, "unsupported", async () => {
      const session = await this.store.get(chatId);

      if (session.unsupportedNoticeRef) {
        await this.discard(session.unsupportedNoticeRef);
      }
      const ref = await this.notify(chatId, MESSAGES.unsupportedMedia);
      await this.store.save(chatId, withUnsupportedNotice(session, ref));
    });
  }

  // ─── Transitions ──────────────────────────────────────────────────────────────

  private async resetSession(chatId: number): Promise<void> {
    const { previous } = await this.store.reset(chatId);
    if (previous?.pendingWarningRef) {
      await this.discard(previous.pendingWarningRef);
    }
    if (previous?.unsupportedNoticeRef) {
      await this.discard(previous.unsupportedNoticeRef);
    }
    this.logger.info(`Session ${chatId} reset`);
  }

  private async queueText(chatId: number, session: Session, text: string): Promise<void> {
    const queued = queuePendingQuery(session, text);
    const notice = awaitingAudioNotice(queued.pendingCount);

    let ref = session.pendingWarningRef;
    if (ref) {
      const edited = await this.edit(ref, notice);
      if (!edited) {
        await this.discard(ref);
        ref = null;
      }
    }
    if (!ref) {
      ref = await this.notify(chatId, notice);
    }

    await this.store.save(chatId, withPendingWarning(queued, ref));
    this.logger.info(`Session ${chatId}: queued text #${queued.pendingCount} while awaiting audio`);
  }

  /**
   * Transcribes an interview recording and (re)initializes the dialogue.
   * On success the session enters CHATTING and the caption, or else the
   * queued text, runs as the first query. On failure the session is left as
   * it was and the downloaded file stays on disk.
   */
  private async processInterview(event: AudioEvent, session: Session): Promise<void> {
    const { chatId } = event;
    if (!this.acceptsFormat(event)) {
      await this.notify(chatId, MESSAGES.unsupportedAudio);
      return;
    }

    const progressRef = await this.notify(chatId, MESSAGES.audioReceived);
    const transcript = await this.transcribe(event, "interview");
    if (progressRef) await this.discard(progressRef);

    if (transcript === null) {
      await this.notify(chatId, MESSAGES.audioFailed);
      return;
    }

    const query = selectInitialQuery(session, event.caption);
    const chatting = await this.store.save(chatId, startChatting(session, transcript));
    if (session.pendingWarningRef) {
      await this.discard(session.pendingWarningRef);
    }
    this.logger.info(
      `Session ${chatId}: ${SessionPhase.CHATTING} with a ${transcript.length}-char transcript` +
        (session.pendingQuery !== null && query !== session.pendingQuery ? " (caption superseded queued text)" : ""),
    );

    if (query === null) {
      await this.notify(chatId, MESSAGES.audioReady);
      return;
    }
    await this.runQuery(chatId, chatting, query, MESSAGES.queryAfterAudio);
  }

  private async processVoiceQuery(event: AudioEvent, session: Session): Promise<void> {
    const { chatId } = event;
    if (!this.acceptsFormat(event)) {
      await this.notify(chatId, MESSAGES.unsupportedAudio);
      return;
    }

    const text = await this.transcribe(event, "voice");
    if (text === null) {
      await this.notify(chatId, MESSAGES.voiceFailed);
      return;
    }
    await this.runQuery(chatId, session, text, MESSAGES.queryProcessing);
  }

  /**
   * One chat call. The dialogue grows by the user and assistant turns only
   * when the call succeeds.
   */
  private async runQuery(chatId: number, session: Session, query: string, progressText: string): Promise<void> {
    const progressRef = await this.notify(chatId, progressText);
    let exchange: ChatExchange;
    try {
      exchange = await this.chat.ask(session.dialogue, query);
    } catch (err) {
      this.logger.error(`Session ${chatId}: chat failed: ${describeError(err)}`);
      if (progressRef) await this.discard(progressRef);
      await this.notify(chatId, MESSAGES.queryFailed);
      return;
    }

    await this.store.save(chatId, withDialogue(session, exchange.dialogue));
    if (progressRef) await this.discard(progressRef);
    await this.sendReply(chatId, exchange.reply);
  }

  // ─── Audio helpers ────────────────────────────────────────────────────────────

  private acceptsFormat(event: AudioEvent): boolean {
    try {
      resolveAudioFormat(event.mimeType);
      return true;
    } catch (err) {
      if (err instanceof UnsupportedFormatError) {
        this.logger.info(`Session ${event.chatId}: rejected ${err.mimeType ?? "unknown"} audio`);
        return false;
      }
      throw err;
    }
  }

  /**
   * Downloads and transcribes. Returns null on any failure, after logging it
   * and keeping the temp file; deletes the file on success.
   */
  private async transcribe(event: AudioEvent, kind: TranscriptionKind): Promise<string | null> {
    let media: DownloadedMedia | null = null;
    try {
      const format = resolveAudioFormat(event.mimeType);
      media = await this.downloader.fetch(event.download, format);
      const text = await this.transcription.transcribe(media.data, { format, kind });
      await this.downloader.discard(media);
      return text;
    } catch (err) {
      this.logger.error(`Session ${event.chatId}: ${kind} transcription failed: ${describeError(err)}`);
      if (media) this.downloader.retain(media, describeError(err));
      return null;
    }
  }

  // ─── Transport helpers (failures are logged and swallowed) ────────────────────

  private async notify(chatId: number, text: string): Promise<MessageRef | null> {
    try {
      return await this.messenger.sendText(chatId, text);
    } catch (err) {
      this.logger.warn(`Could not send notice to ${chatId}: ${describeError(err)}`);
      return null;
    }
  }

  private async discard(ref: MessageRef): Promise<void> {
    try {
      await this.messenger.deleteMessage(ref);
    } catch (err) {
      this.logger.warn(`Could not delete message ${ref.messageId} in ${ref.chatId}: ${describeError(err)}`);
    }
  }

  private async edit(ref: MessageRef, text: string): Promise<boolean> {
    try {
      await this.messenger.editText(ref, text);
      return true;
    } catch (err) {
      this.logger.warn(`Could not edit message ${ref.messageId} in ${ref.chatId}: ${describeError(err)}`);
      return false;
    }
  }

  /**
   * Sends a model reply as HTML, falling back to plain text per chunk. The
   * dialogue is already saved at this point, so no failure here reaches the
   * query's error path.
   */
  private async sendReply(chatId: number, reply: string): Promise<void> {
    for (const chunk of splitMessage(reply)) {
      try {
        await this.messenger.sendText(chatId, chunk, { html: true });
      } catch (err) {
        this.logger.warn(`HTML reply rejected for ${chatId}, resending as plain text: ${describeError(err)}`);
        await this.notify(chatId, chunk);
      }
    }
  }

  // ─── Boundary ─────────────────────────────────────────────────────────────────

  private async guard(chatId: number, label: string, handler: () => Promise<void>): Promise<void> {
    await this.lock.run(String(chatId), async () => {
      try {
        await handler();
      } catch (err) {
        this.logger.error(`Session ${chatId}: ${label} handler failed: ${describeError(err)}`);
        await this.notify(chatId, MESSAGES.unexpectedError);
      }
    });
  }
}
