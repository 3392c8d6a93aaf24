import { describe, it, expect, vi, afterEach } from "vitest";
import { webhookCallback } from "grammy";
import type { Message } from "grammy/types";
import { TelegramMessenger, attachRouter, classifyMessage, createBot, dispatchEvent } from "./bot.js";
import type { FileFetcher, RouterHandlers, TelegramSendApi } from "./bot.js";
import { createAppServer, type AppServer } from "./server.js";
import { createDeferred } from "./utils/deferred.js";
import { TransportError } from "./errors.js";

const CHAT_ID = 555;

function makeMessage(fields: Partial<Message> = {}): Message {
  return {
    message_id: 1,
    date: 1_700_000_000,
    chat: { id: CHAT_ID, type: "private", first_name: "Test" },
    ...fields,
  };
}

/** Silent logger for tests */
function createSilentLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function createFakeRouter() {
  return {
    handleStart: vi.fn<RouterHandlers["handleStart"]>(async () => {}),
    handleReset: vi.fn<RouterHandlers["handleReset"]>(async () => {}),
    handleHelp: vi.fn<RouterHandlers["handleHelp"]>(async () => {}),
    handleUnknownCommand: vi.fn<RouterHandlers["handleUnknownCommand"]>(async () => {}),
    handleText: vi.fn<RouterHandlers["handleText"]>(async () => {}),
    handleAudio: vi.fn<RouterHandlers["handleAudio"]>(async () => {}),
    handleVoice: vi.fn<RouterHandlers["handleVoice"]>(async () => {}),
    handleUnsupported: vi.fn<RouterHandlers["handleUnsupported"]>(async () => {}),
  };
}

function createFileFetcher() {
  const download = vi.fn(async (path?: string) => path ?? "/tmp/telegram-file");
  const getFile = vi.fn<FileFetcher>(async () => ({ download }));
  return { getFile, download };
}

describe("classifyMessage", () => {
  it("should classify an audio file with its MIME type and caption", () => {
    const message = makeMessage({
      audio: { file_id: "audio-1", file_unique_id: "u1", duration: 60, mime_type: "audio/mpeg" },
      caption: "Summarize it",
    });

    expect(classifyMessage(message)).toEqual({
      type: "audio",
      chatId: CHAT_ID,
      fileId: "audio-1",
      mimeType: "audio/mpeg",
      caption: "Summarize it",
    });
  });

  it("should classify a voice message and fill in missing fields with null", () => {
    const message = makeMessage({ voice: { file_id: "voice-1", file_unique_id: "u2", duration: 3 } });

    expect(classifyMessage(message)).toEqual({
      type: "voice",
      chatId: CHAT_ID,
      fileId: "voice-1",
      mimeType: null,
      caption: null,
    });
  });

  it("should classify plain text", () => {
    expect(classifyMessage(makeMessage({ text: "What did they say?" }))).toEqual({
      type: "text",
      chatId: CHAT_ID,
      text: "What did they say?",
    });
  });

  it("should normalize a command token and drop its arguments", () => {
    expect(classifyMessage(makeMessage({ text: "/Help@interview_bot please" }))).toEqual({
      type: "command",
      chatId: CHAT_ID,
      command: "help",
    });
  });

  it("should keep unknown commands as commands", () => {
    expect(classifyMessage(makeMessage({ text: "/hlep" }))).toEqual({ type: "command", chatId: CHAT_ID, command: "hlep" });
  });

  it("should classify anything else as unsupported", () => {
    const message = makeMessage({ photo: [{ file_id: "p", file_unique_id: "p", width: 10, height: 10 }] });
    expect(classifyMessage(message)).toEqual({ type: "unsupported", chatId: CHAT_ID });
  });
});

describe("dispatchEvent", () => {
  it.each([
    ["start", "handleStart"],
    ["new", "handleReset"],
    ["help", "handleHelp"],
  ] as const)("should route /%s to %s", async (command, handler) => {
    const router = createFakeRouter();
    const { getFile } = createFileFetcher();

    await dispatchEvent({ type: "command", chatId: CHAT_ID, command }, router, getFile);

    expect(router[handler]).toHaveBeenCalledWith(CHAT_ID);
  });

  it("should route an unknown command with its token", async () => {
    const router = createFakeRouter();
    const { getFile } = createFileFetcher();

    await dispatchEvent({ type: "command", chatId: CHAT_ID, command: "strat" }, router, getFile);

    expect(router.handleUnknownCommand).toHaveBeenCalledWith(CHAT_ID, "strat");
    expect(router.handleStart).not.toHaveBeenCalled();
  });

  it("should route text", async () => {
    const router = createFakeRouter();
    const { getFile } = createFileFetcher();

    await dispatchEvent({ type: "text", chatId: CHAT_ID, text: "hi" }, router, getFile);

    expect(router.handleText).toHaveBeenCalledWith({ chatId: CHAT_ID, text: "hi" });
  });

  it("should route unsupported media", async () => {
    const router = createFakeRouter();
    const { getFile } = createFileFetcher();

    await dispatchEvent({ type: "unsupported", chatId: CHAT_ID }, router, getFile);

    expect(router.handleUnsupported).toHaveBeenCalledWith(CHAT_ID);
  });

  it("should hand audio to the router with a download that fetches the file lazily", async () => {
    const router = createFakeRouter();
    const { getFile, download } = createFileFetcher();

    await dispatchEvent(
      { type: "audio", chatId: CHAT_ID, fileId: "f1", mimeType: "audio/ogg", caption: "c" },
      router,
      getFile,
    );

    expect(getFile).not.toHaveBeenCalled();
    const event = router.handleAudio.mock.calls[0][0];
    expect(event).toMatchObject({ chatId: CHAT_ID, mimeType: "audio/ogg", caption: "c" });

    await event.download("/tmp/downloads/x.ogg");
    expect(getFile).toHaveBeenCalledTimes(1);
    expect(download).toHaveBeenCalledWith("/tmp/downloads/x.ogg");
  });

  it("should route voice to the voice handler", async () => {
    const router = createFakeRouter();
    const { getFile } = createFileFetcher();

    await dispatchEvent({ type: "voice", chatId: CHAT_ID, fileId: "v1", mimeType: "audio/ogg", caption: null }, router, getFile);

    expect(router.handleVoice).toHaveBeenCalledTimes(1);
    expect(router.handleAudio).not.toHaveBeenCalled();
  });
});

describe("TelegramMessenger", () => {
  function createApi() {
    return {
      sendMessage: vi.fn<TelegramSendApi["sendMessage"]>(async () => ({ message_id: 77 })),
      deleteMessage: vi.fn<TelegramSendApi["deleteMessage"]>(async () => true),
      editMessageText: vi.fn<TelegramSendApi["editMessageText"]>(async () => true),
    };
  }

  it("should return a reference to the sent message", async () => {
    const api = createApi();
    const messenger = new TelegramMessenger(api);

    await expect(messenger.sendText(CHAT_ID, "hello")).resolves.toEqual({ chatId: CHAT_ID, messageId: 77 });
    expect(api.sendMessage).toHaveBeenCalledWith(CHAT_ID, "hello", undefined);
  });

  it("should set the HTML parse mode when asked", async () => {
    const api = createApi();
    const messenger = new TelegramMessenger(api);

    await messenger.sendText(CHAT_ID, "<b>bold</b>", { html: true });

    expect(api.sendMessage).toHaveBeenCalledWith(CHAT_ID, "<b>bold</b>", { parse_mode: "HTML" });
  });

  it("should delete and edit by reference", async () => {
    const api = createApi();
    const messenger = new TelegramMessenger(api);
    const ref = { chatId: CHAT_ID, messageId: 9 };

    await messenger.deleteMessage(ref);
    await messenger.editText(ref, "updated");

    expect(api.deleteMessage).toHaveBeenCalledWith(CHAT_ID, 9);
    expect(api.editMessageText).toHaveBeenCalledWith(CHAT_ID, 9, "updated");
  });

  it("should wrap API failures in TransportError", async () => {
    const api = createApi();
    const cause = new Error("Bad Request: can't parse entities");
    api.sendMessage.mockRejectedValueOnce(cause);
    api.deleteMessage.mockRejectedValueOnce(new Error("message to delete not found"));
    const messenger = new TelegramMessenger(api);

    await expect(messenger.sendText(CHAT_ID, "<b", { html: true })).rejects.toMatchObject({
      name: "TransportError",
      message: `sendMessage to ${CHAT_ID} failed`,
      cause,
    });
    await expect(messenger.deleteMessage({ chatId: CHAT_ID, messageId: 1 })).rejects.toBeInstanceOf(TransportError);
  });
});

describe("webhook delivery", () => {
  let server: AppServer | null = null;

  afterEach(async () => {
    await server?.close();
    server = null;
  });

  // Known up front, so the bot never calls getMe.
  const botInfo = {
    id: 1,
    is_bot: true as const,
    first_name: "Interview",
    username: "interview_test_bot",
    can_join_groups: false,
    can_read_all_group_messages: false,
    supports_inline_queries: false,
    can_connect_to_business: false,
    has_main_web_app: false,
    has_topics_enabled: false,
    allows_users_to_create_topics: false,
  };

  function textUpdate(updateId: number, text: string) {
    return {
      update_id: updateId,
      message: {
        message_id: updateId,
        date: 1_700_000_000,
        chat: { id: CHAT_ID, type: "private", first_name: "Test" },
        text,
      },
    };
  }

  async function startWebhook(router: RouterHandlers, logger: ReturnType<typeof createSilentLogger>) {
    const bot = createBot("test-token", logger, { botInfo });
    attachRouter(bot, router, logger);
    server = createAppServer({
      logger,
      webhook: { path: "/telegram/webhook", handler: webhookCallback(bot, "express") },
    });
    const port = await server.listen(0);

    return (update: object) =>
      fetch(`http://127.0.0.1:${port}/telegram/webhook`, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify(update),
      });
  }

  it("should acknowledge an update while the router is still working on it", async () => {
    const router = createFakeRouter();
    const transcriptionInFlight = createDeferred<void>();
    router.handleText.mockImplementationOnce(() => transcriptionInFlight.promise);
    const post = await startWebhook(router, createSilentLogger());

    const response = await post(textUpdate(1, "hi"));

    expect(response.status).toBe(200);
    expect(router.handleText).toHaveBeenCalledWith({ chatId: CHAT_ID, text: "hi" });
    transcriptionInFlight.resolve();
  });

  it("should log a router failure instead of failing the update", async () => {
    const router = createFakeRouter();
    router.handleText.mockRejectedValueOnce(new Error("router down"));
    const logger = createSilentLogger();
    const post = await startWebhook(router, logger);

    const response = await post(textUpdate(2, "hi"));

    expect(response.status).toBe(200);
    await vi.waitFor(() => expect(logger.error).toHaveBeenCalledWith("Dispatch failed for update 2: router down"));
  });
});
