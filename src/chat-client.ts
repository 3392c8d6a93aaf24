// Interview Assistant Bot - Chat Client
// Sends the whole dialogue to the language model on every call; the model
// keeps no state between requests.

import type { Turn } from "./types.js";
import { ChatFailedError } from "./errors.js";
import { buildUserTurn } from "./prompts.js";
import { createLogger, type Logger } from "./logger.js";

// ─── OpenAI chat client interface (for testability / dependency injection) ──────

/**
 * Minimal interface for the OpenAI chat completions API surface we use.
 * Only non-streaming completions are requested.
 */
export interface OpenAIChatClient {
  chat: {
    completions: {
      create(
        params: {
          model: string;
          messages: Turn[];
          temperature?: number;
        },
        options?: { timeout?: number },
      ): Promise<{
        choices: Array<{
          message: {
            content: string | null;
          };
        }>;
      }>;
    };
  };
}

export interface ChatClientOptions {
  model?: string;
  temperature?: number;
  timeoutMs?: number;
  logger?: Logger;
}

export interface ChatExchange {
  reply: string;
  /** The input dialogue plus the new user and assistant turns. */
  dialogue: Turn[];
}

const DEFAULT_MODEL = "gpt-4o-mini";
const DEFAULT_TIMEOUT_MS = 120_000;

export class ChatClient {
  private readonly client: OpenAIChatClient;
  private readonly model: string;
  private readonly temperature: number | undefined;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(client: OpenAIChatClient, options: ChatClientOptions = {}) {
    this.client = client;
    this.model = options.model ?? DEFAULT_MODEL;
    this.temperature = options.temperature;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = options.logger ?? createLogger("ChatClient");
  }

  /**
   * Returns the assistant's reply to the given dialogue. The caller owns
   * appending it; see {@link ask}.
   *
   * @throws ChatFailedError on provider errors, timeouts, or an empty completion.
   */
  async reply(dialogue: readonly Turn[]): Promise<string> {
    let content: string | null | undefined;
    try {
      const completion = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: dialogue.map((turn) => ({ role: turn.role, content: turn.content })),
          ...(this.temperature !== undefined ? { temperature: this.temperature } : {}),
        },
        { timeout: this.timeoutMs },
      );
      content = completion.choices[0]?.message.content;
    } catch (err) {
      throw new ChatFailedError(`Chat completion failed (${this.model})`, err);
    }

    const reply = content?.trim() ?? "";
    if (reply.length === 0) {
      throw new ChatFailedError("Chat completion returned no content");
    }
    return reply;
  }

  /**
   * Runs one query against the dialogue. The returned dialogue is the input
   * plus exactly two turns (user, assistant); the input array is never
   * modified, so a failure leaves the caller's history as it was.
   */
  async ask(dialogue: readonly Turn[], query: string): Promise<ChatExchange> {
    const userTurn = buildUserTurn(query);
    const prompt = [...dialogue, userTurn];

    const started = Date.now();
    const reply = await this.reply(prompt);
    this.logger.info(
      `Answered query over ${prompt.length} turns in ${Date.now() - started}ms, ${reply.length} chars`,
    );

    return {
      reply,
      dialogue: [...prompt, { role: "assistant", content: reply }],
    };
  }
}
