// Interview Assistant Bot - Error taxonomy
// Every failure is caught at the boundary of one inbound-event handler and
// turned into a user-facing notice. Only ConfigError is fatal.

export type BotErrorCode =
  | "UNSUPPORTED_FORMAT"
  | "TRANSCRIPTION_FAILED"
  | "CHAT_FAILED"
  | "TRANSPORT_ERROR"
  | "CONFIG_ERROR";

/**
 * Base error with a stable code. The underlying failure, when there is one,
 * is kept on `cause` for logging and never shown to the user.
 */
export class BotError extends Error {
  public readonly code: BotErrorCode;

  constructor(message: string, code: BotErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class UnsupportedFormatError extends BotError {
  public readonly mimeType: string | null;

  constructor(mimeType: string | null) {
    super(`Unsupported audio format: ${mimeType ?? "unknown"}`, "UNSUPPORTED_FORMAT");
    this.mimeType = mimeType;
  }
}

export class TranscriptionFailedError extends BotError {
  constructor(message: string, cause?: unknown) {
    super(message, "TRANSCRIPTION_FAILED", { cause });
  }
}

export class ChatFailedError extends BotError {
  constructor(message: string, cause?: unknown) {
    super(message, "CHAT_FAILED", { cause });
  }
}

export class TransportError extends BotError {
  constructor(message: string, cause?: unknown) {
    super(message, "TRANSPORT_ERROR", { cause });
  }
}

export class ConfigError extends BotError {
  constructor(message: string) {
    super(message, "CONFIG_ERROR");
  }
}

/** Renders an unknown thrown value for a log line. */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause;
    return cause === undefined ? error.message : `${error.message} (cause: ${describeError(cause)})`;
  }
  return String(error);
}
