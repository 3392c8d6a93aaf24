// Shared utilities for the Interview Assistant Bot.

/** Telegram's limit on the text of a single message, in UTF-16 code units. */
export const MAX_MESSAGE_LENGTH = 4096;

// ─── splitMessage ───────────────────────────────────────────────────────────────

/**
 * Split text into chunks no longer than `limit`, for platforms that cap the
 * length of one message.
 *
 * Algorithm:
 *  1. Text that already fits is returned as a single chunk.
 *  2. Otherwise cut at the last blank line ("\n\n") inside the window, then
 *     the last newline, then the last space.
 *  3. With no break inside the window, cut hard at `limit`, one code unit
 *     earlier if that would split a surrogate pair.
 *
 * Separators at a cut are dropped; empty chunks are never emitted.
 *
 * @param text   The text to split.
 * @param limit  Maximum chunk length.
 * @returns      Non-empty chunks, in order.
 */
export function splitMessage(text: string, limit: number = MAX_MESSAGE_LENGTH): string[] {
  if (limit <= 0) {
    throw new RangeError(`limit must be positive, got ${limit}`);
  }

  const chunks: string[] = [];
  let rest = text;

  while (rest.length > limit) {
    const window = rest.slice(0, limit + 1);
    const cut = findBreak(window);

    if (cut === -1) {
      const end = limit > 1 && isHighSurrogate(rest.charCodeAt(limit - 1)) ? limit - 1 : limit;
      chunks.push(rest.slice(0, end));
      rest = rest.slice(end);
      continue;
    }

    const head = rest.slice(0, cut).trimEnd();
    if (head.length > 0) chunks.push(head);
    rest = rest.slice(cut).replace(/^\s+/, "");
  }

  if (rest.trim().length > 0) {
    chunks.push(rest);
  }
  return chunks;
}

// ─── Internal helpers ───────────────────────────────────────────────────────────

/** Index of the preferred break inside the window, or -1. Index 0 is no break. */
function findBreak(window: string): number {
  for (const separator of ["\n\n", "\n", " "]) {
    const at = window.lastIndexOf(separator);
    if (at > 0) return at;
  }
  return -1;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}
