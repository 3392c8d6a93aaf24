// Interview Assistant Bot - Unknown-command suggestions

export const KNOWN_COMMANDS = ["start", "new", "help"] as const;

export type KnownCommand = (typeof KNOWN_COMMANDS)[number];

/** Minimum similarity (1 − distance / longer length) for a suggestion. */
export const SIMILARITY_THRESHOLD = 0.6;

export const MAX_SUGGESTIONS = 3;

export function isKnownCommand(value: string): value is KnownCommand {
  return KNOWN_COMMANDS.some((command) => command === value);
}

/**
 * Strips a leading "/" and a trailing "@botname", and lowercases.
 * "/Hlep@interview_bot" → "hlep".
 */
export function normalizeCommand(token: string): string {
  const withoutSlash = token.startsWith("/") ? token.slice(1) : token;
  const at = withoutSlash.indexOf("@");
  return (at === -1 ? withoutSlash : withoutSlash.slice(0, at)).toLowerCase();
}

/**
 * Optimal string alignment distance: insertions, deletions, substitutions
 * and transpositions of adjacent characters each cost 1.
 */
export function editDistance(a: string, b: string): number {
  const rows = a.length + 1;
  const cols = b.length + 1;
  const d: number[][] = Array.from({ length: rows }, () => new Array<number>(cols).fill(0));

  for (let i = 0; i < rows; i++) d[i][0] = i;
  for (let j = 0; j < cols; j++) d[0][j] = j;

  for (let i = 1; i < rows; i++) {
    for (let j = 1; j < cols; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      d[i][j] = Math.min(d[i - 1][j] + 1, d[i][j - 1] + 1, d[i - 1][j - 1] + cost);
      if (i > 1 && j > 1 && a[i - 1] === b[j - 2] && a[i - 2] === b[j - 1]) {
        d[i][j] = Math.min(d[i][j], d[i - 2][j - 2] + 1);
      }
    }
  }
  return d[a.length][b.length];
}

export function similarity(a: string, b: string): number {
  const longest = Math.max(a.length, b.length);
  if (longest === 0) return 1;
  return 1 - editDistance(a, b) / longest;
}

/**
 * Returns up to {@link MAX_SUGGESTIONS} known commands whose similarity to
 * the token is at least {@link SIMILARITY_THRESHOLD}, best first; ties keep
 * the order of `known`.
 */
export function suggestCommands(token: string, known: readonly string[] = KNOWN_COMMANDS): string[] {
  const normalized = normalizeCommand(token);
  if (normalized.length === 0) return [];

  return known
    .map((command, index) => ({ command, index, score: similarity(normalized, command) }))
    .filter((candidate) => candidate.score >= SIMILARITY_THRESHOLD)
    .sort((x, y) => y.score - x.score || x.index - y.index)
    .slice(0, MAX_SUGGESTIONS)
    .map((candidate) => candidate.command);
}
