export interface TruncatedText {
  text: string;
  truncated: boolean;
  /** Number of characters dropped from the head. */
  omitted: number;
}

/**
 * Keep the last `maxChars` characters of `text`.
 * Failure diagnostics are usually near the end of a log, so the head goes.
 */
export function truncateTail(text: string, maxChars: number): TruncatedText {
  const limit = Math.max(0, Math.floor(maxChars));
  if (text.length <= limit) {
    return { text, truncated: false, omitted: 0 };
  }
  return {
    text: limit === 0 ? "" : text.slice(text.length - limit),
    truncated: true,
    omitted: text.length - limit,
  };
}
