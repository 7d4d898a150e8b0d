/**
 * Rough token accounting. One token is taken as four characters of English
 * text; this is an approximation and no tokenizer is consulted.
 */
export const CHARS_PER_TOKEN = 4;

export const TRUNCATION_MARKER = "\n\n[Content truncated for processing]";

const SENTENCE_TERMINATORS = [".", "!", "?"];

// A terminator is only used as the cut point when it falls past this share of the window.
const SENTENCE_CUT_MIN_RATIO = 0.8;

export function estimateTokens(text: string): number {
  return Math.floor(text.length / CHARS_PER_TOKEN);
}

function lastTerminatorIndex(text: string): number {
  return Math.max(...SENTENCE_TERMINATORS.map((terminator) => text.lastIndexOf(terminator)));
}

export function truncateToTokens(text: string, maxTokens: number): string {
  const maxChars = Math.max(0, Math.floor(maxTokens)) * CHARS_PER_TOKEN;
  if (text.length <= maxChars) return text;

  let truncated = text.slice(0, maxChars);
  const cut = lastTerminatorIndex(truncated);
  if (cut > maxChars * SENTENCE_CUT_MIN_RATIO) {
    truncated = truncated.slice(0, cut + 1);
  }
  return `${truncated}${TRUNCATION_MARKER}`;
}
