/**
 * Sentence boundary detection for reply→playback pipelining.
 * A boundary is . ! ? (runs allowed) followed by whitespace, or a newline. Punctuation at the very end
 * of the buffer is not a boundary until more text (or the end of the reply) arrives, so "3." + "14"
 * stays one piece.
 */

/** Max characters per playback item when no sentence boundary is found (avoids waiting forever). */
export const DEFAULT_MAX_CHARS_PER_CHUNK = 250;

const SENTENCE_END = /[.!?]+\s+|\n+/g;

export interface FlushResult {
  /** Complete sentence(s) for synthesis (trimmed, non-empty). */
  sentences: string[];
  /** Remaining buffer (incomplete); prepend to the next chunk. */
  remainder: string;
}

function cutLong(text: string, maxChars: number, out: string[]): string {
  let rest = text;
  while (rest.length >= maxChars) {
    const chunk = rest.slice(0, maxChars);
    const lastSpace = chunk.lastIndexOf(" ");
    const cut = lastSpace > chunk.length / 2 ? lastSpace + 1 : maxChars;
    const piece = chunk.slice(0, cut).trim();
    if (piece) out.push(piece);
    rest = rest.slice(cut).trimStart();
  }
  return rest;
}

/**
 * Given the current buffer, extract complete sentences and return the remainder.
 * With `final` (end of reply) the remainder is flushed as a sentence too.
 */
export function flushSentences(
  buffer: string,
  maxChars: number = DEFAULT_MAX_CHARS_PER_CHUNK,
  final = false
): FlushResult {
  const text = buffer.trimStart();
  if (text.trim().length === 0) return { sentences: [], remainder: "" };

  const sentences: string[] = [];
  let lastIndex = 0;
  let match: RegExpExecArray | null;
  SENTENCE_END.lastIndex = 0;
  while ((match = SENTENCE_END.exec(text)) !== null) {
    const sentence = text.slice(lastIndex, match.index + match[0].length);
    const rest = cutLong(sentence.trim(), maxChars, sentences);
    if (rest) sentences.push(rest);
    lastIndex = SENTENCE_END.lastIndex;
  }

  let remainder = cutLong(text.slice(lastIndex), maxChars, sentences);
  if (final) {
    if (remainder.trim()) sentences.push(remainder.trim());
    remainder = "";
  }
  return { sentences, remainder };
}
