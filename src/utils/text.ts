const WORD_CHAR = '[\\p{L}\\p{N}_]';
const WORD_BOUNDARY = `(?:(?<=${WORD_CHAR})(?!${WORD_CHAR})|(?<!${WORD_CHAR})(?=${WORD_CHAR}))`;

/**
 * Compiles a pattern whose `\b` treats accented letters as word characters,
 * so `\bmañana\b` and `\bde mí\b` match the way a reader expects.
 */
export function wordRegExp(source: string, flags = 'i'): RegExp {
  return new RegExp(source.replaceAll('\\b', WORD_BOUNDARY), `${flags}u`);
}

const EDGE_PUNCTUATION_RE = /^[\s¿?¡!.,;:]+|[\s¿?¡!.,;:]+$/gu;

export function trimPunctuation(text: string): string {
  return text.replace(EDGE_PUNCTUATION_RE, '');
}

/** Cuts by code point so a surrogate pair is never split. */
export function truncate(text: string, maxLength: number): string {
  const codePoints = Array.from(text);
  return codePoints.length > maxLength ? codePoints.slice(0, maxLength).join('') : text;
}
