// Unicode whitespace (Zs, line/paragraph separators), ASCII controls \t-\r and
// \x1c-\x1f, and NEL. U+FEFF is not whitespace and stays inside its word.
const WHITESPACE_RUN = /[\t-\r\x1c-\x20\x85\xa0\u1680\u2000-\u200a\u2028\u2029\u202f\u205f\u3000]+/u;

/**
 * Number of whitespace-delimited tokens in a review's text. Missing, empty and
 * non-string values count as zero words.
 */
export function countWords(text: unknown): number {
  if (typeof text !== 'string' || text.length === 0) return 0;
  return text.split(WHITESPACE_RUN).filter((token) => token.length > 0).length;
}
