/**
 * Line normalization for window comparison. Syntax unaware: a `//` or `#`
 * inside a string literal still starts a comment here.
 */

// CRLF, CR and LF, plus VT, FF, the \x1c-\x1e separators, NEL and U+2028/U+2029.
const LINE_BREAK = /\r\n|[\n\r\v\f\x1c-\x1e\x85\u2028\u2029]/;

// Unicode whitespace plus \x1c-\x1f. A U+FEFF byte-order mark is not whitespace and stays.
const WHITESPACE = /[\t\n\v\f\r\x1c-\x1f \x85\xa0\u1680\u2000-\u200a\u2028\u2029\u202f\u205f\u3000]+/g;

/**
 * Strips a trailing `//` comment, then a trailing `#` comment, then every
 * whitespace character. An empty result marks the line as excluded from any window.
 */
export function normalizeLine(raw: string): string {
  const withoutSlashComment = cutAt(raw, "//");
  const withoutHashComment = cutAt(withoutSlashComment, "#");
  return withoutHashComment.replace(WHITESPACE, "");
}

export function normalizeLines(lines: readonly string[]): string[] {
  return lines.map(normalizeLine);
}

export function splitLines(text: string): string[] {
  return text.split(LINE_BREAK);
}

function cutAt(line: string, marker: string): string {
  const idx = line.indexOf(marker);
  return idx === -1 ? line : line.slice(0, idx);
}
