/**
 * Character counting helpers.
 *
 * gptel stores Emacs buffer positions, which count characters (code points).
 * JS strings are indexed in UTF-16 code units, so the two only agree while the
 * text has no astral characters (emoji and friends take two code units).
 */

/**
 * Number of code points in `text`.
 */
export function codePointLength(text: string): number {
  let count = 0;
  for (let index = 0; index < text.length; index += 1) {
    const code = text.charCodeAt(index);
    if (code >= 0xd800 && code <= 0xdbff && index + 1 < text.length) {
      const next = text.charCodeAt(index + 1);
      if (next >= 0xdc00 && next <= 0xdfff) index += 1;
    }
    count += 1;
  }
  return count;
}

/**
 * Maps code-point positions of one text to UTF-16 string indices.
 */
export interface CharIndex {
  /** Code-point length of the indexed text. */
  readonly length: number;
  /** String index of code-point position `position` (0..length). */
  toStringIndex(position: number): number;
}

export function createCharIndex(text: string): CharIndex {
  const length = codePointLength(text);
  if (length === text.length) {
    return { length, toStringIndex: (position) => position };
  }

  // offsets[i] is the string index where code point i starts.
  const offsets: number[] = [];
  for (let index = 0; index < text.length; index += 1) {
    offsets.push(index);
    const code = text.charCodeAt(index);
    if (code >= 0xd800 && code <= 0xdbff && index + 1 < text.length) {
      const next = text.charCodeAt(index + 1);
      if (next >= 0xdc00 && next <= 0xdfff) index += 1;
    }
  }
  offsets.push(text.length);

  return {
    length,
    toStringIndex: (position) => offsets[position] ?? text.length,
  };
}

/**
 * Truncate to at most `max` code points, replacing the tail with `...`.
 *
 * Text that already fits is returned unchanged.
 */
export function truncateWithEllipsis(text: string, max: number): string {
  const chars = Array.from(text);
  if (chars.length <= max) return text;
  return `${chars.slice(0, Math.max(0, max - 3)).join('')}...`;
}
