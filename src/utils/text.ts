/**
 * ASCII whitespace helpers.
 *
 * Matches the C `isspace` set only. `String.prototype.trim` also strips
 * Unicode spaces (NBSP, U+2028, ...), which must survive as value text.
 */

const SPACE_CODES = new Set([0x20, 0x09, 0x0a, 0x0b, 0x0c, 0x0d]);

export function isSpace(ch: string | undefined): boolean {
  return ch !== undefined && ch.length > 0 && SPACE_CODES.has(ch.charCodeAt(0));
}

export function trimStart(text: string): string {
  let start = 0;
  while (start < text.length && isSpace(text[start])) start++;
  return text.slice(start);
}

export function trimEnd(text: string): string {
  let end = text.length;
  while (end > 0 && isSpace(text[end - 1])) end--;
  return text.slice(0, end);
}

export function trim(text: string): string {
  return trimEnd(trimStart(text));
}

export function isBlank(text: string): boolean {
  for (const ch of text) {
    if (!isSpace(ch)) return false;
  }
  return true;
}
