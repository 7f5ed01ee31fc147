import type { Entry, DiagnosticReason, ResolvedLoadOptions } from '../schema/index.js';
import { isSpace, trim, trimEnd } from '../utils/text.js';
import { inferNumber } from './numeric.js';

// ── Public types ─────────────────────────────────────────────

export type LineResult =
  | { ok: true; entry: Entry; valueTruncated: boolean }
  | { ok: false; reason: Extract<DiagnosticReason, 'comment' | 'no-separator' | 'empty-key'> };

// ── Line parsing ─────────────────────────────────────────────

/**
 * Parses a single `key=value` line. The line must already be cut to the
 * line-length limit and must not contain the terminating newline.
 */
export function parseLine(line: string, maxValueLength: number): LineResult {
  if (line.startsWith('#')) {
    return { ok: false, reason: 'comment' };
  }

  const separator = line.indexOf('=');
  if (separator === -1) {
    return { ok: false, reason: 'no-separator' };
  }

  const key = trim(line.slice(0, separator));
  if (key.length === 0) {
    return { ok: false, reason: 'empty-key' };
  }

  const rawValue = line.slice(separator + 1);

  const numeric = inferNumber(rawValue);
  if (numeric !== null) {
    return { ok: true, entry: { key, ...numeric }, valueTruncated: false };
  }

  const { text, truncated } = extractString(rawValue, maxValueLength);
  return { ok: true, entry: { key, kind: 'string', value: text }, valueTruncated: truncated };
}

function extractString(
  raw: string,
  maxLength: number,
): { text: string; truncated: boolean } {
  let start = 0;
  while (start < raw.length && (isSpace(raw[start]) || raw[start] === '=')) {
    start++;
  }

  const text = trimEnd(raw.slice(start));
  if (text.length <= maxLength) {
    return { text, truncated: false };
  }

  // Re-trim so a cut landing on whitespace keeps the value trimmed
  return { text: trimEnd(text.slice(0, maxLength)), truncated: true };
}

// ── Document parsing ─────────────────────────────────────────

export function parseConfigText(
  text: string,
  options: ResolvedLoadOptions,
): Entry[] {
  const entries: Entry[] = [];
  const report = options.onDiagnostic;
  const lines = text.split('\n');
  // A final newline terminates the last line rather than opening a new one
  if (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();

  lines.forEach((rawLine, index) => {
    const lineNumber = index + 1;

    let line = rawLine;
    if (line.length > options.maxLineLength) {
      line = line.slice(0, options.maxLineLength);
      report?.({ line: lineNumber, reason: 'line-truncated', text: line });
    }

    const result = parseLine(line, options.maxValueLength);
    if (!result.ok) {
      report?.({ line: lineNumber, reason: result.reason, text: line });
      return;
    }

    if (result.valueTruncated) {
      report?.({ line: lineNumber, reason: 'value-truncated', text: line });
    }
    entries.push(result.entry);
  });

  return entries;
}
