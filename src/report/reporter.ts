import type { ConfigStore } from '../core/index.js';
import type { Entry } from '../schema/index.js';
import { JSON_OUTPUT_VERSION } from '../schema/jsonOutput.js';
import type { JsonOutput, JsonOutputEntry } from '../schema/jsonOutput.js';

// Re-export contract types for consumers
export type { JsonOutput, JsonOutputEntry };

// ── JSON generator ───────────────────────────────────────────

export function generateJSON(store: ConfigStore, source: string): JsonOutput {
  const entries = store.entries();
  return {
    version: JSON_OUTPUT_VERSION,
    source,
    count: entries.length,
    entries: entries.map(entryToJSON),
  };
}

function entryToJSON(entry: Entry, index: number): JsonOutputEntry {
  return {
    index,
    key: entry.key,
    kind: entry.kind,
    value: jsonValue(entry),
  };
}

function jsonValue(entry: Entry): number | string {
  if (entry.kind === 'long') return entry.value.toString();
  if (typeof entry.value === 'number' && !Number.isFinite(entry.value)) {
    return String(entry.value);
  }
  return entry.value;
}

// ── Deterministic serialization ─────────────────────────────
// Keys are sorted lexicographically for stable, diffable output.

export function serializeJSON(output: JsonOutput): string {
  return JSON.stringify(output, sortedReplacer, 2);
}

function sortedReplacer(_key: string, value: unknown): unknown {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return value;
  }
  const sorted: Record<string, unknown> = {};
  for (const k of Object.keys(value as Record<string, unknown>).sort()) {
    sorted[k] = (value as Record<string, unknown>)[k];
  }
  return sorted;
}

// ── Markdown generator ───────────────────────────────────────

export function generateMarkdown(store: ConfigStore, source: string): string {
  const lines: string[] = [];

  lines.push(`# ${escapeMarkdownCell(source)}`);
  lines.push('');
  lines.push(`| # | Key | Kind | Value |`);
  lines.push(`|---|-----|------|-------|`);

  store.entries().forEach((entry, index) => {
    lines.push(
      `| ${String(index)} | ${escapeMarkdownCell(entry.key)} | ${entry.kind} | ${escapeMarkdownCell(formatValue(entry))} |`,
    );
  });

  lines.push('');
  lines.push(`${String(store.size)} ${store.size === 1 ? 'entry' : 'entries'}`);

  return lines.join('\n');
}

// ── Helpers ──────────────────────────────────────────────────

function formatValue(entry: Entry): string {
  return String(entry.value);
}

function escapeMarkdownCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}
