/**
 * CLI logger for kvconf.
 *
 * All output goes to stderr so stdout stays clean for dumps and lookups.
 */

import type { ParseDiagnostic } from '../schema/index.js';

// ── Core write ──────────────────────────────────────────────

function write(message: string): void {
  process.stderr.write(message + '\n');
}

// ── Public API ──────────────────────────────────────────────

export function detail(message: string): void {
  write(`   ${message}`);
}

export function warn(message: string): void {
  write(`⚠️  ${message}`);
}

export function error(message: string): void {
  write(`💥 ${message}`);
}

export function loaded(entryCount: number, path: string): void {
  write(`📄 Loaded ${String(entryCount)} ${entryCount === 1 ? 'entry' : 'entries'} from ${path}`);
}

/** Truncations are warnings; skipped lines are routine and logged as detail. */
export function diagnostic(d: ParseDiagnostic): void {
  const where = `line ${String(d.line)}`;
  switch (d.reason) {
    case 'line-truncated':
      warn(`${where}: line truncated`);
      return;
    case 'value-truncated':
      warn(`${where}: string value truncated`);
      return;
    case 'comment':
      detail(`${where}: comment skipped`);
      return;
    case 'no-separator':
      detail(`${where}: no '=' found, skipped`);
      return;
    case 'empty-key':
      warn(`${where}: empty key, skipped`);
      return;
  }
}
