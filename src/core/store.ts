import { readFileSync } from 'node:fs';
import { readFile } from 'node:fs/promises';

import type { Entry, EntryOf, LoadOptions } from '../schema/index.js';
import { resolveLoadOptions } from '../schema/index.js';
import { ConfigLoadError } from './errors.js';
import { parseConfigText } from './parser.js';

/**
 * Typed, read-only view over a parsed `key=value` file.
 *
 * Entries keep file order. Lookups return the first entry with a matching
 * key, so later duplicates are shadowed. Every accessor falls back to the
 * caller's default on a missing key or a kind mismatch, except for the
 * long→int and double→float narrowings.
 */
export class ConfigStore {
  #entries: readonly Entry[];

  private constructor(entries: readonly Entry[]) {
    this.#entries = Object.freeze(entries.map((entry) => Object.freeze({ ...entry })));
  }

  // ── Construction ───────────────────────────────────────────

  static parse(text: string, options?: LoadOptions): ConfigStore {
    return new ConfigStore(parseConfigText(text, resolveLoadOptions(options)));
  }

  /** Reads and parses `path`. Throws `ConfigLoadError` if it cannot be read. */
  static load(path: string, options?: LoadOptions): ConfigStore {
    const resolved = resolveLoadOptions(options);

    let text: string;
    try {
      text = readFileSync(path, 'utf-8');
    } catch (err) {
      throw new ConfigLoadError('OPEN_FAILED', path, { cause: err });
    }

    return new ConfigStore(parseConfigText(text, resolved));
  }

  static async loadAsync(path: string, options?: LoadOptions): Promise<ConfigStore> {
    const resolved = resolveLoadOptions(options);

    let text: string;
    try {
      text = await readFile(path, 'utf-8');
    } catch (err) {
      throw new ConfigLoadError('OPEN_FAILED', path, { cause: err });
    }

    return new ConfigStore(parseConfigText(text, resolved));
  }

  // ── Lifecycle ──────────────────────────────────────────────

  /** Drops every entry. Lookups afterwards miss; a second call does nothing. */
  free(): void {
    this.#entries = Object.freeze([]);
  }

  get size(): number {
    return this.#entries.length;
  }

  entries(): readonly Entry[] {
    return this.#entries;
  }

  // ── Lookup ─────────────────────────────────────────────────

  getPair(key: string): Entry | undefined {
    return this.#entries.find((entry) => entry.key === key);
  }

  getInt(key: string, defaultValue: number): number {
    const entry = this.getPair(key);
    if (entry === undefined) return defaultValue;

    switch (entry.kind) {
      case 'int':
        return entry.value;
      case 'long':
        // Two's-complement wrap, not saturation
        return Number(BigInt.asIntN(32, entry.value));
      default:
        return defaultValue;
    }
  }

  getLong(key: string, defaultValue: bigint): bigint {
    return this.#getExact(key, 'long')?.value ?? defaultValue;
  }

  getFloat(key: string, defaultValue: number): number {
    const entry = this.getPair(key);
    if (entry === undefined) return defaultValue;

    switch (entry.kind) {
      case 'float':
        return entry.value;
      case 'double':
        return Math.fround(entry.value);
      default:
        return defaultValue;
    }
  }

  getDouble(key: string, defaultValue: number): number {
    return this.#getExact(key, 'double')?.value ?? defaultValue;
  }

  getString(key: string, defaultValue: string): string {
    return this.#getExact(key, 'string')?.value ?? defaultValue;
  }

  getChar(key: string, defaultValue: string): string {
    return this.#getExact(key, 'char')?.value ?? defaultValue;
  }

  #getExact<K extends Entry['kind']>(key: string, kind: K): EntryOf<K> | undefined {
    const entry = this.getPair(key);
    return entry !== undefined && isKind(entry, kind) ? entry : undefined;
  }
}

function isKind<K extends Entry['kind']>(entry: Entry, kind: K): entry is EntryOf<K> {
  return entry.kind === kind;
}

// ── Nullable API ─────────────────────────────────────────────

/**
 * Loads `path`, returning null when the file cannot be opened.
 * Invalid options still throw.
 */
export function loadConfig(path: string, options?: LoadOptions): ConfigStore | null {
  try {
    return ConfigStore.load(path, options);
  } catch (err) {
    if (err instanceof ConfigLoadError) return null;
    throw err;
  }
}

export function freeConfig(store: ConfigStore | null | undefined): void {
  store?.free();
}
