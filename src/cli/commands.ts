import type { Command } from 'commander';
import { z, ZodError } from 'zod';

import { ConfigStore } from '../core/index.js';
import { entryKindSchema } from '../schema/index.js';
import type { EntryKind, LoadOptions } from '../schema/index.js';
import { generateJSON, generateMarkdown, serializeJSON } from '../report/index.js';
import { EXIT_CODES } from '../config/defaults.js';
import type { CliEnv } from '../config/env.js';
import * as logger from '../utils/logger.js';

// ── Shared option shapes ─────────────────────────────────────

interface SourceOpts {
  verbose?: true;
  maxLineLength?: string;
  maxValueLength?: string;
}

const limitArgSchema = z.coerce.number().int().positive();

// ── Store loading ────────────────────────────────────────────

function resolveFile(file: string | undefined, env: CliEnv): string {
  const resolved = file ?? env.KVCONF_FILE;
  if (resolved === undefined) {
    throw new Error('No config file given (pass a path or set KVCONF_FILE)');
  }
  return resolved;
}

function openStore(file: string | undefined, opts: SourceOpts, env: CliEnv): { store: ConfigStore; path: string } {
  const path = resolveFile(file, env);
  const verbose = opts.verbose ?? env.KVCONF_VERBOSE;

  const options: LoadOptions = {
    ...(opts.maxLineLength !== undefined ? { maxLineLength: limitArgSchema.parse(opts.maxLineLength) } : {}),
    ...(opts.maxValueLength !== undefined ? { maxValueLength: limitArgSchema.parse(opts.maxValueLength) } : {}),
    ...(verbose ? { onDiagnostic: logger.diagnostic } : {}),
  };

  const store = ConfigStore.load(path, options);
  if (verbose) logger.loaded(store.size, path);
  return { store, path };
}

function withSourceOptions(command: Command): Command {
  return command
    .option('-v, --verbose', 'Report skipped and truncated lines on stderr')
    .option('--max-line-length <n>', 'Characters read per line')
    .option('--max-value-length <n>', 'Characters kept per string value');
}

// ── Error reporting ──────────────────────────────────────────

function describeError(err: unknown): string {
  if (err instanceof ZodError) {
    return err.issues.map((i) => i.message).join(', ');
  }
  return err instanceof Error ? err.message : String(err);
}

function fail(err: unknown): void {
  logger.error(`Error: ${describeError(err)}`);
  process.exitCode = EXIT_CODES.ERROR;
}

// ── Typed lookup ─────────────────────────────────────────────

/** Runs the accessor for `kind`, coercing the CLI default to its type. */
export function lookup(
  store: ConfigStore,
  key: string,
  kind: EntryKind,
  rawDefault: string | undefined,
): string {
  switch (kind) {
    case 'int': {
      const fallback = rawDefault === undefined ? 0 : z.coerce.number().int().parse(rawDefault);
      return String(store.getInt(key, fallback));
    }
    case 'long': {
      const fallback = rawDefault === undefined ? 0n : z.coerce.bigint().parse(rawDefault);
      return store.getLong(key, fallback).toString();
    }
    case 'float': {
      const fallback = rawDefault === undefined ? 0 : z.coerce.number().parse(rawDefault);
      return String(store.getFloat(key, fallback));
    }
    case 'double': {
      const fallback = rawDefault === undefined ? 0 : z.coerce.number().parse(rawDefault);
      return String(store.getDouble(key, fallback));
    }
    case 'string':
      return store.getString(key, rawDefault ?? '');
    case 'char': {
      const fallback = rawDefault === undefined ? '' : z.string().length(1).parse(rawDefault);
      return store.getChar(key, fallback);
    }
  }
}

// ── Command registration ─────────────────────────────────────

export function registerDumpCommand(program: Command, env: CliEnv): void {
  withSourceOptions(
    program
      .command('dump')
      .description('Print every parsed entry with its inferred kind')
      .argument('[file]', 'Config file (defaults to $KVCONF_FILE)')
      .option('--json', 'Output JSON instead of Markdown'),
  ).action((file: string | undefined, opts: SourceOpts & { json?: true }) => {
    try {
      const { store, path } = openStore(file, opts, env);
      const output = opts.json
        ? serializeJSON(generateJSON(store, path))
        : generateMarkdown(store, path);
      process.stdout.write(output + '\n');
    } catch (err) {
      fail(err);
    }
  });
}

export function registerGetCommand(program: Command, env: CliEnv): void {
  withSourceOptions(
    program
      .command('get')
      .description('Look up one key; prints the default when it is missing or of another kind')
      .argument('<key>', 'Key to look up')
      .argument('[file]', 'Config file (defaults to $KVCONF_FILE)')
      .option('-t, --type <kind>', `Value kind: ${entryKindSchema.options.join(', ')}`, 'string')
      .option('-d, --default <value>', 'Fallback value'),
  ).action(
    (
      key: string,
      file: string | undefined,
      opts: SourceOpts & { type: string; default?: string },
    ) => {
      try {
        const kind = entryKindSchema.safeParse(opts.type);
        if (!kind.success) {
          throw new Error(`Unknown type "${opts.type}"`);
        }

        const { store } = openStore(file, opts, env);
        process.stdout.write(lookup(store, key, kind.data, opts.default) + '\n');

        if (store.getPair(key) === undefined) {
          process.exitCode = EXIT_CODES.KEY_MISSING;
        }
      } catch (err) {
        fail(err);
      }
    },
  );
}

export function registerKeysCommand(program: Command, env: CliEnv): void {
  withSourceOptions(
    program
      .command('keys')
      .description('List distinct keys in file order')
      .argument('[file]', 'Config file (defaults to $KVCONF_FILE)'),
  ).action((file: string | undefined, opts: SourceOpts) => {
    try {
      const { store } = openStore(file, opts, env);
      const keys = new Set(store.entries().map((entry) => entry.key));
      for (const key of keys) {
        process.stdout.write(key + '\n');
      }
    } catch (err) {
      fail(err);
    }
  });
}
