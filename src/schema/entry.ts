import { z } from 'zod';

import { INT32 } from '../config/defaults.js';
import { trim } from '../utils/text.js';

// ── Kind ────────────────────────────────────────────────────

export const entryKindSchema = z.enum([
  'int',
  'long',
  'float',
  'double',
  'string',
  'char',
]);

export type EntryKind = z.infer<typeof entryKindSchema>;

// ── Entry ───────────────────────────────────────────────────

const keySchema = z
  .string()
  .min(1)
  .refine((key) => trim(key) === key, {
    message: 'key must not have leading or trailing whitespace',
  });

export const intEntrySchema = z.object({
  key: keySchema,
  kind: z.literal('int'),
  value: z.number().int().min(INT32.MIN).max(INT32.MAX),
});

export const longEntrySchema = z.object({
  key: keySchema,
  kind: z.literal('long'),
  value: z.bigint(),
});

export const floatEntrySchema = z.object({
  key: keySchema,
  kind: z.literal('float'),
  value: z.number(),
});

export const doubleEntrySchema = z.object({
  key: keySchema,
  kind: z.literal('double'),
  // NaN and ±Infinity are valid parse results
  value: z.union([z.number(), z.nan()]),
});

export const stringEntrySchema = z.object({
  key: keySchema,
  kind: z.literal('string'),
  value: z.string(),
});

export const charEntrySchema = z.object({
  key: keySchema,
  kind: z.literal('char'),
  value: z.string().length(1),
});

export const entrySchema = z.discriminatedUnion('kind', [
  intEntrySchema,
  longEntrySchema,
  floatEntrySchema,
  doubleEntrySchema,
  stringEntrySchema,
  charEntrySchema,
]);

/** Entries are read-only once parsed; stores hand out frozen objects. */
export type Entry = Readonly<z.infer<typeof entrySchema>>;

/** Narrows `Entry` to the variant tagged `K`. */
export type EntryOf<K extends EntryKind> = Extract<Entry, { kind: K }>;
