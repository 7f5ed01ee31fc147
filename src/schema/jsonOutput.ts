import { z } from 'zod';

import { entryKindSchema } from './entry.js';

// ── Version ─────────────────────────────────────────────────
// Bump this when the contract changes.

export const JSON_OUTPUT_VERSION = '1.0' as const;

// ── Entry output ────────────────────────────────────────────

export const jsonOutputEntrySchema = z.object({
  index: z.number().int().nonnegative(),
  key: z.string().min(1),
  kind: entryKindSchema,
  // bigint and non-finite doubles are emitted as strings
  value: z.union([z.number(), z.string()]),
});

export type JsonOutputEntry = z.infer<typeof jsonOutputEntrySchema>;

// ── Root output ─────────────────────────────────────────────

export const jsonOutputSchema = z.object({
  version: z.literal(JSON_OUTPUT_VERSION),
  source: z.string(),
  count: z.number().int().nonnegative(),
  entries: z.array(jsonOutputEntrySchema),
});

export type JsonOutput = z.infer<typeof jsonOutputSchema>;
