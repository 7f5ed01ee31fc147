import { z } from 'zod';

import { LIMITS } from '../config/defaults.js';

// ── Diagnostics ─────────────────────────────────────────────

export const diagnosticReasonSchema = z.enum([
  'comment',
  'no-separator',
  'empty-key',
  'line-truncated',
  'value-truncated',
]);

export type DiagnosticReason = z.infer<typeof diagnosticReasonSchema>;

export interface ParseDiagnostic {
  /** 1-based line number in the source text. */
  line: number;
  reason: DiagnosticReason;
  /** The line as seen by the parser, after any truncation. */
  text: string;
}

// ── Load options ────────────────────────────────────────────

export const loadLimitsSchema = z.object({
  maxLineLength: z.number().int().positive().optional().default(LIMITS.MAX_LINE_LENGTH),
  maxValueLength: z.number().int().positive().optional().default(LIMITS.MAX_VALUE_LENGTH),
});

export type LoadLimits = z.infer<typeof loadLimitsSchema>;

export type LoadOptions = z.input<typeof loadLimitsSchema> & {
  onDiagnostic?: (diagnostic: ParseDiagnostic) => void;
};

export interface ResolvedLoadOptions extends LoadLimits {
  onDiagnostic: ((diagnostic: ParseDiagnostic) => void) | undefined;
}

export function resolveLoadOptions(options: LoadOptions = {}): ResolvedLoadOptions {
  const limits = loadLimitsSchema.parse({
    maxLineLength: options.maxLineLength,
    maxValueLength: options.maxValueLength,
  });
  return { ...limits, onDiagnostic: options.onDiagnostic };
}
