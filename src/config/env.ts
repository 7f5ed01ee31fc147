import { z } from 'zod';

// ── Env schema ───────────────────────────────────────────────

const truthy = new Set(['1', 'true', 'yes']);

export const cliEnvSchema = z.object({
  KVCONF_FILE: z.string().min(1).optional(),
  KVCONF_VERBOSE: z
    .string()
    .optional()
    .transform((raw) => raw !== undefined && truthy.has(raw.trim().toLowerCase())),
});

export type CliEnv = z.infer<typeof cliEnvSchema>;

// ── Env loader ───────────────────────────────────────────────

export function loadCliEnv(env: NodeJS.ProcessEnv = process.env): CliEnv {
  return cliEnvSchema.parse({
    KVCONF_FILE: env['KVCONF_FILE'] || undefined,
    KVCONF_VERBOSE: env['KVCONF_VERBOSE'],
  });
}
