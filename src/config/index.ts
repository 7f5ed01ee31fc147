/**
 * Configuration module.
 * Parser limits, exit codes, and the CLI's environment settings.
 */

export { LIMITS, INT32, INT64, EXIT_CODES } from './defaults.js';
export { cliEnvSchema, loadCliEnv } from './env.js';
export type { CliEnv } from './env.js';
