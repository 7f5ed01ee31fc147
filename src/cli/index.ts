/**
 * CLI module — thin wrapper over core.
 * Parses arguments, delegates to core, handles exit codes.
 * No business logic lives here.
 */

export { createProgram } from './program.js';
export { registerDumpCommand, registerGetCommand, registerKeysCommand, lookup } from './commands.js';
