import { Command } from 'commander';

import { loadCliEnv } from '../config/env.js';
import type { CliEnv } from '../config/env.js';
import { registerDumpCommand, registerGetCommand, registerKeysCommand } from './commands.js';

export function createProgram(env: CliEnv = loadCliEnv()): Command {
  const program = new Command();

  program
    .name('kvconf')
    .description('Inspect key=value config files with inferred value types.')
    .version('0.1.0');

  registerDumpCommand(program, env);
  registerGetCommand(program, env);
  registerKeysCommand(program, env);

  return program;
}
