#!/usr/bin/env node

import { Command } from 'commander';
import { APP_NAME, APP_VERSION } from '../core/config/constants.js';
import { registerLookupCommand } from './commands/lookup.js';
import { registerDecensorCommand } from './commands/decensor.js';
import { registerSyncCommand } from './commands/sync.js';
import { registerStatusCommand } from './commands/status.js';

export function buildProgram(): Command {
  const program = new Command();

  program
    .name(APP_NAME)
    .description('Resolve withheld MD5 hashes and media URLs of censored Danbooru posts')
    .version(APP_VERSION)
    .option('--data-dir <dir>', 'Local mirror directory')
    .option('--site-url <url>', 'Base URL of the current image server')
    .option('--listing-url <url>', 'Dataset batch listing endpoint')
    .option('--timeout <ms>', 'HTTP timeout in milliseconds')
    .option('--verbose', 'Verbose logging', false);

  registerLookupCommand(program);
  registerDecensorCommand(program);
  registerSyncCommand(program);
  registerStatusCommand(program);

  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  const program = buildProgram();
  await program.parseAsync(argv);
}

if (process.env.NODE_ENV !== 'test') {
  void runCli();
}
