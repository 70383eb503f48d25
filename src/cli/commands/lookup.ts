// src/cli/commands/lookup.ts
import { Command } from 'commander';
import { InvalidInputError } from '../../core/errors.js';
import { createOrchestrator, fail } from '../options.js';

export function parsePostId(value: string): number {
  const postId = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(postId)) {
    throw new InvalidInputError(`Invalid post ID: ${value}`);
  }
  return postId;
}

export function registerLookupCommand(program: Command): void {
  program
    .command('lookup <id>')
    .description('Print the MD5 and extension of a censored post')
    .option('--json', 'Output JSON to stdout', false)
    .action(async (id: string, options: { json: boolean }, command: Command) => {
      try {
        const postId = parsePostId(id);
        const identity = await createOrchestrator(command).find(postId);

        if (options.json) {
          console.log(JSON.stringify(identity ? { id: postId, ...identity } : { id: postId, found: false }));
        }

        if (!identity) {
          if (!options.json) console.error(`Not found: ${postId}`);
          process.exit(1);
          return;
        }

        if (!options.json) {
          console.log(`${identity.md5}.${identity.ext}`);
        }
      } catch (error) {
        fail(error);
      }
    });
}
