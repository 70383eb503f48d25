// src/cli/commands/decensor.ts
import { Command } from 'commander';
import { BatchRunner, type PostSource } from '../../core/batch/runner.js';
import { createOrchestrator, fail } from '../options.js';

interface DecensorCommandOptions {
  file?: string;
  stdin?: boolean;
  jsonl: boolean;
}

export function resolveSource(json: string | undefined, options: DecensorCommandOptions): PostSource | null {
  if (options.file) return { kind: 'file', path: options.file };
  if (options.stdin) return { kind: 'stdin' };
  if (json && json.length > 0) return { kind: 'inline', text: json };
  return null;
}

export function registerDecensorCommand(program: Command): void {
  program
    .command('decensor')
    .description('Fill in missing MD5 and media URLs of Danbooru post records')
    .argument('[json]', 'Post JSON (optional if using --file or --stdin)')
    .option('--file <path>', 'Read posts from file (JSON or JSON lines)')
    .option('--stdin', 'Read posts from stdin')
    .option('--jsonl', 'Output one JSON post per line', false)
    .action(async (json: string | undefined, options: DecensorCommandOptions, command: Command) => {
      const source = resolveSource(json, options);
      if (!source) {
        console.error('Error: post JSON argument or --file/--stdin is required');
        process.exit(1);
        return;
      }

      try {
        const runner = new BatchRunner(createOrchestrator(command));
        const summary = await runner.run({ source, jsonl: options.jsonl });
        if (summary.unresolved > 0) {
          console.error(`${summary.unresolved} of ${summary.censored} censored posts could not be resolved`);
        }
      } catch (error) {
        fail(error);
      }
    });
}
