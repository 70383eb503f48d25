// src/cli/commands/status.ts
import { Command } from 'commander';
import { createOrchestrator, fail } from '../options.js';

export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description('Show the local mirror location and freshness')
    .option('--json', 'Output JSON to stdout', false)
    .action(async (options: { json: boolean }, command: Command) => {
      try {
        const status = await createOrchestrator(command).status();

        if (options.json) {
          console.log(JSON.stringify(status, null, 2));
          return;
        }

        console.log('Data directory:', status.dataDir);
        console.log('Batches:', status.batchCount);
        console.log('Last sync:', status.lastSync ?? 'never');
      } catch (error) {
        fail(error);
      }
    });
}
