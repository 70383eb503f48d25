// src/cli/commands/sync.ts
import { Command } from 'commander';
import { createOrchestrator, fail } from '../options.js';

export function registerSyncCommand(program: Command): void {
  program
    .command('sync')
    .description('Bring the local dataset mirror up to date')
    .option('--force', 'Sync even if already synced today', false)
    .action(async (options: { force: boolean }, command: Command) => {
      try {
        const outcome = await createOrchestrator(command).ensureFresh({ force: options.force });

        if (outcome.status === 'fresh') {
          console.log(`Already synced on ${outcome.date} (use --force to sync again)`);
          return;
        }

        const { fetched, skipped, failed } = outcome.summary;
        console.log(`Synced on ${outcome.date}: ${fetched.length} fetched, ${skipped.length} up to date, ${failed.length} failed`);
        for (const { name, error } of failed) {
          console.log(`  ✗ ${name}: ${error}`);
        }
      } catch (error) {
        fail(error);
      }
    });
}
