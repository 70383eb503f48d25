// src/core/mirror/sync-coordinator.ts
import type { Logger } from 'pino';
import type { SyncOutcome } from '../types/index.js';
import type { BatchStore } from './batch-store.js';
import type { BatchFetcher } from './batch-fetcher.js';
import type { RemoteBatchLister } from './remote-lister.js';
import { toDateToken, type SyncStateStore } from './sync-state.js';

export interface SyncCoordinatorOptions {
  store: BatchStore;
  state: SyncStateStore;
  lister: RemoteBatchLister;
  fetcher: BatchFetcher;
  logger: Logger;
  now?: () => Date;
}

export interface EnsureFreshOptions {
  /** Refresh even when a sync already ran today. */
  force?: boolean;
}

/**
 * Refreshes the local mirror at most once per UTC day.
 *
 * A listing failure propagates and leaves the date untouched, so the next
 * call tries again. Individual batch failures do not: the day is marked
 * as synced once the fetch pass has run. Concurrent callers share one
 * refresh.
 */
export class SyncCoordinator {
  private now: () => Date;
  private inFlight?: Promise<SyncOutcome>;

  constructor(private options: SyncCoordinatorOptions) {
    this.now = options.now ?? (() => new Date());
  }

  ensureFresh(options: EnsureFreshOptions = {}): Promise<SyncOutcome> {
    if (!this.inFlight) {
      this.inFlight = this.refresh(options).finally(() => {
        this.inFlight = undefined;
      });
    }
    return this.inFlight;
  }

  private async refresh(options: EnsureFreshOptions): Promise<SyncOutcome> {
    const { store, state, lister, fetcher, logger } = this.options;

    const today = toDateToken(this.now());
    const lastSync = await state.readLastSync();

    if (lastSync === today && !options.force) {
      logger.debug({ date: today }, 'mirror already synced today');
      return { status: 'fresh', date: today };
    }

    logger.debug({ lastSync, today, force: options.force ?? false }, 'refreshing mirror');

    const remote = await lister.listRemoteBatches();
    const localNames = await store.listNames();
    const summary = await fetcher.syncBatches(remote, localNames);

    await state.writeLastSync(today);

    logger.info(
      {
        date: today,
        fetched: summary.fetched.length,
        skipped: summary.skipped.length,
        failed: summary.failed.length,
      },
      'mirror sync complete'
    );

    return { status: 'synced', date: today, summary };
  }
}
