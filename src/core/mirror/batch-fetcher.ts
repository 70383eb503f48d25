// src/core/mirror/batch-fetcher.ts
import type { Logger } from 'pino';
import { FetchError, errorMessage } from '../errors.js';
import type { HttpGet } from '../http.js';
import type { RemoteBatch, SyncSummary } from '../types/index.js';
import type { BatchStore } from './batch-store.js';

export interface BatchFetcherOptions {
  store: BatchStore;
  httpGet: HttpGet;
  logger: Logger;
  timeoutMs?: number;
}

export class BatchFetcher {
  constructor(private options: BatchFetcherOptions) {}

  /**
   * Downloads every remote batch missing locally, plus the newest remote
   * batch, which upstream may still be appending to. `remote` must be in
   * ascending batch order. A failed batch is recorded and skipped.
   */
  async syncBatches(remote: RemoteBatch[], localNames: Iterable<string>): Promise<SyncSummary> {
    const { store, logger } = this.options;
    const local = new Set(localNames);
    const summary: SyncSummary = { fetched: [], skipped: [], failed: [] };

    await store.ensureDir();

    const latest = remote.length > 0 ? remote[remote.length - 1].name : undefined;

    for (const batch of remote) {
      if (local.has(batch.name) && batch.name !== latest) {
        summary.skipped.push(batch.name);
        continue;
      }

      try {
        await this.fetchBatch(batch);
        summary.fetched.push(batch.name);
        logger.debug({ batch: batch.name }, 'fetched batch');
      } catch (error) {
        const message = errorMessage(error);
        summary.failed.push({ name: batch.name, error: message });
        logger.warn({ batch: batch.name, err: error }, 'skipping batch that failed to fetch');
      }
    }

    return summary;
  }

  private async fetchBatch(batch: RemoteBatch): Promise<void> {
    const { store, httpGet, timeoutMs } = this.options;

    let content: string;
    try {
      const response = await httpGet(batch.location, { timeoutMs });
      if (!response.ok) {
        throw new FetchError(
          `Batch ${batch.name} request failed: HTTP ${response.status}`,
          batch.name,
          response.status
        );
      }
      content = await response.text();
    } catch (error) {
      if (error instanceof FetchError) throw error;
      const reason = errorMessage(error);
      throw new FetchError(`Batch ${batch.name} download failed: ${reason}`, batch.name);
    }

    await store.write(batch.name, content);
  }
}
