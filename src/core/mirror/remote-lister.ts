// src/core/mirror/remote-lister.ts
import { z } from 'zod';
import type { Logger } from 'pino';
import { ListingError, errorMessage } from '../errors.js';
import type { HttpGet } from '../http.js';
import type { RemoteBatch } from '../types/index.js';
import { compareBatchNames, isBatchName } from './batch-store.js';

const listingEntrySchema = z.object({
  name: z.string(),
  type: z.string(),
  download_url: z.string().nullable().optional(),
});

const listingSchema = z.array(listingEntrySchema);

export interface RemoteBatchListerOptions {
  listingUrl: string;
  httpGet: HttpGet;
  logger: Logger;
  timeoutMs?: number;
}

/**
 * Reads the dataset publisher's directory listing (a JSON array of
 * `{ name, type, download_url }` entries, as served by the GitHub
 * contents API) and returns its batches in ascending order.
 */
export class RemoteBatchLister {
  constructor(private options: RemoteBatchListerOptions) {}

  async listRemoteBatches(): Promise<RemoteBatch[]> {
    const { listingUrl, httpGet, logger, timeoutMs } = this.options;

    let payload: unknown;
    try {
      const response = await httpGet(listingUrl, {
        timeoutMs,
        headers: { Accept: 'application/json' },
      });
      if (!response.ok) {
        throw new ListingError(`Listing request failed: HTTP ${response.status}`, {
          url: listingUrl,
          status: response.status,
        });
      }
      payload = await response.json();
    } catch (error) {
      if (error instanceof ListingError) throw error;
      throw new ListingError(`Could not retrieve batch listing: ${errorMessage(error)}`, {
        url: listingUrl,
      });
    }

    const parsed = listingSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ListingError(`Malformed batch listing: ${parsed.error.issues[0]?.message ?? 'unexpected shape'}`, {
        url: listingUrl,
      });
    }

    const batches: RemoteBatch[] = [];
    for (const entry of parsed.data) {
      if (entry.type !== 'file') continue;
      if (!isBatchName(entry.name)) {
        logger.debug({ name: entry.name }, 'ignoring non-batch listing entry');
        continue;
      }
      if (!entry.download_url) {
        throw new ListingError(`Listing entry ${entry.name} has no download URL`, {
          url: listingUrl,
          name: entry.name,
        });
      }
      batches.push({ name: entry.name, location: entry.download_url });
    }

    batches.sort((a, b) => compareBatchNames(a.name, b.name));
    logger.debug({ count: batches.length }, 'listed remote batches');
    return batches;
  }
}
