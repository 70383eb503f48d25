// src/core/lookup/engine.ts
import { MalformedRecordError } from '../errors.js';
import type { BatchStore } from '../mirror/batch-store.js';
import type { ResolvedIdentity } from '../types/index.js';

/** Anything that can bring the mirror up to date before a scan. */
export interface Freshener {
  ensureFresh(): Promise<unknown>;
}

export interface LookupEngineOptions {
  store: BatchStore;
  sync: Freshener;
}

/**
 * Splits the value half of a record (`<md5>.<ext>`) at its last dot.
 */
export function parseMd5Ext(value: string, batch: string, lineNumber: number): ResolvedIdentity {
  const trimmed = value.trimEnd();
  const dot = trimmed.lastIndexOf('.');
  if (dot <= 0 || dot === trimmed.length - 1) {
    throw new MalformedRecordError(
      `Malformed record in batch ${batch} line ${lineNumber}: expected <md5>.<ext>, got "${trimmed}"`,
      batch,
      lineNumber
    );
  }
  return Object.freeze({ md5: trimmed.slice(0, dot), ext: trimmed.slice(dot + 1) });
}

/**
 * Resolves post IDs by a short-circuiting linear scan of every batch file.
 * Nothing is cached between calls; each lookup reads the files again.
 */
export class LookupEngine {
  constructor(private options: LookupEngineOptions) {}

  async find(postId: number): Promise<ResolvedIdentity | null> {
    const { store, sync } = this.options;
    await sync.ensureFresh();

    // Compared as text; parsing every ID in the files is slower.
    const wanted = String(postId);

    for (const batch of await store.listNames()) {
      for await (const { lineNumber, text } of store.lines(batch)) {
        if (text.trim().length === 0) continue;

        const colon = text.indexOf(':');
        if (colon === -1) {
          throw new MalformedRecordError(
            `Malformed record in batch ${batch} line ${lineNumber}: missing ':' separator`,
            batch,
            lineNumber
          );
        }

        if (text.slice(0, colon) === wanted) {
          return parseMd5Ext(text.slice(colon + 1), batch, lineNumber);
        }
      }
    }

    return null;
  }
}
