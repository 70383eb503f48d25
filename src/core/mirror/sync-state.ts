// src/core/mirror/sync-state.ts
import * as fs from 'fs/promises';
import * as path from 'path';

/** UTC calendar day of `date` as `YYYY-MM-DD`. */
export function toDateToken(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Single-line file holding the UTC date of the last completed sync.
 */
export class SyncStateStore {
  constructor(readonly filePath: string) {}

  /** Last sync date token, or null when the file is missing or unreadable. */
  async readLastSync(): Promise<string | null> {
    try {
      const content = await fs.readFile(this.filePath, 'utf-8');
      const token = content.trim();
      return token.length > 0 ? token : null;
    } catch {
      // Any read failure counts as never synced.
      return null;
    }
  }

  async writeLastSync(token: string): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, `${token}\n`, 'utf-8');
  }
}
