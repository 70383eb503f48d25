// src/core/mirror/batch-store.ts
import * as fs from 'fs/promises';
import { createReadStream } from 'fs';
import * as path from 'path';
import { randomBytes } from 'crypto';
import { createInterface } from 'readline';

const BATCH_NAME = /^\d+$/;

export function isBatchName(name: string): boolean {
  return BATCH_NAME.test(name);
}

/**
 * Orders batch names by numeric value without converting them, so names
 * longer than a safe integer still sort correctly.
 */
export function compareBatchNames(a: string, b: string): number {
  const left = a.replace(/^0+(?=\d)/, '');
  const right = b.replace(/^0+(?=\d)/, '');
  if (left.length !== right.length) {
    return left.length - right.length;
  }
  return left < right ? -1 : left > right ? 1 : 0;
}

export interface BatchLine {
  batch: string;
  lineNumber: number;
  text: string;
}

/**
 * Directory of batch files, one file per batch named after it.
 * Writes go through a temp file and a rename, so readers only ever see a
 * complete previous or complete new version.
 */
export class BatchStore {
  constructor(readonly dir: string) {}

  async ensureDir(): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });
  }

  /** Batch names in directory enumeration order. Missing directory reads as empty. */
  async listNames(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.dir);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }
    return entries.filter(isBatchName);
  }

  async write(name: string, content: string | AsyncIterable<string>): Promise<void> {
    if (!isBatchName(name)) {
      throw new Error(`Invalid batch name: ${name}`);
    }
    await this.ensureDir();

    const target = path.join(this.dir, name);
    // Dot-prefixed and non-numeric, so listNames never picks it up.
    const tmp = path.join(this.dir, `.${name}.tmp-${randomBytes(6).toString('hex')}`);
    try {
      await fs.writeFile(tmp, content, 'utf-8');
      await fs.rename(tmp, target);
    } catch (error) {
      await fs.rm(tmp, { force: true });
      throw error;
    }
  }

  async read(name: string): Promise<string | null> {
    try {
      return await fs.readFile(path.join(this.dir, name), 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }

  /** Streams the lines of one batch file. */
  async *lines(name: string): AsyncGenerator<BatchLine> {
    const input = createReadStream(path.join(this.dir, name), { encoding: 'utf-8' });
    const reader = createInterface({ input, crlfDelay: Infinity });
    let lineNumber = 0;
    try {
      for await (const text of reader) {
        lineNumber++;
        yield { batch: name, lineNumber, text };
      }
    } finally {
      reader.close();
      input.destroy();
    }
  }
}

// fs errors can come from another realm (Jest's sandbox), so no instanceof.
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error;
}
