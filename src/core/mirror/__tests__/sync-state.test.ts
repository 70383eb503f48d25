// src/core/mirror/__tests__/sync-state.test.ts
import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { SyncStateStore, toDateToken } from '../sync-state.js';
import { makeTempDir, removeTempDir } from '../../__tests__/helpers.js';

describe('toDateToken', () => {
  it('uses the UTC calendar day', () => {
    expect(toDateToken(new Date('2026-03-04T23:30:00-05:00'))).toBe('2026-03-05');
    expect(toDateToken(new Date('2026-11-01T00:00:00Z'))).toBe('2026-11-01');
  });
});

describe('SyncStateStore', () => {
  let root = '';

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('reads a missing file as never synced', async () => {
    const state = new SyncStateStore(path.join(root, 'last_sync_date'));
    expect(await state.readLastSync()).toBeNull();
  });

  it('reads an empty file as never synced', async () => {
    const file = path.join(root, 'last_sync_date');
    await writeFile(file, '\n');
    expect(await new SyncStateStore(file).readLastSync()).toBeNull();
  });

  it('reads an unreadable path as never synced', async () => {
    const file = path.join(root, 'last_sync_date');
    await mkdir(file);
    expect(await new SyncStateStore(file).readLastSync()).toBeNull();
  });

  it('writes the token and creates parent directories', async () => {
    const file = path.join(root, 'deep', 'dir', 'last_sync_date');
    const state = new SyncStateStore(file);

    await state.writeLastSync('2026-10-19');

    expect(await readFile(file, 'utf-8')).toBe('2026-10-19\n');
    expect(await state.readLastSync()).toBe('2026-10-19');
  });
});
