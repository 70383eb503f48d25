// src/core/mirror/__tests__/batch-store.test.ts
import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdir, readdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { BatchStore, compareBatchNames, isBatchName, isErrnoException } from '../batch-store.js';
import { makeTempDir, removeTempDir } from '../../__tests__/helpers.js';

describe('batch names', () => {
  it('accepts decimal digits only', () => {
    expect(isBatchName('42')).toBe(true);
    expect(isBatchName('README.md')).toBe(false);
    expect(isBatchName('.42.tmp-abc')).toBe(false);
    expect(isBatchName('')).toBe(false);
  });

  it('orders by numeric value', () => {
    expect(['10', '9', '100', '2'].sort(compareBatchNames)).toEqual(['2', '9', '10', '100']);
  });

  it('ignores leading zeros', () => {
    expect(compareBatchNames('007', '7')).toBe(0);
    expect(compareBatchNames('010', '9')).toBeGreaterThan(0);
  });

  it('orders names beyond the safe integer range', () => {
    expect(compareBatchNames('90071992547409931', '90071992547409930')).toBeGreaterThan(0);
  });
});

describe('isErrnoException', () => {
  it('recognises errors by their code, whatever their prototype', () => {
    expect(isErrnoException(Object.assign(new Error('gone'), { code: 'ENOENT' }))).toBe(true);
    expect(isErrnoException({ code: 'ENOENT', message: 'gone' })).toBe(true);
  });

  it('rejects values without a code', () => {
    expect(isErrnoException(new Error('plain'))).toBe(false);
    expect(isErrnoException('ENOENT')).toBe(false);
    expect(isErrnoException(null)).toBe(false);
  });
});

describe('BatchStore', () => {
  let root = '';
  let store: BatchStore;

  beforeEach(async () => {
    root = await makeTempDir();
    store = new BatchStore(path.join(root, 'nested', 'batches'));
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('lists nothing when the directory does not exist', async () => {
    expect(await store.listNames()).toEqual([]);
  });

  it('creates the directory with parents on write', async () => {
    await store.write('1', '1:abc.jpg\n');

    expect(await store.read('1')).toBe('1:abc.jpg\n');
    expect(await store.listNames()).toEqual(['1']);
  });

  it('lists only batch-named files', async () => {
    await store.ensureDir();
    await writeFile(path.join(store.dir, '5'), '');
    await writeFile(path.join(store.dir, 'README.md'), '');
    await writeFile(path.join(store.dir, '.5.tmp-0a0b'), '');

    expect(await store.listNames()).toEqual(['5']);
  });

  it('replaces existing content', async () => {
    await store.write('3', 'old\n');
    await store.write('3', 'new\n');

    expect(await store.read('3')).toBe('new\n');
  });

  it('keeps previous content and leaves no temp file when a write is interrupted', async () => {
    await store.write('3', '10:aaaa.jpg\n');

    async function* interrupted(): AsyncGenerator<string> {
      yield '10:bbbb.png\n';
      throw new Error('connection reset');
    }

    await expect(store.write('3', interrupted())).rejects.toThrow('connection reset');

    expect(await store.read('3')).toBe('10:aaaa.jpg\n');
    expect(await readdir(store.dir)).toEqual(['3']);
  });

  it('leaves no file behind when the first write of a batch is interrupted', async () => {
    async function* interrupted(): AsyncGenerator<string> {
      yield '10:bbbb.png\n';
      throw new Error('connection reset');
    }

    await expect(store.write('8', interrupted())).rejects.toThrow('connection reset');

    expect(await store.read('8')).toBeNull();
    expect(await readdir(store.dir)).toEqual([]);
  });

  it('rejects names that are not batch names', async () => {
    await expect(store.write('../escape', 'x')).rejects.toThrow('Invalid batch name');
  });

  it('streams lines with their numbers', async () => {
    await store.write('2', '1:aa.jpg\r\n2:bb.png\n3:cc.gif');

    const lines: Array<[number, string]> = [];
    for await (const { lineNumber, text } of store.lines('2')) {
      lines.push([lineNumber, text]);
    }

    expect(lines).toEqual([
      [1, '1:aa.jpg'],
      [2, '2:bb.png'],
      [3, '3:cc.gif'],
    ]);
  });

  it('reads a missing batch as null', async () => {
    await mkdir(store.dir, { recursive: true });
    expect(await store.read('404')).toBeNull();
  });
});
