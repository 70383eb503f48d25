// src/core/__tests__/http.test.ts
import { describe, it, expect, afterEach, jest } from '@jest/globals';
import { createHttpGet } from '../http.js';
import { USER_AGENT } from '../config/constants.js';

describe('createHttpGet', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('buffers the body and exposes status, text and json', async () => {
    const fetchSpy = jest
      .spyOn(globalThis, 'fetch')
      .mockResolvedValue(new Response('[{"name":"1"}]', { status: 200, statusText: 'OK' }));

    const response = await createHttpGet(5000)('https://listing.test/batches', {
      headers: { Accept: 'application/json' },
    });

    expect(response.ok).toBe(true);
    expect(response.status).toBe(200);
    expect(await response.text()).toBe('[{"name":"1"}]');
    expect(await response.json()).toEqual([{ name: '1' }]);

    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe('https://listing.test/batches');
    expect(init?.headers).toEqual({ 'User-Agent': USER_AGENT, Accept: 'application/json' });
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it('reports error statuses without throwing', async () => {
    jest.spyOn(globalThis, 'fetch').mockResolvedValue(new Response('missing', { status: 404 }));

    const response = await createHttpGet()('https://raw.test/batches/1');

    expect(response.ok).toBe(false);
    expect(response.status).toBe(404);
  });

  it('aborts a request that outlives the timeout', async () => {
    jest.useFakeTimers();
    jest.spyOn(globalThis, 'fetch').mockImplementation(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        })
    );

    try {
      const pending = createHttpGet(2000)('https://raw.test/batches/1');
      jest.advanceTimersByTime(2000);
      await expect(pending).rejects.toThrow('aborted');
    } finally {
      jest.useRealTimers();
    }
  });

  it('honours a timeout shorter than a second', async () => {
    jest.useFakeTimers();
    let signal: AbortSignal | undefined;
    jest.spyOn(globalThis, 'fetch').mockImplementation(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          signal = init?.signal ?? undefined;
          signal?.addEventListener('abort', () => reject(new Error('aborted')));
        })
    );

    try {
      const pending = createHttpGet(30_000)('https://raw.test/batches/1', { timeoutMs: 250 });
      jest.advanceTimersByTime(249);
      expect(signal?.aborted).toBe(false);
      jest.advanceTimersByTime(1);
      expect(signal?.aborted).toBe(true);
      await expect(pending).rejects.toThrow('aborted');
    } finally {
      jest.useRealTimers();
    }
  });
});
