// src/core/http.ts
import { DEFAULT_TIMEOUT, USER_AGENT } from './config/constants.js';

/** The subset of a fetch `Response` the mirror reads. */
export interface HttpResponse {
  ok: boolean;
  status: number;
  statusText: string;
  text(): Promise<string>;
  json(): Promise<unknown>;
}

export interface HttpGetOptions {
  timeoutMs?: number;
  headers?: Record<string, string>;
}

export type HttpGet = (url: string, options?: HttpGetOptions) => Promise<HttpResponse>;

/**
 * GET through the global fetch with a hard timeout. The timer covers the
 * whole exchange, body included, so callers read the body before it fires.
 */
export function createHttpGet(defaultTimeoutMs: number = DEFAULT_TIMEOUT): HttpGet {
  return async (url, options = {}) => {
    const ctrl = new AbortController();
    const timeoutMs = options.timeoutMs ?? defaultTimeoutMs;
    const timer = setTimeout(() => ctrl.abort(), timeoutMs);
    timer.unref();

    try {
      const res = await fetch(url, {
        headers: { 'User-Agent': USER_AGENT, ...options.headers },
        signal: ctrl.signal,
      });
      // Buffer the body while the timer is still armed.
      const body = await res.text();
      return {
        ok: res.ok,
        status: res.status,
        statusText: res.statusText,
        text: async () => body,
        json: async (): Promise<unknown> => JSON.parse(body),
      };
    } finally {
      clearTimeout(timer);
    }
  };
}
