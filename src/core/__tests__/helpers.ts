// src/core/__tests__/helpers.ts
import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import type { HttpGet, HttpResponse } from '../http.js';

export type Route = { status: number; body: string } | Error;

export function textResponse(status: number, body: string): HttpResponse {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText: status === 200 ? 'OK' : 'Error',
    text: async () => body,
    json: async (): Promise<unknown> => JSON.parse(body),
  };
}

/**
 * In-process stand-in for the network: answers GETs from a route table
 * and records every requested URL.
 */
export class FakeHttp {
  readonly calls: string[] = [];
  private routes = new Map<string, Route>();

  route(url: string, route: Route): this {
    this.routes.set(url, route);
    return this;
  }

  json(url: string, value: unknown): this {
    return this.route(url, { status: 200, body: JSON.stringify(value) });
  }

  callsTo(url: string): number {
    return this.calls.filter((call) => call === url).length;
  }

  get: HttpGet = async (url) => {
    this.calls.push(url);
    const route = this.routes.get(url);
    if (!route) {
      return textResponse(404, 'Not Found');
    }
    if (route instanceof Error) {
      throw route;
    }
    return textResponse(route.status, route.body);
  };
}

export const LISTING_URL = 'https://listing.test/batches';

export function batchUrl(name: string): string {
  return `https://raw.test/batches/${name}`;
}

export function listingEntry(name: string): { name: string; type: string; download_url: string } {
  return { name, type: 'file', download_url: batchUrl(name) };
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), 'booru-decensor-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  if (dir) await rm(dir, { recursive: true, force: true });
}

export const MD5_A = '0123456789abcdef0123456789abcdef';
export const MD5_B = 'fedcba9876543210fedcba9876543210';
export const MD5_C = 'aabbccddeeff00112233445566778899';
