// src/cli/options.ts
import type { Command } from 'commander';
import { ConfigError, formatError } from '../core/errors.js';
import type { ConfigOverrides } from '../core/config/index.js';
import { DecensorOrchestrator } from '../core/orchestrator.js';

export type GlobalOptions = {
  dataDir?: string;
  siteUrl?: string;
  listingUrl?: string;
  timeout?: string;
  verbose?: boolean;
};

export function toOverrides(options: GlobalOptions): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  if (options.dataDir) overrides.dataDir = options.dataDir;
  if (options.siteUrl) overrides.siteUrl = options.siteUrl;
  if (options.listingUrl) overrides.listingUrl = options.listingUrl;
  if (options.timeout !== undefined) {
    const timeoutMs = Number(options.timeout);
    if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
      throw new ConfigError(`Invalid timeout: ${options.timeout}`, { field: 'timeoutMs' });
    }
    overrides.timeoutMs = timeoutMs;
  }
  if (options.verbose) overrides.logLevel = 'debug';
  return overrides;
}

export function createOrchestrator(command: Command): DecensorOrchestrator {
  return new DecensorOrchestrator(toOverrides(command.optsWithGlobals<GlobalOptions>()));
}

export function fail(error: unknown): void {
  console.error('Error:', formatError(error));
  process.exit(1);
}
