// src/core/orchestrator.ts
import type { Logger } from 'pino';
import { resolveConfig, type ConfigOverrides, type DecensorConfig } from './config/index.js';
import { getMirrorPaths, type MirrorPaths } from './config/app-dirs.js';
import { createLogger } from './logger.js';
import { createHttpGet, type HttpGet } from './http.js';
import { BatchStore } from './mirror/batch-store.js';
import { SyncStateStore } from './mirror/sync-state.js';
import { RemoteBatchLister } from './mirror/remote-lister.js';
import { BatchFetcher } from './mirror/batch-fetcher.js';
import { SyncCoordinator, type EnsureFreshOptions } from './mirror/sync-coordinator.js';
import { LookupEngine } from './lookup/engine.js';
import { DecensorService } from './decensor/service.js';
import type { DecensoredPost, Post, ResolvedIdentity, SyncOutcome } from './types/index.js';

export interface OrchestratorDeps {
  logger?: Logger;
  httpGet?: HttpGet;
  now?: () => Date;
}

export interface MirrorStatus {
  dataDir: string;
  batchesDir: string;
  lastSync: string | null;
  batchCount: number;
}

/**
 * Wires the mirror, lookup engine and decensor service around one data
 * directory.
 */
export class DecensorOrchestrator {
  readonly config: DecensorConfig;
  readonly paths: MirrorPaths;
  readonly logger: Logger;

  private store: BatchStore;
  private state: SyncStateStore;
  private coordinator: SyncCoordinator;
  private engine: LookupEngine;
  private service: DecensorService;

  constructor(overrides: ConfigOverrides = {}, deps: OrchestratorDeps = {}) {
    this.config = resolveConfig(overrides);
    this.paths = getMirrorPaths(this.config.dataDir);
    this.logger = deps.logger ?? createLogger(this.config.logLevel);

    const httpGet = deps.httpGet ?? createHttpGet(this.config.timeoutMs);

    this.store = new BatchStore(this.paths.batchesDir);
    this.state = new SyncStateStore(this.paths.syncDateFile);

    const lister = new RemoteBatchLister({
      listingUrl: this.config.listingUrl,
      httpGet,
      logger: this.logger,
      timeoutMs: this.config.timeoutMs,
    });
    const fetcher = new BatchFetcher({
      store: this.store,
      httpGet,
      logger: this.logger,
      timeoutMs: this.config.timeoutMs,
    });

    this.coordinator = new SyncCoordinator({
      store: this.store,
      state: this.state,
      lister,
      fetcher,
      logger: this.logger,
      now: deps.now,
    });
    this.engine = new LookupEngine({ store: this.store, sync: this.coordinator });
    this.service = new DecensorService({
      resolver: this.engine,
      siteUrl: this.config.siteUrl,
      logger: this.logger,
    });
  }

  ensureFresh(options?: EnsureFreshOptions): Promise<SyncOutcome> {
    return this.coordinator.ensureFresh(options);
  }

  find(postId: number): Promise<ResolvedIdentity | null> {
    return this.engine.find(postId);
  }

  decensor(post: Post): Promise<Post | DecensoredPost> {
    return this.service.decensor(post);
  }

  decensorIter(posts: Iterable<Post> | AsyncIterable<Post>): AsyncGenerator<Post | DecensoredPost> {
    return this.service.decensorIter(posts);
  }

  async status(): Promise<MirrorStatus> {
    const names = await this.store.listNames();
    return {
      dataDir: this.paths.dataDir,
      batchesDir: this.paths.batchesDir,
      lastSync: await this.state.readLastSync(),
      batchCount: names.length,
    };
  }
}
