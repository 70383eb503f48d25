// src/index.ts
import { DecensorOrchestrator } from './core/orchestrator.js';
import type { ConfigOverrides } from './core/config/index.js';
import type { DecensoredPost, Post } from './core/types/index.js';

export { DecensorOrchestrator } from './core/orchestrator.js';
export type { MirrorStatus, OrchestratorDeps } from './core/orchestrator.js';
export { resolveConfig } from './core/config/index.js';
export type { ConfigOverrides, DecensorConfig } from './core/config/index.js';
export { buildMediaUrls, sampleExtension } from './core/decensor/urls.js';
export { createHttpGet } from './core/http.js';
export type { HttpGet, HttpResponse } from './core/http.js';
export {
  DecensorError,
  ErrorCode,
  ListingError,
  FetchError,
  MalformedRecordError,
  ConfigError,
  InvalidInputError,
} from './core/errors.js';
export type {
  Post,
  DecensoredPost,
  MediaUrls,
  ResolvedIdentity,
  RemoteBatch,
  SyncSummary,
  SyncOutcome,
} from './core/types/index.js';

/** Decensor one post with the default (or given) configuration. */
export function decensor(post: Post, overrides?: ConfigOverrides): Promise<Post | DecensoredPost> {
  return new DecensorOrchestrator(overrides).decensor(post);
}

/** Decensor a stream of posts, sharing one mirror across all of them. */
export function decensorIter(
  posts: Iterable<Post> | AsyncIterable<Post>,
  overrides?: ConfigOverrides
): AsyncGenerator<Post | DecensoredPost> {
  return new DecensorOrchestrator(overrides).decensorIter(posts);
}
