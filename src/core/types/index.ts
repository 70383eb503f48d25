// src/core/types/index.ts

/**
 * A post record as returned by a Danbooru-compatible API.
 * Only `id`, `image_width` and the presence of `md5` are read.
 */
export interface Post {
  id: number;
  image_width: number;
  md5?: string;
  [field: string]: unknown;
}

export interface MediaUrls {
  file_url: string;
  large_file_url: string;
  preview_file_url: string;
}

export interface DecensoredPost extends Post, MediaUrls {
  md5: string;
  file_ext: string;
}

export interface ResolvedIdentity {
  readonly md5: string;
  readonly ext: string;
}

export interface RemoteBatch {
  name: string;
  location: string;
}

export interface SyncSummary {
  fetched: string[];
  skipped: string[];
  failed: Array<{ name: string; error: string }>;
}

export type SyncOutcome =
  | { status: 'fresh'; date: string }
  | { status: 'synced'; date: string; summary: SyncSummary };
