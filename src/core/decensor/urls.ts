// src/core/decensor/urls.ts
import {
  CURRENT_SITE_MIN_ID,
  LEGACY_HOSTS,
  SAMPLE_MIN_WIDTH,
  SECOND_LEGACY_MIN_ID,
} from '../config/constants.js';
import type { MediaUrls, ResolvedIdentity } from '../types/index.js';

/** Animated posts stored as zip archives get webm samples. */
export function sampleExtension(ext: string): string {
  return ext === 'zip' ? 'webm' : ext;
}

function md5Prefix(md5: string): string {
  return `${md5.slice(0, 2)}/${md5.slice(2, 4)}`;
}

export function legacyHost(postId: number): string {
  return postId > SECOND_LEGACY_MIN_ID ? LEGACY_HOSTS.second : LEGACY_HOSTS.first;
}

/**
 * Rebuilds the file, sample and preview URLs of a post. Newer posts live
 * under the site's own `/data` path; older ones on the legacy hosts, under
 * a two-level directory taken from the start of the hash.
 */
export function buildMediaUrls(
  post: { id: number; image_width: number },
  identity: ResolvedIdentity,
  siteUrl: string
): MediaUrls {
  const { md5, ext } = identity;
  const sampleExt = sampleExtension(ext);
  const prefix = md5Prefix(md5);

  let fileUrl: string;
  let sampleUrl: string;

  if (post.id > CURRENT_SITE_MIN_ID) {
    const base = siteUrl.replace(/\/+$/, '');
    fileUrl = `${base}/data/${md5}.${ext}`;
    sampleUrl = `${base}/data/sample/sample-${md5}.${sampleExt}`;
  } else {
    const base = legacyHost(post.id);
    fileUrl = `${base}/${prefix}/${md5}.${ext}`;
    sampleUrl = `${base}/sample/${prefix}/sample-${md5}.${sampleExt}`;
  }

  if (post.image_width < SAMPLE_MIN_WIDTH) {
    sampleUrl = fileUrl;
  }

  return {
    file_url: fileUrl,
    large_file_url: sampleUrl,
    preview_file_url: `${LEGACY_HOSTS.preview}/preview/${prefix}/${md5}.jpg`,
  };
}
