// src/core/config/constants.ts
export const APP_NAME = 'booru-decensor';
export const APP_VERSION = '0.1.0';

export const DEFAULT_TIMEOUT = 30000; // 30 seconds
export const DEFAULT_SITE_URL = 'https://danbooru.donmai.us';
export const DEFAULT_LISTING_URL =
  'https://api.github.com/repos/friendlyanon/decensooru/contents/batches';

export const BATCHES_DIRNAME = 'batches';
export const SYNC_DATE_FILENAME = 'last_sync_date';

// Post ID thresholds that decide which media host serves a post.
export const CURRENT_SITE_MIN_ID = 2_800_000;
export const SECOND_LEGACY_MIN_ID = 850_000;
export const SAMPLE_MIN_WIDTH = 850;

export const LEGACY_HOSTS = {
  first: 'https://raikou1.donmai.us',
  second: 'https://raikou2.donmai.us',
  preview: 'https://raikou4.donmai.us',
} as const;

export const USER_AGENT = `${APP_NAME}/${APP_VERSION}`;
