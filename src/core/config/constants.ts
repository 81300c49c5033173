// src/core/config/constants.ts
export const APP_NAME = 'reel-etl';

export const DEFAULT_TIMEOUT = 30000; // 30 seconds
export const DEFAULT_DOWNLOAD_TIMEOUT = 120000; // 2 minutes
export const DEFAULT_ACTOR_WAIT_SECS = 300;
export const DEFAULT_CONCURRENCY = 1;

export const DEFAULT_RETRY = {
  attempts: 1,
  baseDelayMs: 1000,
} as const;

export const APIFY_BASE_URL = 'https://api.apify.com';

export const GEMINI_DEFAULT_MODEL = 'gemini-2.0-flash';
/** Videos above this size go through the file upload API instead of inline data */
export const GEMINI_INLINE_LIMIT_BYTES = 20 * 1024 * 1024;
export const GEMINI_FILE_POLL_INTERVAL_MS = 5000;
export const GEMINI_FILE_POLL_ATTEMPTS = 60;

export const DEFAULT_VIDEO_PREFIX = 'videos/';
export const SESSION_FILE_NAME = 'instagram-session.json';

export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';
