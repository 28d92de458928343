// src/core/config/constants.ts
export const APP_NAME = 'pdf-link-archiver';
export const APP_VERSION = '0.1.0';

export const DEFAULT_MAX_REQUEST_RETRIES = 5;
export const DEFAULT_ARCHIVE_THRESHOLD_DAYS = 30;
export const DEFAULT_USER_AGENT = `${APP_NAME}/${APP_VERSION}`;
export const DEFAULT_TIMEOUT = 30000; // 30 seconds

export const WAYBACK_ARCHIVE_ENDPOINT = 'https://web.archive.org/save/';
export const WAYBACK_CHECK_ENDPOINT = 'https://archive.org/wayback/available';

export const DEFAULT_RETRY_POLICY = {
  baseDelayMs: 1000,
  factor: 2,
  maxDelayMs: 30000,
  jitter: 0.2,
} as const;

// Hosts that refuse captures, or are the archive itself
export const EXCLUDED_DOMAINS = [
  'archive.org',
  'jstor.org',
  'diw.de',
  'youtube.com',
  'plato.stanford.edu',
] as const;

export const TRANSIENT_STATUS_CODES: ReadonlySet<number> = new Set([408, 425, 429]);

export const DAY_MS = 24 * 60 * 60 * 1000;
