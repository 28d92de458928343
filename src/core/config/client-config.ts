// src/core/config/client-config.ts
import { ArchiveError, ErrorCode } from '../errors.js';
import type { ClientConfig, RetryPolicy } from '../types/index.js';
import {
  DEFAULT_ARCHIVE_THRESHOLD_DAYS,
  DEFAULT_MAX_REQUEST_RETRIES,
  DEFAULT_RETRY_POLICY,
  DEFAULT_TIMEOUT,
  DEFAULT_USER_AGENT,
  WAYBACK_ARCHIVE_ENDPOINT,
  WAYBACK_CHECK_ENDPOINT,
} from './constants.js';

export type ClientConfigOverrides = Partial<Omit<ClientConfig, 'retry'>> & {
  retry?: Partial<RetryPolicy>;
};

function invalid(field: string, value: unknown, expected: string): ArchiveError {
  return new ArchiveError(
    ErrorCode.INVALID_CONFIG,
    `Invalid ${field}: ${String(value)} (expected ${expected})`,
    false,
    undefined,
    { field }
  );
}

function assertCount(field: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw invalid(field, value, 'a non-negative integer');
  }
}

function assertDelay(field: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw invalid(field, value, 'a non-negative number');
  }
}

function assertEndpoint(field: string, value: string): void {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw invalid(field, value, 'an absolute URL');
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw invalid(field, value, 'an http(s) URL');
  }
}

/**
 * Builds the immutable client configuration.
 *
 * Every field falls back to its default; values are checked here so a bad
 * setting fails at startup instead of on the first request.
 */
export function createClientConfig(overrides: ClientConfigOverrides = {}): ClientConfig {
  const retry: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...overrides.retry };

  const config: ClientConfig = {
    maxRequestRetries: overrides.maxRequestRetries ?? DEFAULT_MAX_REQUEST_RETRIES,
    archiveThresholdDays: overrides.archiveThresholdDays ?? DEFAULT_ARCHIVE_THRESHOLD_DAYS,
    userAgent: overrides.userAgent ?? DEFAULT_USER_AGENT,
    archiveEndpoint: overrides.archiveEndpoint ?? WAYBACK_ARCHIVE_ENDPOINT,
    checkEndpoint: overrides.checkEndpoint ?? WAYBACK_CHECK_ENDPOINT,
    requestTimeoutMs: overrides.requestTimeoutMs ?? DEFAULT_TIMEOUT,
    retry: Object.freeze(retry),
  };

  assertCount('maxRequestRetries', config.maxRequestRetries);
  assertCount('archiveThresholdDays', config.archiveThresholdDays);
  if (config.userAgent.trim().length === 0) {
    throw invalid('userAgent', JSON.stringify(config.userAgent), 'a non-empty string');
  }
  assertEndpoint('archiveEndpoint', config.archiveEndpoint);
  assertEndpoint('checkEndpoint', config.checkEndpoint);
  if (!Number.isInteger(config.requestTimeoutMs) || config.requestTimeoutMs <= 0) {
    throw invalid('requestTimeoutMs', config.requestTimeoutMs, 'a positive integer');
  }

  assertDelay('retry.baseDelayMs', retry.baseDelayMs);
  assertDelay('retry.maxDelayMs', retry.maxDelayMs);
  if (retry.maxDelayMs < retry.baseDelayMs) {
    throw invalid('retry.maxDelayMs', retry.maxDelayMs, `at least ${retry.baseDelayMs}`);
  }
  if (!Number.isFinite(retry.factor) || retry.factor < 1) {
    throw invalid('retry.factor', retry.factor, 'a number >= 1');
  }
  if (!Number.isFinite(retry.jitter) || retry.jitter < 0 || retry.jitter > 1) {
    throw invalid('retry.jitter', retry.jitter, 'a number between 0 and 1');
  }

  return Object.freeze(config);
}
