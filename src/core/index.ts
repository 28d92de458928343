// src/core/index.ts
export { WaybackMachineClient } from './wayback/client.js';
export type { WaybackClientOptions, CallOptions, CaptureResult, RequestStep } from './wayback/client.js';
export { createClientConfig } from './config/client-config.js';
export type { ClientConfigOverrides } from './config/client-config.js';
export { ArchiveError, ErrorCode } from './errors.js';
export { withRetry, computeBackoffDelay } from './retry/backoff.js';
export { parseArchivableUrl } from './url/archivable-url.js';
export { loadPdfLinks, readPdfLinks } from './extract/pdf-links.js';
export { compileExcludePatterns, excludeMatching } from './extract/exclude.js';
export { ArchiveRunner } from './batch/runner.js';
export type { RunOptions, RunSummary } from './batch/runner.js';
export type {
  ArchiveOutcome,
  ClientConfig,
  FetchLike,
  FreshnessResult,
  OutcomeError,
  RetryEvent,
  RetryPolicy,
  SnapshotInfo,
} from './types/index.js';
