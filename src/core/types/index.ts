// src/core/types/index.ts
import type { ErrorCode } from '../errors.js';

export interface RetryPolicy {
  baseDelayMs: number;
  factor: number;
  maxDelayMs: number;
  /** Fraction of the nominal delay added at random, 0..1 */
  jitter: number;
}

export interface ClientConfig {
  readonly maxRequestRetries: number;
  readonly archiveThresholdDays: number;
  readonly userAgent: string;
  readonly archiveEndpoint: string;
  readonly checkEndpoint: string;
  readonly requestTimeoutMs: number;
  readonly retry: Readonly<RetryPolicy>;
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface SnapshotInfo {
  url?: string;
  timestamp: string;
  capturedAt: Date;
}

export type FreshnessResult =
  | { fresh: true; snapshot: SnapshotInfo }
  | { fresh: false; snapshot?: SnapshotInfo };

export interface OutcomeError {
  code: ErrorCode;
  message: string;
  retryable: boolean;
  suggestion?: string;
  /** Code of the last attempt's error, when retries ran out */
  lastCode?: ErrorCode;
}

export type ArchiveOutcome =
  | { status: 'already_fresh'; url: string; snapshot: SnapshotInfo }
  | { status: 'archived'; url: string; archiveUrl?: string }
  | { status: 'failed'; url: string; error: OutcomeError };

export type OutcomeStatus = ArchiveOutcome['status'];

export interface RetryEvent {
  /** 1-based number of the attempt that just failed */
  attempt: number;
  delayMs: number;
  error: Error;
}
