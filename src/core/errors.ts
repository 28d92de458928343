// src/core/errors.ts
import type { ArchiveOutcome } from './types/index.js';

export enum ErrorCode {
  VALIDATION = 'validation',
  EXCLUDED_URL = 'excluded_url',
  TRANSPORT = 'transport',
  TIMEOUT = 'timeout',
  RATE_LIMITED = 'rate_limited',
  REMOTE_REJECTED = 'remote_rejected',
  INVALID_RESPONSE = 'invalid_response',
  RETRIES_EXHAUSTED = 'retries_exhausted',
  CANCELLED = 'cancelled',
  INVALID_CONFIG = 'invalid_config',
  PDF_LOAD_FAILED = 'pdf_load_failed',
}

export class ArchiveError extends Error {
  code: ErrorCode;
  retryable: boolean;
  suggestion?: string;
  context?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    retryable: boolean = false,
    suggestion?: string,
    context?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'ArchiveError';
    this.code = code;
    this.retryable = retryable;
    this.suggestion = suggestion;
    this.context = context;
  }
}

export function isArchiveError(error: unknown, code?: ErrorCode): error is ArchiveError {
  return error instanceof ArchiveError && (code === undefined || error.code === code);
}

export function retriesExhausted(attempts: number, lastError: ArchiveError): ArchiveError {
  return new ArchiveError(
    ErrorCode.RETRIES_EXHAUSTED,
    `Gave up after ${attempts} attempts: ${lastError.message}`,
    false,
    lastError.suggestion,
    { attempts, lastCode: lastError.code },
    lastError
  );
}

export function cancelled(url?: string): ArchiveError {
  return new ArchiveError(
    ErrorCode.CANCELLED,
    url ? `Cancelled: ${url}` : 'Cancelled',
    false,
    undefined,
    url ? { url } : undefined
  );
}

export function toFailedOutcome(url: string, error: ArchiveError): Extract<ArchiveOutcome, { status: 'failed' }> {
  return {
    status: 'failed',
    url,
    error: {
      code: error.code,
      message: error.message,
      retryable: error.retryable,
      suggestion: error.suggestion,
      ...(error.cause instanceof ArchiveError ? { lastCode: error.cause.code } : {}),
    },
  };
}
