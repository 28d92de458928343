// src/core/wayback/http.ts
import { ArchiveError, ErrorCode, cancelled } from '../errors.js';
import { TRANSIENT_STATUS_CODES } from '../config/constants.js';
import type { FetchLike } from '../types/index.js';

export interface RequestContext {
  fetch: FetchLike;
  userAgent: string;
  timeoutMs: number;
  signal?: AbortSignal;
  accept?: string;
}

export function parseRetryAfter(value: string | null, now: number = Date.now()): number | undefined {
  if (!value) return undefined;

  const seconds = Number(value.trim());
  if (Number.isFinite(seconds) && seconds >= 0) {
    return seconds * 1000;
  }

  const date = Date.parse(value);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}

/**
 * Maps a non-2xx response onto an error.
 *
 * 429 is `RATE_LIMITED`, 408/425 and 5xx are `TRANSPORT` (both retryable),
 * any other status is a permanent `REMOTE_REJECTED`. A `Retry-After` on a
 * retryable status lands in `context.retryAfterMs`.
 */
export function errorForStatus(response: Response, url: string): ArchiveError {
  const status = response.status;
  const context: Record<string, unknown> = { url, status };
  const transient = status >= 500 || TRANSIENT_STATUS_CODES.has(status);

  if (!transient) {
    return new ArchiveError(ErrorCode.REMOTE_REJECTED, `Failed (${status}): ${url}`, false, undefined, context);
  }

  const retryAfterMs = parseRetryAfter(response.headers.get('retry-after'));
  if (retryAfterMs !== undefined) {
    context.retryAfterMs = retryAfterMs;
  }

  if (status === 429) {
    return new ArchiveError(
      ErrorCode.RATE_LIMITED,
      `Rate limited (429): ${url}`,
      true,
      'Lower --concurrency or wait before running again',
      context
    );
  }

  return new ArchiveError(ErrorCode.TRANSPORT, `Server error (${status}): ${url}`, true, undefined, context);
}

function transportError(error: unknown, url: string): ArchiveError {
  const cause = error instanceof Error && error.cause instanceof Error ? error.cause : undefined;
  const detail = cause ? `${errorMessage(error)} (${cause.message})` : errorMessage(error);
  return new ArchiveError(
    ErrorCode.TRANSPORT,
    `Request failed: ${detail}`,
    true,
    'Check your network connection',
    { url },
    error
  );
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Sends one GET request and hands a successful response to `handle`.
 *
 * The timeout covers reading the body inside `handle` as well. Nothing is
 * sent when `signal` is already aborted.
 */
export async function request<T>(
  url: string,
  context: RequestContext,
  handle: (response: Response) => Promise<T>
): Promise<T> {
  const { signal } = context;
  if (signal?.aborted) {
    throw cancelled(url);
  }

  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, context.timeoutMs);
  const onAbort = () => controller.abort();
  signal?.addEventListener('abort', onAbort, { once: true });

  try {
    const response = await context.fetch(url, {
      method: 'GET',
      headers: {
        'User-Agent': context.userAgent,
        Accept: context.accept ?? '*/*',
      },
      redirect: 'follow',
      signal: controller.signal,
    });

    if (!response.ok) {
      await response.body?.cancel();
      throw errorForStatus(response, url);
    }

    return await handle(response);
  } catch (error) {
    if (signal?.aborted) {
      throw cancelled(url);
    }
    if (timedOut) {
      throw new ArchiveError(
        ErrorCode.TIMEOUT,
        `Timed out after ${context.timeoutMs}ms: ${url}`,
        true,
        'Increase --timeout',
        { url }
      );
    }
    if (error instanceof ArchiveError) {
      throw error;
    }
    throw transportError(error, url);
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener('abort', onAbort);
  }
}
