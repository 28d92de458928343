// src/core/wayback/client.ts
import { ArchiveError, ErrorCode, toFailedOutcome } from '../errors.js';
import { parseArchivableUrl } from '../url/archivable-url.js';
import { withRetry, type Sleep } from '../retry/backoff.js';
import { request, type RequestContext } from './http.js';
import { isFresh, latestSnapshot } from './snapshot.js';
import type {
  ArchiveOutcome,
  ClientConfig,
  FetchLike,
  FreshnessResult,
  RetryEvent,
} from '../types/index.js';

export type RequestStep = 'check' | 'archive';

export interface WaybackClientOptions {
  /** Transport shared by every request of this client; defaults to the global fetch */
  fetch?: FetchLike;
  sleep?: Sleep;
  random?: () => number;
  now?: () => Date;
  onRetry?: (url: string, step: RequestStep, event: RetryEvent) => void;
  /** Called when the freshness lookup fails and the URL is submitted anyway */
  onFreshnessCheckFailed?: (url: string, error: ArchiveError) => void;
}

export interface CallOptions {
  signal?: AbortSignal;
}

export interface CaptureResult {
  archiveUrl?: string;
}

/**
 * Client for the Wayback Machine availability and Save Page Now endpoints.
 *
 * Holds no per-call state, so one instance can serve any number of
 * concurrent `archiveUrl` calls.
 */
export class WaybackMachineClient {
  readonly config: ClientConfig;
  private readonly options: WaybackClientOptions;
  private readonly fetchImpl: FetchLike;

  constructor(config: ClientConfig, options: WaybackClientOptions = {}) {
    this.config = config;
    this.options = options;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  /**
   * Archives `url` unless a snapshot newer than the configured threshold
   * exists. Never throws for a per-URL problem; the outcome carries it.
   *
   * @example
   * const client = new WaybackMachineClient(createClientConfig());
   * const outcome = await client.archiveUrl('https://example.com/');
   * if (outcome.status === 'failed') console.error(outcome.error.message);
   */
  async archiveUrl(url: string, options: CallOptions = {}): Promise<ArchiveOutcome> {
    try {
      const target = parseArchivableUrl(url);

      let freshness: FreshnessResult | undefined;
      try {
        freshness = await this.checkFreshness(target, options);
      } catch (error) {
        if (!(error instanceof ArchiveError) || error.code === ErrorCode.CANCELLED) {
          throw error;
        }
        // Inconclusive lookup: submit anyway rather than risk skipping a needed capture
        this.options.onFreshnessCheckFailed?.(url, error);
      }

      if (freshness?.fresh) {
        return { status: 'already_fresh', url, snapshot: freshness.snapshot };
      }

      const { archiveUrl } = await this.submitCapture(target, options);
      return { status: 'archived', url, archiveUrl };
    } catch (error) {
      if (error instanceof ArchiveError) {
        return toFailedOutcome(url, error);
      }
      throw error;
    }
  }

  /** Looks up the newest snapshot of `url` and compares it with the threshold. */
  async checkFreshness(url: string | URL, options: CallOptions = {}): Promise<FreshnessResult> {
    const target = typeof url === 'string' ? parseArchivableUrl(url) : url;
    const endpoint = new URL(this.config.checkEndpoint);
    endpoint.searchParams.set('url', target.href);

    const snapshot = await withRetry(
      () =>
        request(endpoint.href, this.requestContext(options.signal, 'application/json'), async (response) => {
          const text = await response.text();
          let body: unknown;
          try {
            body = JSON.parse(text);
          } catch {
            throw new ArchiveError(
              ErrorCode.INVALID_RESPONSE,
              `Availability response is not JSON: ${target.href}`,
              false,
              undefined,
              { url: target.href }
            );
          }
          return latestSnapshot(body);
        }),
      this.retryOptions(target.href, 'check', options.signal)
    );

    if (!snapshot) {
      return { fresh: false };
    }
    const now = this.options.now?.() ?? new Date();
    if (isFresh(snapshot, now, this.config.archiveThresholdDays)) {
      return { fresh: true, snapshot };
    }
    return { fresh: false, snapshot };
  }

  /** Asks the service to capture `url` now. */
  async submitCapture(url: string | URL, options: CallOptions = {}): Promise<CaptureResult> {
    const target = typeof url === 'string' ? parseArchivableUrl(url) : url;
    const endpoint = `${this.config.archiveEndpoint}${target.href}`;

    return withRetry(
      () =>
        request(endpoint, this.requestContext(options.signal), async (response) => {
          const archiveUrl = this.snapshotLocation(response);
          await response.body?.cancel();
          return { archiveUrl };
        }),
      this.retryOptions(target.href, 'archive', options.signal)
    );
  }

  private snapshotLocation(response: Response): string | undefined {
    const location = response.headers.get('content-location');
    if (location && URL.canParse(location, this.config.archiveEndpoint)) {
      return new URL(location, this.config.archiveEndpoint).href;
    }
    if (response.redirected && response.url.includes('/web/')) {
      return response.url;
    }
    return undefined;
  }

  private requestContext(signal: AbortSignal | undefined, accept?: string): RequestContext {
    return {
      fetch: this.fetchImpl,
      userAgent: this.config.userAgent,
      timeoutMs: this.config.requestTimeoutMs,
      signal,
      accept,
    };
  }

  private retryOptions(url: string, step: RequestStep, signal: AbortSignal | undefined) {
    const { onRetry } = this.options;
    return {
      maxRetries: this.config.maxRequestRetries,
      policy: this.config.retry,
      signal,
      sleep: this.options.sleep,
      random: this.options.random,
      onRetry: onRetry ? (event: RetryEvent) => onRetry(url, step, event) : undefined,
    };
  }
}
