// src/core/batch/runner.ts
import { ErrorCode } from '../errors.js';
import type { WaybackMachineClient } from '../wayback/client.js';
import type { ArchiveOutcome } from '../types/index.js';

export interface RunOptions {
  links: Iterable<string> | AsyncIterable<string>;
  /** Number of URLs in flight at once (default: 1, sequential) */
  concurrency?: number;
  signal?: AbortSignal;
  jsonl?: boolean;
}

export interface RunSummary {
  total: number;
  archived: number;
  fresh: number;
  skipped: number;
  failed: number;
  duration: number;
  failures: Array<{ url: string; error: string }>;
}

export type OutcomeArchiver = Pick<WaybackMachineClient, 'archiveUrl'>;

async function* toAsync(links: Iterable<string> | AsyncIterable<string>): AsyncGenerator<string> {
  yield* links;
}

export class ArchiveRunner {
  constructor(private client: OutcomeArchiver) {}

  async run(options: RunOptions): Promise<RunSummary> {
    const concurrency = options.concurrency ?? 1;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`Invalid concurrency: ${concurrency}`);
    }

    const startTime = Date.now();
    const summary: RunSummary = {
      total: 0,
      archived: 0,
      fresh: 0,
      skipped: 0,
      failed: 0,
      duration: 0,
      failures: [],
    };

    // One iterator shared by every worker; async generators queue concurrent next() calls
    const links = toAsync(options.links);
    const { signal } = options;

    const worker = async (): Promise<void> => {
      while (!signal?.aborted) {
        const next = await links.next();
        if (next.done) return;

        const outcome = await this.client.archiveUrl(next.value, { signal });
        this.record(outcome, summary);
        if (options.jsonl) {
          console.log(JSON.stringify(outcome));
        }
      }
    };

    await Promise.all(Array.from({ length: concurrency }, worker));

    summary.duration = Date.now() - startTime;
    this.printSummary(summary);
    return summary;
  }

  exitCode(summary: RunSummary): number {
    return summary.failed > 0 ? 1 : 0;
  }

  private record(outcome: ArchiveOutcome, summary: RunSummary): void {
    summary.total++;

    switch (outcome.status) {
      case 'archived':
        summary.archived++;
        console.log(outcome.archiveUrl ? `✓ ${outcome.url} – ${outcome.archiveUrl}` : `✓ ${outcome.url}`);
        break;
      case 'already_fresh':
        summary.fresh++;
        console.log(`⊘ ${outcome.url} (skipped: archived ${outcome.snapshot.capturedAt.toISOString()})`);
        break;
      case 'failed':
        if (outcome.error.code === ErrorCode.EXCLUDED_URL) {
          summary.skipped++;
          console.log(`⊘ ${outcome.url} (skipped: excluded)`);
          break;
        }
        summary.failed++;
        summary.failures.push({ url: outcome.url, error: outcome.error.message });
        console.log(`✗ ${outcome.url} (${outcome.error.code})`);
        break;
    }
  }

  private printSummary(summary: RunSummary): void {
    console.log('\n' + '━'.repeat(50));
    console.log(
      `Summary: ${summary.archived} archived, ${summary.fresh} fresh, ${summary.skipped} skipped, ${summary.failed} failed, ${(summary.duration / 1000).toFixed(1)}s`
    );

    if (summary.failures.length > 0) {
      console.log('\nFailed URLs:');
      summary.failures.forEach(({ url, error }) => {
        console.log(`  - ${url}: ${error}`);
      });
    }
  }
}
