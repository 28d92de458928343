// src/cli/commands/archive.ts
import { Command, InvalidArgumentError } from 'commander';
import { ArchiveRunner } from '../../core/batch/runner.js';
import { createClientConfig } from '../../core/config/client-config.js';
import { compileExcludePatterns, excludeMatching } from '../../core/extract/exclude.js';
import { loadPdfLinks } from '../../core/extract/pdf-links.js';
import { WaybackMachineClient, type WaybackClientOptions } from '../../core/wayback/client.js';

export interface ArchiveCommandOptions {
  exclude: string[];
  maxRetries?: number;
  thresholdDays?: number;
  userAgent?: string;
  timeout?: number;
  concurrency: number;
  jsonl: boolean;
  verbose: boolean;
}

export function parseCount(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Must be a non-negative integer.');
  }
  return Number(value.trim());
}

export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function parsePositive(value: string): number {
  const parsed = parseCount(value);
  if (parsed === 0) {
    throw new InvalidArgumentError('Must be greater than zero.');
  }
  return parsed;
}

export function verboseHooks(): WaybackClientOptions {
  return {
    onRetry: (url, step, { attempt, delayMs, error }) => {
      console.log(`[Retry] ${step} ${url}: attempt ${attempt} failed (${error.message}), retrying in ${delayMs}ms`);
    },
    onFreshnessCheckFailed: (url, error) => {
      console.log(`[Check] ${url}: ${error.message}, archiving anyway`);
    },
  };
}

export function registerArchiveCommand(program: Command): void {
  program
    .argument('<file>', 'PDF file to extract links from')
    .option('--exclude <pattern>', 'Skip URLs matching the regular expression (repeatable)', collect, [])
    .option('--max-retries <n>', 'Retries per request after the first attempt (default: 5)', parseCount)
    .option('--threshold-days <n>', 'Skip URLs archived within this many days (default: 30)', parseCount)
    .option('--user-agent <ua>', 'User-Agent sent to the Wayback Machine')
    .option('--timeout <ms>', 'Per-request timeout in milliseconds (default: 30000)', parsePositive)
    .option('--concurrency <n>', 'URLs archived in parallel', parsePositive, 1)
    .option('--jsonl', 'Print each outcome as a JSON line', false)
    .option('--verbose', 'Verbose output', false)
    .action(async (file: string, options: ArchiveCommandOptions) => {
      const exitCode = await handleArchive(file, options);
      if (exitCode !== 0) {
        process.exit(exitCode);
      }
    });
}

export async function handleArchive(file: string, options: ArchiveCommandOptions): Promise<number> {
  try {
    const config = createClientConfig({
      maxRequestRetries: options.maxRetries,
      archiveThresholdDays: options.thresholdDays,
      userAgent: options.userAgent,
      requestTimeoutMs: options.timeout,
    });
    const patterns = compileExcludePatterns(options.exclude);

    const links = excludeMatching(await loadPdfLinks(file), patterns, (url) => {
      console.log(`⊘ ${url} (skipped: matches --exclude)`);
    });

    const client = new WaybackMachineClient(config, options.verbose ? verboseHooks() : {});
    const runner = new ArchiveRunner(client);

    const controller = new AbortController();
    const onInterrupt = () => {
      console.error('Interrupted, cancelling pending requests');
      controller.abort();
    };
    process.once('SIGINT', onInterrupt);

    try {
      const summary = await runner.run({
        links,
        concurrency: options.concurrency,
        signal: controller.signal,
        jsonl: options.jsonl,
      });
      return runner.exitCode(summary);
    } finally {
      process.removeListener('SIGINT', onInterrupt);
    }
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : error);
    return 1;
  }
}
