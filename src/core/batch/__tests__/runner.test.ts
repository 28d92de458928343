// src/core/batch/__tests__/runner.test.ts
import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { ArchiveRunner, type OutcomeArchiver } from '../runner.js';
import { ErrorCode } from '../../errors.js';
import type { ArchiveOutcome } from '../../types/index.js';

type ArchiveUrl = OutcomeArchiver['archiveUrl'];

const archived = (url: string): ArchiveOutcome => ({ status: 'archived', url });
const fresh = (url: string): ArchiveOutcome => ({
  status: 'already_fresh',
  url,
  snapshot: { timestamp: '20260101000000', capturedAt: new Date('2026-01-01T00:00:00.000Z') },
});
const failed = (url: string, code: ErrorCode, message: string): ArchiveOutcome => ({
  status: 'failed',
  url,
  error: { code, message, retryable: false },
});

describe('ArchiveRunner', () => {
  let logSpy: jest.SpiedFunction<typeof console.log>;
  let archiveUrl: jest.Mock<ArchiveUrl>;
  let runner: ArchiveRunner;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    archiveUrl = jest.fn<ArchiveUrl>((url) => Promise.resolve(archived(url)));
    runner = new ArchiveRunner({ archiveUrl });
  });

  afterEach(() => {
    logSpy.mockRestore();
  });

  const lines = () => logSpy.mock.calls.map((args) => args.join(' '));

  it('archives links sequentially in source order', async () => {
    const summary = await runner.run({ links: ['https://a.example/', 'https://b.example/'] });

    expect(archiveUrl.mock.calls.map(([url]) => url)).toEqual(['https://a.example/', 'https://b.example/']);
    expect(summary).toEqual({
      total: 2,
      archived: 2,
      fresh: 0,
      skipped: 0,
      failed: 0,
      duration: expect.any(Number),
      failures: [],
    });
    expect(runner.exitCode(summary)).toBe(0);
  });

  it('tallies every kind of outcome and logs one line per URL', async () => {
    archiveUrl
      .mockResolvedValueOnce({ status: 'archived', url: 'https://a.example/', archiveUrl: 'https://web.archive.org/web/1/https://a.example/' })
      .mockResolvedValueOnce(fresh('https://b.example/'))
      .mockResolvedValueOnce(failed('https://archive.org/x', ErrorCode.EXCLUDED_URL, 'Excluded URL: https://archive.org/x'))
      .mockResolvedValueOnce(failed('https://d.example/', ErrorCode.REMOTE_REJECTED, 'Failed (403): https://d.example/'));

    const summary = await runner.run({
      links: ['https://a.example/', 'https://b.example/', 'https://archive.org/x', 'https://d.example/'],
    });

    expect(summary).toMatchObject({ total: 4, archived: 1, fresh: 1, skipped: 1, failed: 1 });
    expect(summary.failures).toEqual([{ url: 'https://d.example/', error: 'Failed (403): https://d.example/' }]);
    expect(runner.exitCode(summary)).toBe(1);

    const output = lines();
    expect(output.slice(0, 4)).toEqual([
      '✓ https://a.example/ – https://web.archive.org/web/1/https://a.example/',
      '⊘ https://b.example/ (skipped: archived 2026-01-01T00:00:00.000Z)',
      '⊘ https://archive.org/x (skipped: excluded)',
      '✗ https://d.example/ (remote_rejected)',
    ]);
    expect(output).toContainEqual(expect.stringMatching(/^Summary: 1 archived, 1 fresh, 1 skipped, 1 failed, \d+\.\ds$/));
    expect(output).toContain('  - https://d.example/: Failed (403): https://d.example/');
  });

  it('does not fail the run for excluded URLs', async () => {
    archiveUrl.mockResolvedValue(failed('https://youtube.com/v', ErrorCode.EXCLUDED_URL, 'Excluded URL: https://youtube.com/v'));

    const summary = await runner.run({ links: ['https://youtube.com/v'] });

    expect(runner.exitCode(summary)).toBe(0);
  });

  it('keeps going after a failed URL', async () => {
    archiveUrl
      .mockResolvedValueOnce(failed('https://a.example/', ErrorCode.RETRIES_EXHAUSTED, 'Gave up after 6 attempts'))
      .mockResolvedValueOnce(archived('https://b.example/'));

    const summary = await runner.run({ links: ['https://a.example/', 'https://b.example/'] });

    expect(archiveUrl).toHaveBeenCalledTimes(2);
    expect(summary).toMatchObject({ archived: 1, failed: 1 });
  });

  it('accepts an async link source', async () => {
    async function* links() {
      yield 'https://a.example/';
      yield 'https://b.example/';
    }

    const summary = await runner.run({ links: links() });

    expect(summary.total).toBe(2);
  });

  it('keeps at most `concurrency` calls in flight', async () => {
    let inFlight = 0;
    let peak = 0;
    archiveUrl.mockImplementation(async (url) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setImmediate(resolve));
      inFlight--;
      return archived(url);
    });
    const links = ['1', '2', '3', '4', '5'].map((n) => `https://example.com/${n}`);

    const summary = await runner.run({ links, concurrency: 2 });

    expect(peak).toBe(2);
    expect(summary.total).toBe(5);
    expect(archiveUrl.mock.calls.map(([url]) => url).sort()).toEqual(links);
  });

  it('passes the signal to each call and stops pulling links once aborted', async () => {
    const controller = new AbortController();
    archiveUrl.mockImplementation(async (url, options) => {
      expect(options?.signal).toBe(controller.signal);
      controller.abort();
      return archived(url);
    });

    const summary = await runner.run({
      links: ['https://a.example/', 'https://b.example/'],
      signal: controller.signal,
    });

    expect(archiveUrl).toHaveBeenCalledTimes(1);
    expect(summary.total).toBe(1);
  });

  it('prints each outcome as JSON with jsonl', async () => {
    await runner.run({ links: ['https://a.example/'], jsonl: true });

    expect(lines()).toContain('{"status":"archived","url":"https://a.example/"}');
  });

  it('returns an empty summary for no links', async () => {
    const summary = await runner.run({ links: [] });

    expect(summary).toMatchObject({ total: 0, archived: 0, failed: 0, failures: [] });
    expect(archiveUrl).not.toHaveBeenCalled();
  });

  it('rejects an invalid concurrency', async () => {
    await expect(runner.run({ links: [], concurrency: 0 })).rejects.toThrow('Invalid concurrency: 0');
  });
});
