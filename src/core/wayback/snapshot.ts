// src/core/wayback/snapshot.ts
import { ArchiveError, ErrorCode } from '../errors.js';
import { DAY_MS } from '../config/constants.js';
import type { SnapshotInfo } from '../types/index.js';

const TIMESTAMP_PATTERN = /^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalidResponse(message: string): ArchiveError {
  return new ArchiveError(ErrorCode.INVALID_RESPONSE, message);
}

/** Parses a `YYYYMMDDhhmmss` (UTC) Wayback timestamp. */
export function parseWaybackTimestamp(timestamp: string): Date {
  const match = TIMESTAMP_PATTERN.exec(timestamp);
  if (!match) {
    throw invalidResponse(`Malformed snapshot timestamp: ${timestamp}`);
  }

  const [year, month, day, hour, minute, second] = match.slice(1).map(Number);
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));

  // Date.UTC rolls 20230231 over into March; reject instead
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hour ||
    date.getUTCMinutes() !== minute ||
    date.getUTCSeconds() !== second
  ) {
    throw invalidResponse(`Malformed snapshot timestamp: ${timestamp}`);
  }

  return date;
}

export function formatWaybackTimestamp(date: Date): string {
  return date.toISOString().replace(/[-:T]/g, '').slice(0, 14);
}

/**
 * Reads the newest usable snapshot out of an availability API response.
 *
 * The newest entry wins; it only counts when it is `available` with status
 * "200". Returns undefined when there is nothing usable.
 */
export function latestSnapshot(body: unknown): SnapshotInfo | undefined {
  if (!isRecord(body)) {
    throw invalidResponse('Availability response is not a JSON object');
  }

  const snapshots = body.archived_snapshots;
  if (snapshots === undefined || snapshots === null) {
    return undefined;
  }
  if (!isRecord(snapshots)) {
    throw invalidResponse('archived_snapshots is not an object');
  }

  let newest: Record<string, unknown> | undefined;
  let newestTimestamp = '';
  for (const entry of Object.values(snapshots)) {
    if (!isRecord(entry) || typeof entry.timestamp !== 'string') {
      throw invalidResponse('Snapshot entry without a timestamp');
    }
    if (entry.timestamp > newestTimestamp) {
      newest = entry;
      newestTimestamp = entry.timestamp;
    }
  }

  if (!newest || newest.available !== true || newest.status !== '200') {
    return undefined;
  }

  return {
    url: typeof newest.url === 'string' ? newest.url : undefined,
    timestamp: newestTimestamp,
    capturedAt: parseWaybackTimestamp(newestTimestamp),
  };
}

/** A snapshot exactly `thresholdDays` old is still fresh. */
export function isFresh(snapshot: SnapshotInfo, now: Date, thresholdDays: number): boolean {
  return now.getTime() - snapshot.capturedAt.getTime() <= thresholdDays * DAY_MS;
}
