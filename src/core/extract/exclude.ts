// src/core/extract/exclude.ts
import { ArchiveError, ErrorCode } from '../errors.js';

export function compileExcludePatterns(patterns: readonly string[]): RegExp[] {
  return patterns.map((pattern) => {
    try {
      return new RegExp(pattern);
    } catch (error) {
      throw new ArchiveError(
        ErrorCode.VALIDATION,
        `Invalid exclude pattern: ${pattern}`,
        false,
        'Patterns are JavaScript regular expressions',
        { pattern },
        error
      );
    }
  });
}

/** Lazily drops every link that matches one of `patterns`. */
export function* excludeMatching(
  links: Iterable<string>,
  patterns: readonly RegExp[],
  onExcluded?: (url: string, pattern: RegExp) => void
): Generator<string> {
  for (const link of links) {
    const match = patterns.find((pattern) => pattern.test(link));
    if (match) {
      onExcluded?.(link, match);
      continue;
    }
    yield link;
  }
}
