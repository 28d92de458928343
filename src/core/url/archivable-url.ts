// src/core/url/archivable-url.ts
import { isIP } from 'node:net';
import { ArchiveError, ErrorCode } from '../errors.js';
import { EXCLUDED_DOMAINS } from '../config/constants.js';

function invalidUrl(input: string): ArchiveError {
  return new ArchiveError(
    ErrorCode.VALIDATION,
    `Invalid URL: ${input}`,
    false,
    'Only public http(s) URLs can be archived',
    { url: input }
  );
}

function isNonPublicIpv4(address: string): boolean {
  const [a, b] = address.split('.').map(Number);
  return (
    a === 0 ||              // unspecified / "this network"
    a === 127 ||            // loopback
    a === 10 ||
    (a === 172 && b >= 16 && b <= 31) ||
    (a === 192 && b === 168) ||
    (a >= 224 && a <= 239)  // multicast
  );
}

function isNonPublicIpv6(address: string): boolean {
  const normalized = address.toLowerCase();
  return normalized === '::1' || normalized === '::' || normalized.startsWith('ff');
}

export function isExcludedHost(hostname: string): boolean {
  const host = hostname.toLowerCase();
  return EXCLUDED_DOMAINS.some((domain) => host.includes(domain));
}

/**
 * Parses `input` and checks that the service can capture it.
 *
 * Throws `VALIDATION` for malformed, non-http(s) or local addresses and
 * `EXCLUDED_URL` for hosts on the built-in exclusion list.
 */
export function parseArchivableUrl(input: string): URL {
  let url: URL;
  try {
    url = new URL(input);
  } catch {
    throw invalidUrl(input);
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw invalidUrl(input);
  }

  const hostname = url.hostname.replace(/^\[|\]$/g, '');
  if (hostname.length === 0) {
    throw invalidUrl(input);
  }

  switch (isIP(hostname)) {
    case 4:
      if (isNonPublicIpv4(hostname)) throw invalidUrl(input);
      break;
    case 6:
      if (isNonPublicIpv6(hostname)) throw invalidUrl(input);
      break;
    default:
      if (hostname.toLowerCase().includes('localhost')) {
        throw invalidUrl(input);
      }
      if (isExcludedHost(hostname)) {
        throw new ArchiveError(
          ErrorCode.EXCLUDED_URL,
          `Excluded URL: ${input}`,
          false,
          undefined,
          { url: input }
        );
      }
  }

  return url;
}
