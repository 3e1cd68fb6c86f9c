import type { IncomingHttpHeaders } from 'http';

/**
 * How the credential is located in the request headers.
 * - `bearer`: `<header>: Bearer <token>` (RFC 6750 section 2.1)
 * - `header`: the header value itself, optionally behind a literal prefix
 */
export type TokenExtractionStrategy =
  | { type: 'bearer'; header: string }
  | { type: 'header'; header: string; prefix?: string };

export const DEFAULT_EXTRACTION_STRATEGY: TokenExtractionStrategy = {
  type: 'bearer',
  header: 'authorization',
};

// b64token from RFC 6750; the scheme is matched case-insensitively
const BEARER_PATTERN = /^bearer +([A-Za-z0-9\-._~+/]+=*) *$/i;

function readSingleHeader(headers: IncomingHttpHeaders, name: string): string | undefined {
  const value = headers[name.toLowerCase()];
  // Repeated credentials are ambiguous, treat them as absent
  if (typeof value !== 'string') return undefined;
  return value;
}

/**
 * Pull the candidate token out of the request headers.
 * Returns undefined for a missing header and for a malformed one alike.
 */
export function extractToken(
  headers: IncomingHttpHeaders,
  strategy: TokenExtractionStrategy = DEFAULT_EXTRACTION_STRATEGY
): string | undefined {
  const raw = readSingleHeader(headers, strategy.header);
  if (raw === undefined) return undefined;

  switch (strategy.type) {
    case 'bearer': {
      const match = BEARER_PATTERN.exec(raw);
      return match ? match[1] : undefined;
    }

    case 'header': {
      let value = raw;
      if (strategy.prefix) {
        if (!value.startsWith(strategy.prefix)) return undefined;
        value = value.substring(strategy.prefix.length);
      }
      value = value.trim();
      return value.length > 0 ? value : undefined;
    }
  }
}
