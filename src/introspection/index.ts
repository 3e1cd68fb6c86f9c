import { z } from 'zod';
import type { Logger } from 'pino';
import type {
  IntrospectionClientOptions,
  IntrospectionResult,
  IntrospectionVerdict,
  Introspector,
} from './types.js';

export type {
  IntrospectionClientOptions,
  IntrospectionError,
  IntrospectionResult,
  IntrospectionVerdict,
  Introspector,
} from './types.js';

// Members the core interprets; everything else ends up in `claims`.
// null is accepted for exp/nbf and means the same as absent.
const IntrospectionResponseSchema = z
  .object({
    active: z.boolean(),
    exp: z.number().nonnegative().nullish(),
    nbf: z.number().nonnegative().nullish(),
  })
  .passthrough();

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * HTTP Basic credentials for a confidential client (RFC 6749 section 2.3.1):
 * both parts are form-urlencoded before being joined.
 */
export function basicCredentials(clientId: string, clientSecret: string): string {
  const encode = (value: string) => encodeURIComponent(value).replace(/%20/g, '+');
  const pair = `${encode(clientId)}:${encode(clientSecret)}`;
  return `Basic ${Buffer.from(pair, 'utf-8').toString('base64')}`;
}

/**
 * Turn a response body into a verdict. Unknown members are preserved, never rejected.
 */
export function parseIntrospectionBody(body: string): IntrospectionResult {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (err) {
    return {
      ok: false,
      error: { kind: 'non_parsable_response', message: toError(err).message },
    };
  }

  const parsed = IntrospectionResponseSchema.safeParse(json);
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    return { ok: false, error: { kind: 'non_parsable_response', message } };
  }

  const { active, exp, nbf, ...claims } = parsed.data;
  const verdict: IntrospectionVerdict = Object.freeze({
    active,
    exp: exp ?? undefined,
    nbf: nbf ?? undefined,
    claims: deepFreeze(claims),
  });

  return { ok: true, verdict };
}

// Cached verdicts are shared between requests, nested claims included
function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Performs one round-trip to an RFC 7662 introspection endpoint per call.
 * Nothing is retried here; timeouts come from the request's abort signal.
 */
export class IntrospectionClient implements Introspector {
  private readonly options: IntrospectionClientOptions;
  private readonly logger: Logger;

  constructor(options: IntrospectionClientOptions, logger: Logger) {
    this.options = options;
    this.logger = logger;
  }

  private encodeBody(token: string): string {
    const params = new URLSearchParams({ token });
    if (this.options.tokenTypeHint) {
      params.set('token_type_hint', this.options.tokenTypeHint);
    }
    return params.toString();
  }

  async introspect(token: string): Promise<IntrospectionResult> {
    let body: string;
    try {
      body = this.encodeBody(token);
    } catch (err) {
      return { ok: false, error: { kind: 'unexpected', error: toError(err) } };
    }

    const headers: Record<string, string> = {
      'content-type': 'application/x-www-form-urlencoded',
      accept: 'application/json',
    };
    if (this.options.authorization) {
      headers.authorization = this.options.authorization;
    }

    let status: number;
    let text: string;
    try {
      const response = await fetch(this.options.endpoint, {
        method: 'POST',
        headers,
        body,
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
      status = response.status;
      text = await response.text();
    } catch (err) {
      return { ok: false, error: { kind: 'client_error', error: toError(err) } };
    }

    if (status !== 200) {
      this.logger.warn(
        { status, endpoint: this.options.endpoint },
        'Introspection endpoint refused the request'
      );
      return { ok: false, error: { kind: 'rejected_status', status } };
    }

    return parseIntrospectionBody(text);
  }
}
