import type { Logger } from 'pino';
import { extractToken } from '../extraction/index.js';
import { VerdictCache, tokenFingerprint } from '../cache/index.js';
import type { LoadResult } from '../cache/index.js';
import { IntrospectionClient, toError } from '../introspection/index.js';
import type { IntrospectionError, Introspector } from '../introspection/types.js';
import type {
  DenyCategory,
  DenyReason,
  FilterDependencies,
  FilterOutcome,
  FilterSettings,
  RequestHeaders,
} from './types.js';

export * from './types.js';

export function denyCategory(reason: DenyReason): DenyCategory {
  switch (reason.kind) {
    case 'no_token':
    case 'inactive_token':
    case 'expired_token':
    case 'not_yet_active':
      return 'security';
    case 'client_error':
    case 'non_parsable_response':
    case 'unexpected':
      return 'infrastructure';
  }
}

function denialFor(error: IntrospectionError): DenyReason {
  switch (error.kind) {
    case 'client_error':
      return { kind: 'client_error', error: error.error };
    case 'non_parsable_response':
      return { kind: 'non_parsable_response', message: error.message };
    // The authority would not vouch for the token
    case 'rejected_status':
      return { kind: 'inactive_token', status: error.status };
    case 'unexpected':
      return { kind: 'unexpected', error: error.error };
  }
}

/**
 * Decide whether a request may proceed, from its headers alone.
 *
 * Steps run in a fixed order and stop at the first denial: extraction,
 * verdict lookup, activity, expiry, not-before. The clock is read once, after
 * the verdict is known. Never rejects.
 */
export async function evaluateRequest(
  headers: RequestHeaders,
  deps: FilterDependencies
): Promise<FilterOutcome> {
  const token = extractToken(headers, deps.strategy);
  if (token === undefined) {
    return { decision: 'deny', reason: { kind: 'no_token' } };
  }

  const fingerprint = tokenFingerprint(token);

  let result: LoadResult<IntrospectionError>;
  try {
    result = await deps.cache.getOrLoad(token, () => deps.client.introspect(token));
  } catch (err) {
    return { decision: 'deny', reason: { kind: 'unexpected', error: toError(err) }, fingerprint };
  }

  if (!result.ok) {
    return { decision: 'deny', reason: denialFor(result.error), fingerprint };
  }

  const { verdict } = result;
  const now = Math.floor((deps.clock ?? Date.now)() / 1000);

  if (!verdict.active) {
    return { decision: 'deny', reason: { kind: 'inactive_token' }, fingerprint };
  }

  // A missing exp means the token never expires
  if (verdict.exp !== undefined && now > verdict.exp) {
    return { decision: 'deny', reason: { kind: 'expired_token', exp: verdict.exp }, fingerprint };
  }

  if (verdict.nbf !== undefined && now < verdict.nbf) {
    return { decision: 'deny', reason: { kind: 'not_yet_active', nbf: verdict.nbf }, fingerprint };
  }

  return { decision: 'allow', verdict, fingerprint };
}

/**
 * The decision engine bound to its collaborators, logging every outcome.
 */
export class IntrospectionFilter {
  private deps: FilterDependencies;
  private logger: Logger;

  constructor(deps: FilterDependencies, logger: Logger) {
    this.deps = deps;
    this.logger = logger;
  }

  get cache(): VerdictCache<IntrospectionError> {
    return this.deps.cache;
  }

  async evaluate(headers: RequestHeaders): Promise<FilterOutcome> {
    const outcome = await evaluateRequest(headers, this.deps);

    if (outcome.decision === 'allow') {
      this.logger.debug({ tokenHash: outcome.fingerprint }, 'Token accepted');
      return outcome;
    }

    const { reason, fingerprint } = outcome;
    const category = denyCategory(reason);
    const context = { tokenHash: fingerprint, reason: reason.kind, category };

    switch (reason.kind) {
      case 'no_token':
        this.logger.debug(context, 'No authorization token was provided');
        break;
      case 'inactive_token':
        this.logger.debug(
          { ...context, status: reason.status },
          'Token is marked as inactive by the introspection endpoint'
        );
        break;
      case 'expired_token':
        this.logger.debug({ ...context, exp: reason.exp }, 'Token expiration time has passed');
        break;
      case 'not_yet_active':
        this.logger.debug({ ...context, nbf: reason.nbf }, 'Token nbf time has not been reached');
        break;
      case 'client_error':
        this.logger.warn(
          { ...context, err: reason.error },
          'Failed to send request to the introspection endpoint'
        );
        break;
      case 'non_parsable_response':
        this.logger.warn(
          { ...context, error: reason.message },
          'Failed to parse response from the introspection endpoint'
        );
        break;
      case 'unexpected':
        this.logger.error({ ...context, err: reason.error }, 'Unexpected error while filtering request');
        break;
    }

    return outcome;
  }
}

export function createIntrospectionFilter(
  settings: FilterSettings,
  logger: Logger,
  client: Introspector = new IntrospectionClient(settings.client, logger)
): IntrospectionFilter {
  return new IntrospectionFilter(
    {
      strategy: settings.strategy,
      cache: new VerdictCache<IntrospectionError>(settings.cache),
      client,
    },
    logger
  );
}
