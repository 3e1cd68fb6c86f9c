import type { IncomingHttpHeaders } from 'http';
import type { TokenExtractionStrategy } from '../extraction/index.js';
import type { VerdictCache, VerdictCacheOptions } from '../cache/index.js';
import type {
  IntrospectionClientOptions,
  IntrospectionError,
  IntrospectionVerdict,
  Introspector,
} from '../introspection/types.js';

export type DenyReason =
  | { kind: 'no_token' }
  | { kind: 'inactive_token'; status?: number }
  | { kind: 'expired_token'; exp: number }
  | { kind: 'not_yet_active'; nbf: number }
  | { kind: 'client_error'; error: Error }
  | { kind: 'non_parsable_response'; message: string }
  | { kind: 'unexpected'; error: Error };

export type DenyKind = DenyReason['kind'];

/**
 * `security` denials are legitimate authentication rejections;
 * `infrastructure` denials mean the filter could not reach a decision.
 */
export type DenyCategory = 'security' | 'infrastructure';

export type FilterOutcome =
  | { decision: 'allow'; verdict: IntrospectionVerdict; fingerprint: string }
  | { decision: 'deny'; reason: DenyReason; fingerprint?: string };

export interface FilterDependencies {
  strategy: TokenExtractionStrategy;
  cache: VerdictCache<IntrospectionError>;
  client: Introspector;
  /** Epoch milliseconds */
  clock?: () => number;
}

export type RequestHeaders = IncomingHttpHeaders;

/**
 * Construction parameters for the filter's components, fixed at startup.
 */
export interface FilterSettings {
  readonly strategy: Readonly<TokenExtractionStrategy>;
  readonly client: Readonly<IntrospectionClientOptions>;
  readonly cache: Readonly<VerdictCacheOptions>;
}
