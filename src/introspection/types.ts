export interface IntrospectionClientOptions {
  endpoint: string;
  /** Value of the Authorization header sent to the introspection endpoint */
  authorization?: string;
  tokenTypeHint?: string;
  timeoutMs: number;
}

/**
 * The authority's answer for one token (RFC 7662 section 2.2).
 * `exp` and `nbf` are epoch seconds; a missing `exp` means the token does not expire.
 */
export interface IntrospectionVerdict {
  readonly active: boolean;
  readonly exp?: number;
  readonly nbf?: number;
  /** Every other member of the response, kept as-is */
  readonly claims: Readonly<Record<string, unknown>>;
}

export type IntrospectionError =
  | { kind: 'client_error'; error: Error }
  | { kind: 'non_parsable_response'; message: string }
  | { kind: 'rejected_status'; status: number }
  | { kind: 'unexpected'; error: Error };

export type IntrospectionResult =
  | { ok: true; verdict: IntrospectionVerdict }
  | { ok: false; error: IntrospectionError };

export interface Introspector {
  introspect(token: string): Promise<IntrospectionResult>;
}
