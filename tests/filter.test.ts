import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import pino from 'pino';
import { VerdictCache } from '../src/cache/index.js';
import {
  IntrospectionFilter,
  createIntrospectionFilter,
  denyCategory,
  evaluateRequest,
} from '../src/filter/index.js';
import type { DenyReason, FilterDependencies } from '../src/filter/index.js';
import { parseIntrospectionBody } from '../src/introspection/index.js';
import type { IntrospectionError, IntrospectionResult } from '../src/introspection/types.js';

const NOW = new Date('2024-01-01T00:00:00Z').getTime();
const NOW_SECONDS = NOW / 1000;
const BEARER = { authorization: 'Bearer abc123' };

function setup(respond: (token: string) => Promise<IntrospectionResult>) {
  const introspect = vi.fn(respond);
  const deps: FilterDependencies = {
    strategy: { type: 'bearer', header: 'authorization' },
    cache: new VerdictCache<IntrospectionError>({
      maxEntries: 100,
      defaultTtlMs: 60_000,
      clock: () => (deps.clock ?? Date.now)(),
    }),
    client: { introspect },
    clock: () => NOW,
  };
  return { deps, introspect };
}

function answer(body: { active: boolean; exp?: number; nbf?: number }) {
  return async (): Promise<IntrospectionResult> => ({ ok: true, verdict: { ...body, claims: {} } });
}

describe('evaluateRequest', () => {
  it('should deny without a token and never call the authority', async () => {
    const { deps, introspect } = setup(answer({ active: true }));

    const outcome = await evaluateRequest({}, deps);

    expect(outcome).toEqual({ decision: 'deny', reason: { kind: 'no_token' } });
    expect(introspect).not.toHaveBeenCalled();
  });

  it('should deny a malformed header as no token', async () => {
    const { deps, introspect } = setup(answer({ active: true }));

    const outcome = await evaluateRequest({ authorization: 'Basic abc123' }, deps);

    expect(outcome.decision === 'deny' && outcome.reason).toEqual({ kind: 'no_token' });
    expect(introspect).not.toHaveBeenCalled();
  });

  it('should allow an active token and pass the token to the authority', async () => {
    const { deps, introspect } = setup(answer({ active: true, exp: NOW_SECONDS + 3600 }));

    const outcome = await evaluateRequest(BEARER, deps);

    expect(outcome.decision).toBe('allow');
    expect(introspect).toHaveBeenCalledWith('abc123');
  });

  it('should deny an inactive token', async () => {
    const { deps } = setup(answer({ active: false }));

    const outcome = await evaluateRequest(BEARER, deps);

    expect(outcome.decision === 'deny' && outcome.reason).toEqual({ kind: 'inactive_token' });
  });

  it('should check activity before expiry', async () => {
    const { deps } = setup(answer({ active: false, exp: NOW_SECONDS - 60 }));

    const outcome = await evaluateRequest(BEARER, deps);

    expect(outcome.decision === 'deny' && outcome.reason).toEqual({ kind: 'inactive_token' });
  });

  it('should deny an active token whose exp has passed', async () => {
    const { deps } = setup(answer({ active: true, exp: NOW_SECONDS - 1 }));

    const outcome = await evaluateRequest(BEARER, deps);

    expect(outcome.decision === 'deny' && outcome.reason).toEqual({
      kind: 'expired_token',
      exp: NOW_SECONDS - 1,
    });
  });

  it('should still allow a token at exactly its exp', async () => {
    const { deps } = setup(answer({ active: true, exp: NOW_SECONDS }));

    const outcome = await evaluateRequest(BEARER, deps);

    expect(outcome.decision).toBe('allow');
  });

  it('should never deny on expiry when exp is absent', async () => {
    const { deps } = setup(answer({ active: true }));
    deps.clock = () => 32503680000000; // year 3000

    const outcome = await evaluateRequest(BEARER, deps);

    expect(outcome.decision).toBe('allow');
  });

  it('should deny a token whose nbf is in the future', async () => {
    const { deps } = setup(answer({ active: true, nbf: NOW_SECONDS + 1 }));

    const outcome = await evaluateRequest(BEARER, deps);

    expect(outcome.decision === 'deny' && outcome.reason).toEqual({
      kind: 'not_yet_active',
      nbf: NOW_SECONDS + 1,
    });
  });

  it('should allow a token at exactly its nbf', async () => {
    const { deps } = setup(answer({ active: true, nbf: NOW_SECONDS }));

    const outcome = await evaluateRequest(BEARER, deps);

    expect(outcome.decision).toBe('allow');
  });

  it('should compare against whole seconds', async () => {
    const { deps } = setup(answer({ active: true, exp: NOW_SECONDS }));
    deps.clock = () => NOW + 999;

    const outcome = await evaluateRequest(BEARER, deps);

    expect(outcome.decision).toBe('allow');
  });

  it('should deny with the transport error and retry on the next request', async () => {
    const failure = new Error('connect ECONNREFUSED');
    const { deps, introspect } = setup(async () => ({
      ok: false,
      error: { kind: 'client_error', error: failure },
    }));

    const first = await evaluateRequest(BEARER, deps);
    const second = await evaluateRequest(BEARER, deps);

    expect(first.decision === 'deny' && first.reason).toEqual({ kind: 'client_error', error: failure });
    expect(second.decision === 'deny' && second.reason.kind).toBe('client_error');
    expect(introspect).toHaveBeenCalledTimes(2);
  });

  it('should deny when the response cannot be parsed', async () => {
    const { deps } = setup(async () => ({
      ok: false,
      error: { kind: 'non_parsable_response', message: 'active: Required' },
    }));

    const outcome = await evaluateRequest(BEARER, deps);

    expect(outcome.decision === 'deny' && outcome.reason).toEqual({
      kind: 'non_parsable_response',
      message: 'active: Required',
    });
  });

  it('should treat a refused introspection request as an inactive token', async () => {
    const { deps } = setup(async () => ({ ok: false, error: { kind: 'rejected_status', status: 403 } }));

    const outcome = await evaluateRequest(BEARER, deps);

    expect(outcome.decision === 'deny' && outcome.reason).toEqual({
      kind: 'inactive_token',
      status: 403,
    });
  });

  it('should deny as unexpected when the client reports an unexpected error', async () => {
    const failure = new Error('cannot encode');
    const { deps } = setup(async () => ({ ok: false, error: { kind: 'unexpected', error: failure } }));

    const outcome = await evaluateRequest(BEARER, deps);

    expect(outcome.decision === 'deny' && outcome.reason).toEqual({ kind: 'unexpected', error: failure });
  });

  it('should deny as unexpected when the client throws', async () => {
    const { deps } = setup(async () => {
      throw new Error('bug');
    });

    const outcome = await evaluateRequest(BEARER, deps);

    expect(outcome.decision === 'deny' && outcome.reason).toEqual({
      kind: 'unexpected',
      error: new Error('bug'),
    });
  });

  it('should call the authority once for concurrent requests sharing a token', async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const { deps, introspect } = setup(async () => {
      await gate;
      return { ok: true, verdict: { active: true, exp: NOW_SECONDS + 3600, claims: {} } };
    });

    const pending = Array.from({ length: 10 }, () => evaluateRequest(BEARER, deps));
    release();
    const outcomes = await Promise.all(pending);

    expect(introspect).toHaveBeenCalledTimes(1);
    for (const outcome of outcomes) {
      expect(outcome).toEqual(outcomes[0]);
    }
    expect(outcomes[0].decision).toBe('allow');
  });

  it('should carry a token fingerprint, never the token', async () => {
    const { deps } = setup(answer({ active: true }));

    const outcome = await evaluateRequest(BEARER, deps);

    expect(outcome.fingerprint).toMatch(/^[0-9a-f]{8}$/);
    expect(JSON.stringify(outcome)).not.toContain('abc123');
  });
});

describe('cached verdict lifecycle', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(NOW);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should reuse a verdict within its lifetime and refresh it afterwards', async () => {
    const { deps, introspect } = setup(answer({ active: true, exp: NOW_SECONDS + 3600 }));
    deps.clock = undefined;

    expect((await evaluateRequest(BEARER, deps)).decision).toBe('allow');

    vi.setSystemTime(NOW + 1800 * 1000);
    expect((await evaluateRequest(BEARER, deps)).decision).toBe('allow');
    expect(introspect).toHaveBeenCalledTimes(1);

    vi.setSystemTime(NOW + 3600 * 1000 + 999);
    expect((await evaluateRequest(BEARER, deps)).decision).toBe('allow');
    expect(introspect).toHaveBeenCalledTimes(1);

    vi.setSystemTime(NOW + 3601 * 1000);
    const expired = await evaluateRequest(BEARER, deps);
    expect(expired.decision === 'deny' && expired.reason).toEqual({
      kind: 'expired_token',
      exp: NOW_SECONDS + 3600,
    });
    expect(introspect).toHaveBeenCalledTimes(2);
  });

  it('should hand out the same claims on every cache hit', async () => {
    const { deps, introspect } = setup(async () =>
      parseIntrospectionBody('{"active":true,"scope_list":["read"]}')
    );

    const first = await evaluateRequest(BEARER, deps);
    if (first.decision !== 'allow') throw new Error('expected the token to be allowed');
    const scopes = first.verdict.claims.scope_list;
    if (!Array.isArray(scopes)) throw new Error('scope_list should be an array');
    expect(() => scopes.push('admin')).toThrow(TypeError);

    const second = await evaluateRequest(BEARER, deps);
    expect(introspect).toHaveBeenCalledTimes(1);
    expect(second.decision === 'allow' && second.verdict.claims).toEqual({ scope_list: ['read'] });
  });
});

describe('denyCategory', () => {
  it('should separate security denials from infrastructure failures', () => {
    const reasons: Array<[DenyReason, string]> = [
      [{ kind: 'no_token' }, 'security'],
      [{ kind: 'inactive_token' }, 'security'],
      [{ kind: 'expired_token', exp: 1 }, 'security'],
      [{ kind: 'not_yet_active', nbf: 1 }, 'security'],
      [{ kind: 'client_error', error: new Error('x') }, 'infrastructure'],
      [{ kind: 'non_parsable_response', message: 'x' }, 'infrastructure'],
      [{ kind: 'unexpected', error: new Error('x') }, 'infrastructure'],
    ];

    for (const [reason, category] of reasons) {
      expect(denyCategory(reason)).toBe(category);
    }
  });
});

describe('IntrospectionFilter', () => {
  it('should log infrastructure failures as warnings', async () => {
    const logger = pino({ level: 'silent' });
    const warn = vi.spyOn(logger, 'warn');
    const { deps } = setup(async () => ({
      ok: false,
      error: { kind: 'client_error', error: new Error('timeout') },
    }));
    const filter = new IntrospectionFilter(deps, logger);

    const outcome = await filter.evaluate(BEARER);

    expect(outcome.decision).toBe('deny');
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][1]).toBe('Failed to send request to the introspection endpoint');
  });

  it('should log security denials at debug level', async () => {
    const logger = pino({ level: 'silent' });
    const debug = vi.spyOn(logger, 'debug');
    const warn = vi.spyOn(logger, 'warn');
    const { deps } = setup(answer({ active: true }));
    const filter = new IntrospectionFilter(deps, logger);

    await filter.evaluate({});

    expect(warn).not.toHaveBeenCalled();
    expect(debug).toHaveBeenCalledWith(
      { tokenHash: undefined, reason: 'no_token', category: 'security' },
      'No authorization token was provided'
    );
  });

  it('should build its collaborators from settings', async () => {
    const logger = pino({ level: 'silent' });
    const introspect = vi.fn(answer({ active: true }));
    const filter = createIntrospectionFilter(
      {
        strategy: { type: 'header', header: 'x-api-token' },
        client: { endpoint: 'https://auth.example.test/introspect', timeoutMs: 1000 },
        cache: { maxEntries: 10, defaultTtlMs: 1000 },
      },
      logger,
      { introspect }
    );

    const outcome = await filter.evaluate({ 'x-api-token': 'abc123' });

    expect(outcome.decision).toBe('allow');
    expect(introspect).toHaveBeenCalledWith('abc123');
    expect(filter.cache.stats().size).toBe(1);
  });
});
