import { z } from 'zod';
import { readFileSync } from 'fs';
import { parse as parseYaml } from 'yaml';
import { basicCredentials } from '../introspection/index.js';
import type { TokenExtractionStrategy } from '../extraction/index.js';
import type { FilterSettings } from '../filter/types.js';

type Env = Record<string, string | undefined>;

/**
 * Interpolate environment variables in a string
 * Supports ${VAR_NAME} and ${VAR_NAME:-default} syntax
 */
function interpolateEnvVars(value: string, env: Env): string {
  return value.replace(
    /\$\{([^}:]+)(?::-([^}]*))?\}/g,
    (_match: string, varName: string, defaultValue: string | undefined) => {
      const envValue = env[varName];
      if (envValue !== undefined) {
        return envValue;
      }
      if (defaultValue !== undefined) {
        return defaultValue;
      }
      return '';
    }
  );
}

function processEnvVars(obj: unknown, env: Env): unknown {
  if (typeof obj === 'string') {
    return interpolateEnvVars(obj, env);
  }
  if (Array.isArray(obj)) {
    return obj.map((item) => processEnvVars(item, env));
  }
  if (isRecord(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = processEnvVars(value, env);
    }
    return result;
  }
  return obj;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

const HeaderName = z
  .string()
  .regex(/^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/, 'Invalid header name')
  .transform((name) => name.toLowerCase());

const IntrospectionSchema = z
  .object({
    url: z.string().url(),
    // Ready-made Authorization header value, e.g. "Basic ..." or "Bearer ..."
    authorization: z.string().min(1).optional(),
    client_id: z.string().min(1).optional(),
    client_secret: z.string().min(1).optional(),
    token_type_hint: z.string().min(1).optional(),
    timeout_ms: z.number().int().positive().default(5000),
  })
  .refine((value) => !(value.authorization && value.client_id), {
    message: 'authorization and client_id are mutually exclusive',
    path: ['authorization'],
  })
  .refine((value) => !value.client_id === !value.client_secret, {
    message: 'client_id and client_secret must be set together',
    path: ['client_secret'],
  });

const ConfigSchema = z.object({
  gateway: z.object({
    listen_port: z.number().int().min(0).max(65535).default(8080),
    host: z.string().default('0.0.0.0'),
    upstream_url: z.string().url(),
    timeout_ms: z.number().int().positive().default(30000),
    realm: z.string().regex(/^[^"\\]*$/, 'Realm must not contain quotes').default('oauth2'),
  }),
  introspection: IntrospectionSchema,
  token_extraction: z
    .object({
      strategy: z.enum(['bearer', 'header']).default('bearer'),
      header: HeaderName.default('authorization'),
      prefix: z.string().min(1).optional(),
    })
    .default({}),
  cache: z
    .object({
      max_entries: z.number().int().positive().default(10000),
      default_ttl_seconds: z.number().positive().default(60),
      max_ttl_seconds: z.number().positive().optional(),
      cleanup_interval_seconds: z.number().positive().default(60),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
      format: z.enum(['json', 'pretty']).default('json'),
    })
    .default({}),
  rate_limit: z
    .object({
      enabled: z.boolean().default(false),
      max: z.number().int().positive().default(100),
      time_window_ms: z.number().int().min(1000).default(60000),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

interface EnvOverride {
  env: string;
  section: string;
  key: string;
  type: 'string' | 'number';
}

const ENV_OVERRIDES: EnvOverride[] = [
  { env: 'GATEWAY_PORT', section: 'gateway', key: 'listen_port', type: 'number' },
  { env: 'GATEWAY_HOST', section: 'gateway', key: 'host', type: 'string' },
  { env: 'UPSTREAM_URL', section: 'gateway', key: 'upstream_url', type: 'string' },
  { env: 'UPSTREAM_TIMEOUT_MS', section: 'gateway', key: 'timeout_ms', type: 'number' },
  { env: 'INTROSPECTION_URL', section: 'introspection', key: 'url', type: 'string' },
  {
    env: 'INTROSPECTION_AUTHORIZATION',
    section: 'introspection',
    key: 'authorization',
    type: 'string',
  },
  { env: 'INTROSPECTION_CLIENT_ID', section: 'introspection', key: 'client_id', type: 'string' },
  {
    env: 'INTROSPECTION_CLIENT_SECRET',
    section: 'introspection',
    key: 'client_secret',
    type: 'string',
  },
  { env: 'INTROSPECTION_TIMEOUT_MS', section: 'introspection', key: 'timeout_ms', type: 'number' },
  { env: 'CACHE_MAX_ENTRIES', section: 'cache', key: 'max_entries', type: 'number' },
  { env: 'CACHE_DEFAULT_TTL_SECONDS', section: 'cache', key: 'default_ttl_seconds', type: 'number' },
  { env: 'CACHE_MAX_TTL_SECONDS', section: 'cache', key: 'max_ttl_seconds', type: 'number' },
  { env: 'LOG_LEVEL', section: 'logging', key: 'level', type: 'string' },
  { env: 'LOG_FORMAT', section: 'logging', key: 'format', type: 'string' },
];

/**
 * Overlay the environment variables that are set onto the raw file content.
 * Unset variables leave the file's values alone.
 */
export function applyEnvOverrides(raw: Record<string, unknown>, env: Env): Record<string, unknown> {
  const result: Record<string, unknown> = { ...raw };

  for (const { env: name, section, key, type } of ENV_OVERRIDES) {
    const value = env[name];
    if (value === undefined || value === '') continue;

    const current = result[section];
    const target: Record<string, unknown> = isRecord(current) ? { ...current } : {};
    // Non-numeric input is left for the schema to reject
    target[key] = type === 'number' && /^-?\d+(\.\d+)?$/.test(value) ? Number(value) : value;
    result[section] = target;
  }

  // Credentials of one kind from the environment replace the file's other kind
  const introspection = result.introspection;
  if (isRecord(introspection)) {
    const authorizationFromEnv = isSet(env.INTROSPECTION_AUTHORIZATION);
    const clientFromEnv = isSet(env.INTROSPECTION_CLIENT_ID) || isSet(env.INTROSPECTION_CLIENT_SECRET);
    if (authorizationFromEnv && !clientFromEnv) {
      delete introspection.client_id;
      delete introspection.client_secret;
    } else if (clientFromEnv && !authorizationFromEnv) {
      delete introspection.authorization;
    }
  }

  return result;
}

function isSet(value: string | undefined): boolean {
  return value !== undefined && value !== '';
}

export function parseConfig(raw: unknown): Config {
  return ConfigSchema.parse(raw);
}

export function loadConfig(configPath: string, env: Env = process.env): Config {
  let fileContent: unknown = {};
  try {
    const content = readFileSync(configPath, 'utf-8');
    fileContent = processEnvVars(parseYaml(content), env) ?? {};
  } catch (error) {
    // A missing file means the environment is the only source
    if (!(isErrnoException(error) && error.code === 'ENOENT')) {
      throw error;
    }
  }

  if (!isRecord(fileContent)) {
    throw new Error(`Configuration root in ${configPath} must be a mapping`);
  }

  return parseConfig(applyEnvOverrides(fileContent, env));
}

/**
 * Derive the construction parameters of the filter components.
 * The result is frozen and built once at startup.
 */
export function buildFilterSettings(config: Config): FilterSettings {
  const { introspection, token_extraction: extraction, cache } = config;

  const strategy: TokenExtractionStrategy =
    extraction.strategy === 'bearer'
      ? { type: 'bearer', header: extraction.header }
      : { type: 'header', header: extraction.header, prefix: extraction.prefix };

  let authorization = introspection.authorization;
  if (introspection.client_id && introspection.client_secret) {
    authorization = basicCredentials(introspection.client_id, introspection.client_secret);
  }

  return Object.freeze({
    strategy: Object.freeze(strategy),
    client: Object.freeze({
      endpoint: introspection.url,
      authorization,
      tokenTypeHint: introspection.token_type_hint,
      timeoutMs: introspection.timeout_ms,
    }),
    cache: Object.freeze({
      maxEntries: cache.max_entries,
      defaultTtlMs: cache.default_ttl_seconds * 1000,
      maxTtlMs: cache.max_ttl_seconds !== undefined ? cache.max_ttl_seconds * 1000 : undefined,
    }),
  });
}
