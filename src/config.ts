import { z } from 'zod';

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------
// Sources, lowest precedence first: defaults → environment (.env is loaded by
// server.ts before this runs) → positional CLI args `<upstreamUrl> <apiKey> <port>`.

export interface UpstreamTarget {
  /** Scheme, host, port and optional path prefix; never ends with a slash. */
  readonly baseUrl: string;
  readonly apiKey: string;
}

export interface ProxyConfig {
  readonly environment: 'development' | 'production' | 'test';
  readonly upstream: UpstreamTarget;
  readonly listen: { readonly host: string; readonly port: number };
  readonly cache: { readonly ttlMs: number; readonly maxEntries: number };
  readonly timeouts: {
    readonly metadataMs: number;
    readonly forwardTtfbMs: number;
    readonly forwardStallMs: number;
  };
}

const httpUrl = z
  .string()
  .trim()
  .url('Must be a valid URL')
  .refine(url => URL.canParse(url) && /^https?:$/.test(new URL(url).protocol), {
    message: 'Only http/https upstreams are supported',
  })
  .transform(url => url.replace(/\/+$/, ''));

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  NODE_ENV:            z.enum(['development', 'production', 'test']).default('development'),
  UPSTREAM_URL:        httpUrl.default('http://localhost:8096'),
  API_KEY:             z.string().trim().min(1, 'An upstream API key is required'),
  HOST:                z.string().default('0.0.0.0'),
  PORT:                z.coerce.number().int().min(1).max(65535).default(8097),
  CACHE_TTL_MS:        positiveInt.default(600_000),
  CACHE_MAX_ENTRIES:   positiveInt.default(1000),
  METADATA_TIMEOUT_MS: positiveInt.default(5000),
  FORWARD_TIMEOUT_MS:  positiveInt.default(30_000),
  FORWARD_STALL_MS:    positiveInt.default(60_000),
});

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n${issues.map(i => `  - ${i}`).join('\n')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== '' ? value : undefined;
}

export function loadConfig(
  argv: readonly string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
): ProxyConfig {
  const [argUpstream, argApiKey, argPort] = argv;

  const parsed = envSchema.safeParse({
    NODE_ENV:            nonEmpty(env.NODE_ENV),
    UPSTREAM_URL:        nonEmpty(argUpstream) ?? nonEmpty(env.UPSTREAM_URL),
    API_KEY:             nonEmpty(argApiKey) ?? env.API_KEY ?? '',
    HOST:                nonEmpty(env.HOST),
    PORT:                nonEmpty(argPort) ?? nonEmpty(env.PORT),
    CACHE_TTL_MS:        nonEmpty(env.CACHE_TTL_MS),
    CACHE_MAX_ENTRIES:   nonEmpty(env.CACHE_MAX_ENTRIES),
    METADATA_TIMEOUT_MS: nonEmpty(env.METADATA_TIMEOUT_MS),
    FORWARD_TIMEOUT_MS:  nonEmpty(env.FORWARD_TIMEOUT_MS),
    FORWARD_STALL_MS:    nonEmpty(env.FORWARD_STALL_MS),
  });

  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`));
  }

  const e = parsed.data;
  return Object.freeze({
    environment: e.NODE_ENV,
    upstream:    Object.freeze({ baseUrl: e.UPSTREAM_URL, apiKey: e.API_KEY }),
    listen:      Object.freeze({ host: e.HOST, port: e.PORT }),
    cache:       Object.freeze({ ttlMs: e.CACHE_TTL_MS, maxEntries: e.CACHE_MAX_ENTRIES }),
    timeouts:    Object.freeze({
      metadataMs:     e.METADATA_TIMEOUT_MS,
      forwardTtfbMs:  e.FORWARD_TIMEOUT_MS,
      forwardStallMs: e.FORWARD_STALL_MS,
    }),
  });
}

// Start-up banner lines. The credential itself is never printed.
export function describeConfig(config: ProxyConfig): string[] {
  return [
    `Upstream:  ${config.upstream.baseUrl}`,
    `API key:   ${config.upstream.apiKey ? '***' : 'NOT SET'}`,
    `Listening: ${config.listen.host}:${config.listen.port}`,
    `Cache:     ${config.cache.maxEntries} entries, TTL ${config.cache.ttlMs}ms`,
  ];
}
