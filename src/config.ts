import { z } from 'zod';

type Env = Record<string, string | undefined>;

// Missing, non-numeric and non-positive values fall back to the default.
function positiveInt(fallback: number) {
  return z.preprocess((val) => {
    if (val === undefined || val === '') return fallback;
    const parsed = Number(val);
    return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
  }, z.number().int().positive());
}

function positiveNumber(fallback: number) {
  return z.preprocess((val) => {
    if (val === undefined || val === '') return fallback;
    const parsed = Number(val);
    return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
  }, z.number().positive());
}

const optionalPositiveInt = z.preprocess((val) => {
  if (val === undefined || val === '') return undefined;
  const parsed = Number(val);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : undefined;
}, z.number().int().positive().optional());

const optionalString = z.preprocess(
  (val) => (typeof val === 'string' && val.trim() !== '' ? val.trim() : undefined),
  z.string().optional(),
);

const flag = z.preprocess((val) => {
  if (typeof val !== 'string') return false;
  return ['1', 'true', 'yes', 'on'].includes(val.trim().toLowerCase());
}, z.boolean());

const EnvSchema = z.object({
  PORT: positiveInt(4500),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).catch('info'),
  UPSTREAM_BASE_URL: optionalString,
  UPSTREAM_URL: optionalString,
  UPSTREAM_TIMEOUT: positiveNumber(30),
  UPSTREAM_ALLOWLIST: optionalString,
  REPORT_REMOTE_ALLOWLIST: optionalString,
  BATCH_WORKERS: positiveInt(2),
  BATCH_CONCURRENCY: positiveInt(5),
  BATCH_MAX_ITEMS: positiveInt(100),
  BATCH_QUEUE_MAX_SIZE: positiveInt(100),
  BATCH_JOB_TTL_SECONDS: positiveInt(3600),
  BATCH_RESULTS_TTL_SECONDS: optionalPositiveInt,
  BATCH_RESULTS_DIR: z.string().default('./batch_results'),
  BATCH_MAX_INLINE_BYTES: positiveInt(2 * 1024 * 1024),
  BATCH_POLL_INTERVAL_MS: positiveInt(200),
  BATCH_SWEEP_INTERVAL_MS: positiveInt(60_000),
  REPORT_MAX_RECORDS: optionalPositiveInt,
  REPORT_FILTERS_CACHE_TTL: positiveNumber(30),
  REPORT_FILTERS_CACHE_MAX: positiveInt(20),
  REPORT_FILTERS_MAX_VALUES: positiveInt(500),
  UPSTASH_REDIS_REST_URL: optionalString,
  UPSTASH_REDIS_REST_TOKEN: optionalString,
  RATE_LIMIT_ENABLED: flag,
  ENQUEUE_BURST: positiveInt(60),
  ENQUEUE_SUSTAINED_PER_MIN: positiveInt(600),
  CORS_DEV: flag,
});

export interface RedisConfig {
  url: string;
  token: string;
}

export interface AppConfig {
  port: number;
  host: string;
  logLevel: string;
  upstream: {
    baseUrl?: string;
    defaultUrl?: string;
    timeoutMs: number;
    allowlist: string[];
  };
  batch: {
    workers: number;
    itemConcurrency: number;
    maxItems: number;
    queueMaxSize: number;
    jobTtlSeconds: number;
    resultsTtlSeconds: number;
    resultsDir: string;
    maxInlineBytes: number;
    pollIntervalMs: number;
    sweepIntervalMs: number;
    maxRecords?: number;
  };
  filters: {
    cacheTtlMs: number;
    cacheMaxEntries: number;
    maxValuesPerField: number;
  };
  redis?: RedisConfig;
  rateLimit: {
    enabled: boolean;
    burst: number;
    sustainedPerMin: number;
  };
  corsDev: boolean;
}

export function parseAllowlist(...sources: Array<string | undefined>): string[] {
  const entries = new Set<string>();
  for (const source of sources) {
    if (!source) continue;
    for (const raw of source.split(',')) {
      const entry = raw.trim().toLowerCase();
      if (entry) entries.add(entry);
    }
  }
  return [...entries];
}

export function loadConfig(env: Env = process.env): AppConfig {
  const e = EnvSchema.parse(env);

  const redis = e.UPSTASH_REDIS_REST_URL && e.UPSTASH_REDIS_REST_TOKEN
    ? { url: e.UPSTASH_REDIS_REST_URL, token: e.UPSTASH_REDIS_REST_TOKEN }
    : undefined;

  return Object.freeze({
    port: e.PORT,
    host: e.HOST,
    logLevel: e.LOG_LEVEL,
    upstream: {
      baseUrl: e.UPSTREAM_BASE_URL,
      defaultUrl: e.UPSTREAM_URL,
      timeoutMs: Math.round(e.UPSTREAM_TIMEOUT * 1000),
      allowlist: parseAllowlist(e.UPSTREAM_ALLOWLIST, e.REPORT_REMOTE_ALLOWLIST),
    },
    batch: {
      workers: e.BATCH_WORKERS,
      itemConcurrency: e.BATCH_CONCURRENCY,
      maxItems: e.BATCH_MAX_ITEMS,
      queueMaxSize: e.BATCH_QUEUE_MAX_SIZE,
      jobTtlSeconds: e.BATCH_JOB_TTL_SECONDS,
      resultsTtlSeconds: e.BATCH_RESULTS_TTL_SECONDS ?? e.BATCH_JOB_TTL_SECONDS,
      resultsDir: e.BATCH_RESULTS_DIR,
      maxInlineBytes: e.BATCH_MAX_INLINE_BYTES,
      pollIntervalMs: e.BATCH_POLL_INTERVAL_MS,
      sweepIntervalMs: e.BATCH_SWEEP_INTERVAL_MS,
      maxRecords: e.REPORT_MAX_RECORDS,
    },
    filters: {
      cacheTtlMs: Math.round(e.REPORT_FILTERS_CACHE_TTL * 1000),
      cacheMaxEntries: e.REPORT_FILTERS_CACHE_MAX,
      maxValuesPerField: e.REPORT_FILTERS_MAX_VALUES,
    },
    redis,
    rateLimit: {
      enabled: e.RATE_LIMIT_ENABLED,
      burst: e.ENQUEUE_BURST,
      sustainedPerMin: e.ENQUEUE_SUSTAINED_PER_MIN,
    },
    corsDev: e.CORS_DEV,
  });
}
