import path from 'node:path';
import { ConfigSchema, type AppConfig, type PublicConfig, getPublicConfig as getPublicConfigShared } from '../../shared/config';
import { ConfigurationError } from '../../shared/errors';

type Env = Record<string, string | undefined>;

const numberFromEnv = (value: string | undefined, fallback: number): number => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const booleanFromEnv = (value: string | undefined, fallback: boolean): boolean => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }
  return fallback;
};

const stringFromEnv = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

export type { AppConfig, PublicConfig };

let cachedConfig: AppConfig | null = null;

export const buildConfig = (env: Env = process.env, cwd: string = process.cwd()): AppConfig => {
  const environment = (env.NODE_ENV || 'development').trim().toLowerCase();
  const rootDir = path.resolve(cwd, env.DATA_ROOT || 'data');

  const rawConfig = {
    environment: environment === 'production' ? 'production' : environment === 'test' ? 'test' : 'development',
    periodical: {
      baseUrl: (stringFromEnv(env.PERIODICAL_BASE_URL) || 'https://www.newyorker.com').replace(/\/+$/, ''),
      sitemapIndexPath: stringFromEnv(env.SITEMAP_INDEX_PATH) || '/sitemaps/newyorker/sitemap-index.xml',
    },
    http: {
      userAgent:
        stringFromEnv(env.HTTP_USER_AGENT) ||
        'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0 Safari/537.36',
      requestTimeoutMs: numberFromEnv(env.HTTP_TIMEOUT_MS, 30_000),
      minIntervalMs: numberFromEnv(env.HTTP_MIN_INTERVAL_MS, 1_000),
      maxAttempts: numberFromEnv(env.HTTP_MAX_ATTEMPTS, 3),
      backoffBaseMs: numberFromEnv(env.HTTP_BACKOFF_BASE_MS, 1_000),
      backoffMaxMs: numberFromEnv(env.HTTP_BACKOFF_MAX_MS, 30_000),
      concurrency: numberFromEnv(env.HTTP_CONCURRENCY, 2),
      // Bodies with less visible text than this are retried through the renderer.
      minUsableChars: numberFromEnv(env.HTTP_MIN_USABLE_CHARS, 300),
    },
    render: {
      executablePath: stringFromEnv(env.CHROME_EXECUTABLE_PATH),
      timeoutMs: numberFromEnv(env.RENDER_TIMEOUT_MS, 20_000),
    },
    alignment: {
      windowDays: numberFromEnv(env.ALIGNMENT_WINDOW_DAYS, 3),
    },
    aggregation: {
      clip: booleanFromEnv(env.AGGREGATE_CLIP, false),
      lowerPercentile: numberFromEnv(env.AGGREGATE_CLIP_LOWER, 1),
      upperPercentile: numberFromEnv(env.AGGREGATE_CLIP_UPPER, 99),
    },
    credentials: {
      cookiesPath: stringFromEnv(env.COOKIES_PATH),
    },
    persistence: {
      rootDir,
      cacheDir: path.join(rootDir, 'cache', 'http'),
      corpusDir: path.join(rootDir, 'corpus'),
      metricsDir: path.join(rootDir, 'metrics'),
      runsDir: path.join(rootDir, 'runs'),
    },
    observability: {
      logLevel: (env.LOG_LEVEL || 'info').trim().toLowerCase(),
    },
  };

  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigurationError(`Invalid configuration: ${issues}`, { cause: parsed.error });
  }
  if (parsed.data.aggregation.lowerPercentile >= parsed.data.aggregation.upperPercentile) {
    throw new ConfigurationError('Invalid configuration: AGGREGATE_CLIP_LOWER must be below AGGREGATE_CLIP_UPPER');
  }
  return parsed.data;
};

export const loadConfig = (): AppConfig => {
  if (cachedConfig) {
    return cachedConfig;
  }
  cachedConfig = buildConfig();
  return cachedConfig;
};

export const getPublicConfig = (config: AppConfig = loadConfig()): PublicConfig => getPublicConfigShared(config);
