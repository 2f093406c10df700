import { z } from 'zod';

export const TRACKING_QUERY_PARAMS = [
  'fbclid',
  'gclid',
  'dclid',
  'msclkid',
  'mc_cid',
  'mc_eid',
  'mbid',
  '_ga',
  '_gl',
  'ref_src',
];

export const ConfigSchema = z.object({
  environment: z.enum(['development', 'test', 'production']),
  periodical: z.object({
    baseUrl: z.string().url(),
    sitemapIndexPath: z.string().startsWith('/'),
  }),
  http: z.object({
    userAgent: z.string().min(1),
    requestTimeoutMs: z.number().int().positive(),
    minIntervalMs: z.number().int().nonnegative(),
    maxAttempts: z.number().int().positive().max(10),
    backoffBaseMs: z.number().int().nonnegative(),
    backoffMaxMs: z.number().int().nonnegative(),
    concurrency: z.number().int().positive(),
    minUsableChars: z.number().int().nonnegative(),
  }),
  render: z.object({
    executablePath: z.string().min(1).optional(),
    timeoutMs: z.number().int().positive(),
  }),
  alignment: z.object({
    windowDays: z.number().int().nonnegative(),
  }),
  aggregation: z.object({
    clip: z.boolean(),
    lowerPercentile: z.number().min(0).max(100),
    upperPercentile: z.number().min(0).max(100),
  }),
  credentials: z.object({
    cookiesPath: z.string().min(1).optional(),
  }),
  persistence: z.object({
    rootDir: z.string().min(1),
    cacheDir: z.string().min(1),
    corpusDir: z.string().min(1),
    metricsDir: z.string().min(1),
    runsDir: z.string().min(1),
  }),
  observability: z.object({
    logLevel: z.enum(['debug', 'info', 'warn', 'error']),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export interface PublicConfig {
  baseUrl: string;
  windowDays: number;
  http: {
    minIntervalMs: number;
    maxAttempts: number;
    concurrency: number;
  };
  renderFallback: boolean;
  clip: boolean;
}

export const getPublicConfig = (config: AppConfig): PublicConfig => ({
  baseUrl: config.periodical.baseUrl,
  windowDays: config.alignment.windowDays,
  http: {
    minIntervalMs: config.http.minIntervalMs,
    maxAttempts: config.http.maxAttempts,
    concurrency: config.http.concurrency,
  },
  renderFallback: Boolean(config.render.executablePath),
  clip: config.aggregation.clip,
});
