import { parseArgs } from 'node:util';
import { z } from 'zod';
import type { ArtifactStore } from '../shared/artifacts';
import type { AppConfig } from '../shared/config';
import { ConfigurationError, errorMessage } from '../shared/errors';
import type { RunSummary } from '../shared/types';
import { cookieDomainFor, resolveCookies } from './config/cookies';
import { selectDaleChallStrategy } from './metrics/daleChall';
import { createMetricsEngine } from './metrics/readability';
import type { Logger } from './obs/logger';
import { openCacheStore } from './persistence/cacheStore';
import { createFsArtifactStore } from './persistence/fsStore';
import { createFetcher } from './retrieval/fetcher';
import { createRendererFromConfig, type Renderer } from './retrieval/renderFallback';
import { aggregateMetrics } from './pipeline/aggregateMetrics';
import { computeMetrics } from './pipeline/computeMetrics';
import { fetchMagazine } from './pipeline/fetchMagazine';
import { fetchWeb } from './pipeline/fetchWeb';
import { visualize } from './pipeline/visualize';

export const USAGE = `Usage: periodical-readability <command> [options]

Commands:
  fetch-magazine --year-start YYYY --year-end YYYY [--cookies FILE] [--refresh-index]
  fetch-web      --year-start YYYY --year-end YYYY [--cookies FILE] [--refresh-index]
  compute-metrics [--source magazine|web|all]
  aggregate      [--clip]
  visualize
`;

const Year = z.coerce.number().int().min(1900).max(2100);

const YearRangeSchema = z
  .object({ yearStart: Year, yearEnd: Year })
  .refine((range) => range.yearStart <= range.yearEnd, { message: '--year-start must not be after --year-end' });

const FetchArgsSchema = z.object({
  cookies: z.string().min(1).optional(),
  refreshIndex: z.boolean().default(false),
});

export type ParsedCommand =
  | { command: 'fetch-magazine' | 'fetch-web'; yearStart: number; yearEnd: number; cookies?: string; refreshIndex: boolean }
  | { command: 'compute-metrics'; source: 'magazine' | 'web' | 'all' }
  | { command: 'aggregate'; clip?: boolean }
  | { command: 'visualize' }
  | { command: 'help' };

const describeIssues = (error: z.ZodError) => error.issues.map((issue) => issue.message).join('; ');

const parseCliArgs = (argv: readonly string[]) =>
  parseArgs({
    args: [...argv],
    allowPositionals: true,
    strict: true,
    options: {
      'year-start': { type: 'string' },
      'year-end': { type: 'string' },
      cookies: { type: 'string' },
      'refresh-index': { type: 'boolean' },
      source: { type: 'string' },
      clip: { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
  });

/** Parses argv (without the node and script entries); usage errors are configuration errors. */
export const parseCommandLine = (argv: readonly string[]): ParsedCommand => {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    throw new ConfigurationError(errorMessage(error), { cause: error });
  }
  const { values, positionals } = parsed;
  const [name, ...extra] = positionals;
  if (values.help || !name || name === 'help') return { command: 'help' };
  if (extra.length) {
    throw new ConfigurationError(`Unexpected arguments: ${extra.join(' ')}`);
  }

  switch (name) {
    case 'fetch-magazine':
    case 'fetch-web': {
      const range = YearRangeSchema.safeParse({ yearStart: values['year-start'], yearEnd: values['year-end'] });
      if (!range.success) {
        throw new ConfigurationError(`Invalid year range: ${describeIssues(range.error)}`);
      }
      const fetchArgs = FetchArgsSchema.parse({ cookies: values.cookies, refreshIndex: values['refresh-index'] });
      return { command: name, ...range.data, ...fetchArgs };
    }
    case 'compute-metrics': {
      const source = z.enum(['magazine', 'web', 'all']).safeParse(values.source ?? 'all');
      if (!source.success) {
        throw new ConfigurationError(`Invalid --source: ${values.source ?? ''}`);
      }
      return { command: name, source: source.data };
    }
    case 'aggregate':
      return values.clip ? { command: name, clip: true } : { command: name };
    case 'visualize':
      return { command: name };
    default:
      throw new ConfigurationError(`Unknown command: ${name}`);
  }
};

export interface RunCommandDeps {
  config: AppConfig;
  logger: Logger;
  cwd: string;
  store?: ArtifactStore;
  fetchImpl?: typeof fetch;
  renderer?: Renderer | null;
  signal?: AbortSignal;
}

const runFetchCommand = async (
  parsed: Extract<ParsedCommand, { command: 'fetch-magazine' | 'fetch-web' }>,
  deps: RunCommandDeps,
  store: ArtifactStore,
): Promise<RunSummary> => {
  const { config, logger } = deps;
  const { cookies, path: cookiesPath } = await resolveCookies({
    explicitPath: parsed.cookies ?? config.credentials.cookiesPath,
    cwd: deps.cwd,
    defaultDomain: cookieDomainFor(config.periodical.baseUrl),
  });
  if (parsed.command === 'fetch-magazine' && !cookies.length) {
    throw new ConfigurationError('fetch-magazine needs subscriber cookies: pass --cookies or set COOKIES_PATH');
  }
  logger.info('Credentials loaded', { cookies: cookies.length, path: cookiesPath });

  const cache = await openCacheStore(config.persistence.cacheDir);
  if (cache.corruptFiles.length) {
    logger.warn('Ignored unreadable cache entries', { files: cache.corruptFiles.length });
  }
  const renderer = deps.renderer === undefined ? createRendererFromConfig(config, logger) : deps.renderer;
  const fetcher = createFetcher({ config, cache, logger, cookies, renderer, fetchImpl: deps.fetchImpl });
  const commandDeps = { config, logger, store, fetcher, signal: deps.signal };
  try {
    const range = { yearStart: parsed.yearStart, yearEnd: parsed.yearEnd, refreshIndex: parsed.refreshIndex };
    return parsed.command === 'fetch-magazine'
      ? await fetchMagazine(commandDeps, range)
      : await fetchWeb(commandDeps, range);
  } finally {
    logger.debug('Fetcher stats', { ...fetcher.stats });
    await renderer?.close();
  }
};

export const runCommand = async (
  parsed: Exclude<ParsedCommand, { command: 'help' }>,
  deps: RunCommandDeps,
): Promise<RunSummary> => {
  const { config, logger } = deps;
  const store = deps.store ?? createFsArtifactStore(config);
  switch (parsed.command) {
    case 'fetch-magazine':
    case 'fetch-web':
      return runFetchCommand(parsed, deps, store);
    case 'compute-metrics': {
      const daleChall = await selectDaleChallStrategy(logger);
      return computeMetrics(
        { config, logger, store, engine: createMetricsEngine({ daleChall }), signal: deps.signal },
        { source: parsed.source },
      );
    }
    case 'aggregate':
      return aggregateMetrics({ config, logger, store }, { clip: parsed.clip });
    case 'visualize':
      return visualize({ config, logger, store });
  }
};

