import { z } from 'zod';
import type { AggregateRecord, ArticleMetricsRow, RunSummary } from '../../shared/types';
import { aggregate } from '../aggregation/aggregate';
import { aggregateCsv } from '../output/tables';
import { ArticleMetricsRowSchema } from '../persistence/schemas';
import { PER_ARTICLE_JSON } from './computeMetrics';
import type { CommandDeps } from './context';
import { createRunRecorder, type RunRecorder } from './runSummary';

export const PER_ISSUE_CSV = 'per_issue.csv';
export const PER_ISSUE_JSON = 'per_issue.json';
export const PER_YEAR_CSV = 'per_year.csv';
export const PER_YEAR_JSON = 'per_year.json';

export interface AggregateCommandOptions {
  /** Overrides the configured clipping switch. */
  clip?: boolean;
}

const readRows = async (deps: CommandDeps, run: RunRecorder): Promise<ArticleMetricsRow[] | null> => {
  const contents = await deps.store.readOutput(PER_ARTICLE_JSON);
  if (contents === null) {
    run.fail(new Error(`${PER_ARTICLE_JSON} not found; run compute-metrics first`), { stage: 'load' });
    return null;
  }
  let raw: unknown;
  try {
    raw = JSON.parse(contents);
  } catch (error) {
    run.fail(error, { stage: 'load' });
    return null;
  }
  const parsed = z.array(ArticleMetricsRowSchema).safeParse(raw);
  if (!parsed.success) {
    run.fail(new Error(`${PER_ARTICLE_JSON} is malformed: ${parsed.error.issues[0]?.message ?? 'invalid'}`), {
      stage: 'load',
    });
    return null;
  }
  return parsed.data;
};

const writeTable = async (deps: CommandDeps, csvName: string, jsonName: string, records: AggregateRecord[]) => {
  await deps.store.writeOutput(csvName, aggregateCsv(records));
  await deps.store.writeOutput(jsonName, `${JSON.stringify(records, null, 2)}\n`);
};

export const aggregateMetrics = async (
  deps: CommandDeps,
  options: AggregateCommandOptions = {},
): Promise<RunSummary> => {
  const run = createRunRecorder('aggregate', deps.logger, deps.clock);
  await deps.store.ensureLayout();
  const rows = await readRows(deps, run);
  if (rows) {
    const settings = {
      clip: options.clip ?? deps.config.aggregation.clip,
      lowerPercentile: deps.config.aggregation.lowerPercentile,
      upperPercentile: deps.config.aggregation.upperPercentile,
    };
    const perIssue = aggregate(rows, 'issue', settings);
    const perYear = aggregate(rows, 'year', settings);
    await writeTable(deps, PER_ISSUE_CSV, PER_ISSUE_JSON, perIssue);
    await writeTable(deps, PER_YEAR_CSV, PER_YEAR_JSON, perYear);
    run.count('rows', rows.length);
    run.count('issueGroups', new Set(perIssue.map((r) => `${r.key}/${r.source}`)).size);
    run.count('yearGroups', new Set(perYear.map((r) => `${r.key}/${r.source}`)).size);
    run.logger.info('Aggregates written', { clip: settings.clip });
  }
  return run.finish(deps.store);
};
