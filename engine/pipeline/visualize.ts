import { z } from 'zod';
import type { RunSummary } from '../../shared/types';
import { renderTrendChart } from '../output/chart';
import { AggregateRecordSchema } from '../persistence/schemas';
import { PER_YEAR_JSON } from './aggregateMetrics';
import type { CommandDeps } from './context';
import { createRunRecorder } from './runSummary';

export const TRENDS_SVG = 'yearly_trends.svg';

export const visualize = async (deps: CommandDeps): Promise<RunSummary> => {
  const run = createRunRecorder('visualize', deps.logger, deps.clock);
  await deps.store.ensureLayout();
  const contents = await deps.store.readOutput(PER_YEAR_JSON);
  if (contents === null) {
    run.fail(new Error(`${PER_YEAR_JSON} not found; run aggregate first`), { stage: 'load' });
    return run.finish(deps.store);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(contents);
  } catch (error) {
    run.fail(error, { stage: 'load' });
    return run.finish(deps.store);
  }
  const parsed = z.array(AggregateRecordSchema).safeParse(raw);
  if (!parsed.success) {
    run.fail(new Error(`${PER_YEAR_JSON} is malformed`), { stage: 'load' });
    return run.finish(deps.store);
  }

  const location = await deps.store.writeOutput(TRENDS_SVG, renderTrendChart(parsed.data));
  run.count('records', parsed.data.length);
  run.logger.info('Chart written', { location });
  return run.finish(deps.store);
};
