import { randomId } from '../../shared/crypto';
import type { ArtifactStore } from '../../shared/artifacts';
import {
  AlignmentError,
  ExtractionError,
  FetchError,
  MetricsError,
  errorMessage,
  isFatalError,
} from '../../shared/errors';
import type { CommandName, FailureRecord, FailureStage, RunSummary } from '../../shared/types';
import type { Logger } from '../obs/logger';
import type { Clock } from '../utils/async';

export interface FailureContext {
  stage?: FailureStage;
  url?: string;
  articleId?: string;
}

export interface RunRecorder {
  readonly runId: string;
  readonly logger: Logger;
  count: (name: string, by?: number) => void;
  /** Records a per-resource failure; configuration and storage errors are rethrown. */
  fail: (error: unknown, context?: FailureContext) => FailureRecord;
  summary: () => RunSummary;
  finish: (store: ArtifactStore) => Promise<RunSummary>;
}

export const classifyFailure = (error: unknown): { stage: FailureStage; reason: string } | null => {
  if (error instanceof FetchError) return { stage: 'fetch', reason: error.kind };
  if (error instanceof ExtractionError) return { stage: 'extract', reason: error.reason };
  if (error instanceof AlignmentError) return { stage: 'align', reason: error.reason };
  if (error instanceof MetricsError) return { stage: 'metrics', reason: error.reason };
  return null;
};

export const createRunRecorder = (command: CommandName, baseLogger: Logger, clock: Clock = Date.now): RunRecorder => {
  const runId = randomId();
  const logger = baseLogger.child({ runId, command });
  const startedAt = new Date(clock()).toISOString();
  const counts: Record<string, number> = {};
  const failures: FailureRecord[] = [];

  const count = (name: string, by = 1) => {
    counts[name] = (counts[name] ?? 0) + by;
  };

  const fail = (error: unknown, context: FailureContext = {}): FailureRecord => {
    if (isFatalError(error)) {
      throw error;
    }
    const known = classifyFailure(error);
    const record: FailureRecord = {
      stage: known?.stage ?? context.stage ?? 'fetch',
      reason: known?.reason ?? 'unexpected',
      message: errorMessage(error),
      ...(context.url ? { url: context.url } : {}),
      ...(context.articleId ? { articleId: context.articleId } : {}),
    };
    failures.push(record);
    count('failures');
    logger.warn('Resource failed', { ...record });
    return record;
  };

  const summary = (): RunSummary => ({
    runId,
    command,
    startedAt,
    finishedAt: new Date(clock()).toISOString(),
    counts: { ...counts },
    failures: [...failures],
  });

  const finish = async (store: ArtifactStore): Promise<RunSummary> => {
    const result = summary();
    await store.saveRunArtifact(runId, 'summary', result);
    logger.info('Run finished', { counts: result.counts, failures: result.failures.length });
    return result;
  };

  return { runId, logger, count, fail, summary, finish };
};
