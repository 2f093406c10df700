import type { ArtifactStore } from '../../shared/artifacts';
import type { AppConfig } from '../../shared/config';
import type { Logger } from '../obs/logger';
import type { Fetcher } from '../retrieval/fetcher';
import type { Clock } from '../utils/async';

export interface CommandDeps {
  config: AppConfig;
  logger: Logger;
  store: ArtifactStore;
  clock?: Clock;
  signal?: AbortSignal;
}

export interface FetchCommandDeps extends CommandDeps {
  fetcher: Fetcher;
}

export interface YearRange {
  yearStart: number;
  yearEnd: number;
}

export const yearsIn = ({ yearStart, yearEnd }: YearRange): number[] => {
  const years: number[] = [];
  for (let year = yearStart; year <= yearEnd; year += 1) {
    years.push(year);
  }
  return years;
};
