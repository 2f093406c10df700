export interface Summary {
  n: number;
  median: number;
  p25: number;
  p75: number;
}

/** Percentile of ascending-sorted values, interpolating linearly between closest ranks. */
export const percentile = (sorted: readonly number[], p: number): number => {
  if (!sorted.length) return Number.NaN;
  if (sorted.length === 1) return sorted[0];
  const rank = (Math.min(Math.max(p, 0), 100) / 100) * (sorted.length - 1);
  const lower = Math.floor(rank);
  const upper = Math.ceil(rank);
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (rank - lower);
};

export const sortAscending = (values: readonly number[]): number[] =>
  values.filter((value) => Number.isFinite(value)).sort((a, b) => a - b);

/** Keeps values inside `[P(lower), P(upper)]`, bounds inclusive. */
export const clipToPercentiles = (values: readonly number[], lower: number, upper: number): number[] => {
  const sorted = sortAscending(values);
  if (sorted.length < 2) return sorted;
  const low = percentile(sorted, lower);
  const high = percentile(sorted, upper);
  return sorted.filter((value) => value >= low && value <= high);
};

export const summarize = (values: readonly number[]): Summary => {
  const sorted = sortAscending(values);
  return {
    n: sorted.length,
    median: percentile(sorted, 50),
    p25: percentile(sorted, 25),
    p75: percentile(sorted, 75),
  };
};
