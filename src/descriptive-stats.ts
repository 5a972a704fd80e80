import type { DescriptiveStatistics } from "./page-types.ts";
import { STATISTICS_DECIMALS } from "./page-types.ts";

export const EMPTY_DESCRIPTIVE_STATISTICS: Readonly<DescriptiveStatistics> = Object.freeze({
  count: 0,
  mean: 0,
  median: 0,
  mode: null,
  min: 0,
  max: 0,
  range: 0,
  variance: 0,
  std_dev: 0,
  skewness: 0,
  kurtosis: 0,
});

/** Rounds half to even, deciding ties on the scaled float itself. */
export function roundTo(value: number, decimals = STATISTICS_DECIMALS): number {
  const factor = 10 ** decimals;
  const scaled = value * factor;
  const lower = Math.floor(scaled);
  const fraction = scaled - lower;
  if (fraction > 0.5) return (lower + 1) / factor;
  if (fraction < 0.5) return lower / factor;
  return (lower % 2 === 0 ? lower : lower + 1) / factor;
}

/**
 * Summary statistics for a numeric sample.
 *
 * Variance and standard deviation use the sample (n - 1) denominator and are 0
 * for a single value. Skewness is Pearson's second coefficient
 * `3 * (mean - median) / std_dev` and kurtosis is excess kurtosis; both are
 * computed from the already rounded mean, median and std_dev, and are 0 when
 * std_dev is 0. Among equally frequent values the smallest is the mode.
 */
export function computeDescriptiveStatistics(values: readonly number[]): DescriptiveStatistics {
  if (values.length === 0) return { ...EMPTY_DESCRIPTIVE_STATISTICS };

  const count = values.length;
  const rawMean = values.reduce((sum, value) => sum + value, 0) / count;
  const mean = roundTo(rawMean);
  const median = roundTo(computeMedian(values));
  const min = Math.min(...values);
  const max = Math.max(...values);
  const sampleVariance = computeSampleVariance(values, rawMean);
  const variance = roundTo(sampleVariance);
  const stdDev = roundTo(Math.sqrt(sampleVariance));

  const skewness = stdDev !== 0 ? roundTo((3 * (mean - median)) / stdDev) : 0;
  const kurtosis =
    stdDev !== 0
      ? roundTo(values.reduce((sum, value) => sum + (value - mean) ** 4, 0) / count / stdDev ** 4 - 3)
      : 0;

  return {
    count,
    mean,
    median,
    mode: computeMode(values),
    min,
    max,
    range: max - min,
    variance,
    std_dev: stdDev,
    skewness,
    kurtosis,
  };
}

function computeMedian(values: readonly number[]): number {
  const sorted = [...values].sort((left, right) => left - right);
  const middle = Math.floor(sorted.length / 2);
  if (sorted.length % 2 === 1) return sorted[middle];
  return (sorted[middle - 1] + sorted[middle]) / 2;
}

function computeSampleVariance(values: readonly number[], mean: number): number {
  if (values.length < 2) return 0;
  const squaredDeviations = values.reduce((sum, value) => sum + (value - mean) ** 2, 0);
  return squaredDeviations / (values.length - 1);
}

function computeMode(values: readonly number[]): number {
  const frequencies = new Map<number, number>();
  for (const value of values) frequencies.set(value, (frequencies.get(value) ?? 0) + 1);

  let mode = values[0];
  let bestCount = 0;
  for (const [value, frequency] of frequencies) {
    if (frequency > bestCount || (frequency === bestCount && value < mode)) {
      mode = value;
      bestCount = frequency;
    }
  }
  return mode;
}
