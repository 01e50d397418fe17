import type { LatencyAggregation } from "@shared/schema";
import { TimingProbeError } from "./errors";

export type LatencyAggregator = (samples: readonly number[]) => number;

function assertNotEmpty(samples: readonly number[]): void {
  if (samples.length === 0) {
    throw new TimingProbeError("Cannot aggregate an empty sample set");
  }
}

function sum(values: readonly number[]): number {
  return values.reduce((a, b) => a + b, 0);
}

export function mean(samples: readonly number[]): number {
  assertNotEmpty(samples);
  return sum(samples) / samples.length;
}

export function median(samples: readonly number[]): number {
  assertNotEmpty(samples);
  const sorted = [...samples].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  if (sorted.length % 2 === 1) {
    return sorted[mid];
  }
  return (sorted[mid - 1] + sorted[mid]) / 2;
}

/**
 * Mean after dropping `floor(n * fraction)` samples from each end.
 * `fraction` must be in [0, 0.5).
 */
export function trimmedMean(samples: readonly number[], fraction: number): number {
  assertNotEmpty(samples);
  if (fraction < 0 || fraction >= 0.5) {
    throw new TimingProbeError(`Trim fraction must be in [0, 0.5), got ${fraction}`);
  }
  const sorted = [...samples].sort((a, b) => a - b);
  const trim = Math.floor(sorted.length * fraction);
  return mean(sorted.slice(trim, sorted.length - trim));
}

export function createAggregator(policy: LatencyAggregation, trimFraction = 0.1): LatencyAggregator {
  switch (policy) {
    case "mean":
      return mean;
    case "median":
      return median;
    case "trimmed_mean":
      return (samples) => trimmedMean(samples, trimFraction);
  }
}
