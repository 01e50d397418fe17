import type { LatencyAggregation } from "@shared/schema";
import { createAggregator, type LatencyAggregator } from "./latency-aggregator";
import type { CandidateMeasurer, CandidateTransport, LatencyMeasurement } from "./types";

export interface LatencySamplerOptions {
  /** Requests sent per candidate. */
  repeats: number;
  /** Pause between consecutive requests, in milliseconds. */
  delayMs?: number;
  aggregation?: LatencyAggregation;
  trimFraction?: number;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Measures a candidate by sending it `repeats` times and aggregating the
 * round-trip times.
 *
 * A failed trial still contributes the time it took before failing; a fast
 * refusal adds little and a timeout lands at the ceiling. Every sample lies in
 * [0, timeoutMs], so the aggregate does too.
 */
export class LatencySampler implements CandidateMeasurer {
  private readonly repeats: number;
  private readonly delayMs: number;
  private readonly aggregate: LatencyAggregator;
  private readonly sleep: (ms: number) => Promise<void>;
  private sent = 0;

  constructor(
    private readonly transport: CandidateTransport,
    options: LatencySamplerOptions,
  ) {
    if (!Number.isInteger(options.repeats) || options.repeats < 1) {
      throw new RangeError(`repeats must be a positive integer, got ${options.repeats}`);
    }
    this.repeats = options.repeats;
    this.delayMs = options.delayMs ?? 0;
    this.aggregate = createAggregator(options.aggregation ?? "mean", options.trimFraction);
    this.sleep = options.sleep ?? defaultSleep;
  }

  /** Requests sent so far by this sampler. */
  get requestCount(): number {
    return this.sent;
  }

  async measure(candidate: string): Promise<LatencyMeasurement> {
    const ceiling = this.transport.timeoutMs;
    const samples: number[] = [];
    let failures = 0;

    for (let i = 0; i < this.repeats; i++) {
      if (this.delayMs > 0 && this.sent > 0) {
        await this.sleep(this.delayMs);
      }

      const outcome = await this.transport.send(candidate);
      this.sent++;

      if (!outcome.ok) {
        failures++;
      }
      samples.push(Math.min(Math.max(outcome.durationMs, 0), ceiling));
    }

    return {
      latencyMs: this.aggregate(samples),
      samples,
      failures,
    };
  }
}
