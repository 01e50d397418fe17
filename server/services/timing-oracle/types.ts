import type { CandidateMeasurement, TrialOutcome } from "@shared/schema";

/** Carries one candidate string to the oracle and times the round trip. */
export interface CandidateTransport {
  /** Ceiling recorded for a trial that fails or times out. */
  readonly timeoutMs: number;
  send(candidate: string): Promise<TrialOutcome>;
}

export interface LatencyMeasurement {
  latencyMs: number;
  samples: number[];
  failures: number;
}

/**
 * Produces the latency figure for a candidate. Production code samples the
 * network; tests substitute a deterministic function.
 */
export interface CandidateMeasurer {
  measure(candidate: string): Promise<LatencyMeasurement>;
}

export interface StallRetry {
  /** True when the position will be probed again. */
  retrying: boolean;
  retriesLeft: number;
}

/** Progress callbacks for a probe run. All are optional. */
export interface ProbeObserver {
  onMeasurement?(measurement: CandidateMeasurement): void;
  onCharacterFound?(character: string, knownPrefix: string, measurement: CandidateMeasurement): void;
  onStall?(knownPrefix: string, ranked: CandidateMeasurement[], retry: StallRetry): void;
  onLimitReached?(knownPrefix: string, maxLength: number): void;
}
