/**
 * Deterministic stand-ins for the network used across the timing probe tests.
 */

import type { TrialOutcome } from "@shared/schema";
import type { CandidateMeasurer, CandidateTransport, LatencyMeasurement } from "../types";

/** Measurer driven by a plain latency function. Records every candidate. */
export class FakeMeasurer implements CandidateMeasurer {
  readonly calls: string[] = [];

  constructor(private readonly latencyOf: (candidate: string) => number) {}

  async measure(candidate: string): Promise<LatencyMeasurement> {
    this.calls.push(candidate);
    const latencyMs = this.latencyOf(candidate);
    return { latencyMs, samples: [latencyMs], failures: 0 };
  }
}

/** Slow for every prefix of `secret`, fast otherwise. */
export function prefixOracle(secret: string, hitMs = 500, missMs = 100): (candidate: string) => number {
  return (candidate) => (secret.startsWith(candidate) ? hitMs : missMs);
}

/** Transport that answers from a script instead of the network. */
export class ScriptedTransport implements CandidateTransport {
  readonly sent: string[] = [];

  constructor(
    readonly timeoutMs: number,
    private readonly respond: (candidate: string, index: number) => TrialOutcome,
  ) {}

  async send(candidate: string): Promise<TrialOutcome> {
    const outcome = this.respond(candidate, this.sent.length);
    this.sent.push(candidate);
    return outcome;
  }
}

export function okTrial(durationMs: number): TrialOutcome {
  return { ok: true, statusCode: 200, durationMs };
}

export function failedTrial(durationMs = 0): TrialOutcome {
  return {
    ok: false,
    statusCode: 0,
    durationMs,
    failure: { kind: "connection_refused", message: "fetch failed" },
  };
}
