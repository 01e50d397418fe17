import type { CandidateMeasurement } from "@shared/schema";
import type { ProbeState } from "./prefix-prober";
import type { ProbeObserver, StallRetry } from "./types";

const TAG = "[TimingProbe]";

function formatMs(ms: number): string {
  return `${ms.toFixed(1)}ms`;
}

export interface ConsoleReporterOptions {
  /** Suppress the per-candidate lines. */
  quiet?: boolean;
}

/**
 * Prints probe progress to the console as it happens.
 */
export class ConsoleReporter implements ProbeObserver {
  private readonly quiet: boolean;

  constructor(options?: ConsoleReporterOptions) {
    this.quiet = options?.quiet ?? false;
  }

  onMeasurement(measurement: CandidateMeasurement): void {
    if (this.quiet) return;
    console.log(
      `${TAG} Trying '${measurement.candidate}' → avg ${formatMs(measurement.latencyMs)} ` +
        `(${measurement.samples.length} samples, ${measurement.failures} failed)`,
    );
  }

  onCharacterFound(character: string, knownPrefix: string): void {
    console.log(`${TAG} ✔ Found next character '${character}' → known: '${knownPrefix}'`);
  }

  onStall(knownPrefix: string, ranked: CandidateMeasurement[], retry: StallRetry): void {
    console.warn(
      `${TAG} ⚠ No character crossed the threshold after '${knownPrefix}'. Top ${ranked.length} slowest responses:`,
    );
    ranked.forEach((measurement, i) => {
      console.warn(`  ${i + 1}. '${measurement.candidate}' → ${formatMs(measurement.latencyMs)}`);
    });

    if (retry.retrying) {
      console.warn(`${TAG} Re-probing position (${retry.retriesLeft} retries left)`);
    } else {
      console.warn(`${TAG} ❌ No strong match found. Stopping.`);
    }
  }

  onLimitReached(knownPrefix: string, maxLength: number): void {
    console.warn(`${TAG} Reached max length ${maxLength} at '${knownPrefix}'. Stopping.`);
  }

  reportResult(state: ProbeState): void {
    if (state.status === "limit_reached") {
      console.log(`${TAG} Partial secret (length limit reached): ${state.knownPrefix}`);
    } else {
      console.log(`${TAG} ✅ Secret discovered: ${state.knownPrefix}`);
    }
  }
}
