import { writeFileSync } from "fs";
import type { ProbeConfig, ProbeReport } from "@shared/schema";
import { LatencySampler } from "./latency-sampler";
import { PrefixProber, type ProbeState } from "./prefix-prober";
import { HttpCandidateTransport, TimingHttpClient } from "./timing-http-client";
import type { CandidateTransport, ProbeObserver } from "./types";

export interface ProbeRunOptions {
  observer?: ProbeObserver;
  /** Replaces the HTTP transport built from the config. */
  transport?: CandidateTransport;
  sleep?: (ms: number) => Promise<void>;
  clock?: () => Date;
}

export interface ProbeRunResult {
  state: ProbeState;
  report: ProbeReport;
}

export function createHttpTransport(config: ProbeConfig): CandidateTransport {
  const client = new TimingHttpClient({
    timeout: config.timeoutMs,
    userAgent: config.userAgent,
    headers: config.headers,
  });
  return new HttpCandidateTransport(client, {
    targetUrl: config.targetUrl,
    parameterName: config.parameterName,
    parameterLocation: config.parameterLocation,
    httpMethod: config.httpMethod,
  });
}

export function buildProbeReport(
  config: ProbeConfig,
  state: ProbeState,
  requestCount: number,
  startedAt: Date,
  finishedAt: Date,
): ProbeReport {
  return {
    targetUrl: config.targetUrl,
    parameterName: config.parameterName,
    parameterLocation: config.parameterLocation,
    thresholdMs: config.thresholdMs,
    repeats: config.repeats,
    aggregation: config.aggregation,
    seed: config.seed,
    status: state.status,
    secret: state.knownPrefix,
    positions: [...state.positions],
    stalledCandidates: [...state.lastStall],
    requestCount,
    startedAt: startedAt.toISOString(),
    finishedAt: finishedAt.toISOString(),
  };
}

/**
 * Runs a full probe against the configured target and summarises it.
 */
export async function runTimingProbe(config: ProbeConfig, options: ProbeRunOptions = {}): Promise<ProbeRunResult> {
  const clock = options.clock ?? (() => new Date());
  const startedAt = clock();

  const sampler = new LatencySampler(options.transport ?? createHttpTransport(config), {
    repeats: config.repeats,
    delayMs: config.delayMs,
    aggregation: config.aggregation,
    trimFraction: config.trimFraction,
    sleep: options.sleep,
  });

  const prober = new PrefixProber(sampler, {
    charset: config.charset,
    thresholdMs: config.thresholdMs,
    maxLength: config.maxLength,
    stallRetries: config.stallRetries,
    topN: config.topN,
    observer: options.observer,
  });

  const state = await prober.run(config.seed);
  const report = buildProbeReport(config, state, sampler.requestCount, startedAt, clock());

  return { state, report };
}

export function writeProbeReport(path: string, report: ProbeReport): void {
  writeFileSync(path, JSON.stringify(report, null, 2) + "\n", "utf8");
}
