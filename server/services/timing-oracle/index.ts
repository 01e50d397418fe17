export { DEFAULT_CHARSET, normalizeCharset } from "./charset";
export { buildCandidateRequest, type CandidateRequestTarget, type PreparedRequest } from "./candidate-request";
export { USAGE, parseCliArgs, parseHeader, type ProbeCliArgs } from "./cli-args";
export { ConsoleReporter, type ConsoleReporterOptions } from "./console-reporter";
export { TimingProbeError, ProbeConfigError, EmptyCharsetError } from "./errors";
export { mean, median, trimmedMean, createAggregator, type LatencyAggregator } from "./latency-aggregator";
export { LatencySampler, type LatencySamplerOptions } from "./latency-sampler";
export {
  PrefixProber,
  initialProbeState,
  rankSlowest,
  type CharacterDiscovery,
  type PrefixProberOptions,
  type ProbeState,
} from "./prefix-prober";
export {
  runTimingProbe,
  createHttpTransport,
  buildProbeReport,
  writeProbeReport,
  type ProbeRunOptions,
  type ProbeRunResult,
} from "./probe-runner";
export { TimingHttpClient, HttpCandidateTransport, type TimedRequestOptions } from "./timing-http-client";
export { classifyTransportError, toTransportFailure } from "./transport-errors";
export type { CandidateMeasurer, CandidateTransport, LatencyMeasurement, ProbeObserver, StallRetry } from "./types";
