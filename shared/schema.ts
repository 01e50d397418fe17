import { z } from "zod";

// Where the candidate string is placed in the outgoing request
export const parameterLocations = [
  "url_param",
  "body_param",
  "header",
  "cookie",
  "path",
] as const;

export type ParameterLocation = typeof parameterLocations[number];

export const httpMethods = ["GET", "POST", "PUT", "DELETE", "PATCH"] as const;

export type HttpMethod = typeof httpMethods[number];

// How the repeated samples of one candidate collapse into a single latency
export const latencyAggregations = ["mean", "median", "trimmed_mean"] as const;

export type LatencyAggregation = typeof latencyAggregations[number];

export const transportFailureKinds = [
  "timeout",
  "connection_refused",
  "dns",
  "network",
  "unknown",
] as const;

export type TransportFailureKind = typeof transportFailureKinds[number];

// Probe configuration, after env + CLI merging
export const probeConfigSchema = z.object({
  targetUrl: z.string().url(),
  parameterName: z.string().min(1),
  parameterLocation: z.enum(parameterLocations),
  httpMethod: z.enum(httpMethods),
  charset: z.string().min(1),
  seed: z.string(),
  thresholdMs: z.number().positive(),
  repeats: z.number().int().min(1),
  timeoutMs: z.number().int().positive(),
  delayMs: z.number().int().min(0),
  maxLength: z.number().int().positive(),
  stallRetries: z.number().int().min(0),
  aggregation: z.enum(latencyAggregations),
  trimFraction: z.number().min(0).lt(0.5),
  topN: z.number().int().positive(),
  userAgent: z.string().min(1),
  headers: z.record(z.string()),
});

export type ProbeConfig = z.infer<typeof probeConfigSchema>;

export const transportFailureSchema = z.object({
  kind: z.enum(transportFailureKinds),
  message: z.string(),
});

export type TransportFailure = z.infer<typeof transportFailureSchema>;

// A single timed request
export const trialOutcomeSchema = z.object({
  ok: z.boolean(),
  statusCode: z.number().int(),
  durationMs: z.number().min(0),
  failure: transportFailureSchema.optional(),
});

export type TrialOutcome = z.infer<typeof trialOutcomeSchema>;

export const candidateMeasurementSchema = z.object({
  candidate: z.string(),
  character: z.string(),
  latencyMs: z.number().min(0),
  samples: z.array(z.number().min(0)),
  failures: z.number().int().min(0),
});

export type CandidateMeasurement = z.infer<typeof candidateMeasurementSchema>;

export const probeStatuses = ["extending", "stalled", "limit_reached"] as const;

export type ProbeStatus = typeof probeStatuses[number];

// One accepted character of the secret
export const discoveredPositionSchema = z.object({
  index: z.number().int().min(0),
  character: z.string(),
  latencyMs: z.number().min(0),
  candidatesTried: z.number().int().min(1),
});

export type DiscoveredPosition = z.infer<typeof discoveredPositionSchema>;

export const probeReportSchema = z.object({
  targetUrl: z.string(),
  parameterName: z.string(),
  parameterLocation: z.enum(parameterLocations),
  thresholdMs: z.number(),
  repeats: z.number().int(),
  aggregation: z.enum(latencyAggregations),
  seed: z.string(),
  status: z.enum(probeStatuses),
  secret: z.string(),
  positions: z.array(discoveredPositionSchema),
  stalledCandidates: z.array(candidateMeasurementSchema),
  requestCount: z.number().int().min(0),
  startedAt: z.string(),
  finishedAt: z.string(),
});

export type ProbeReport = z.infer<typeof probeReportSchema>;
