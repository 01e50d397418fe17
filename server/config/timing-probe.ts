import { probeConfigSchema, type ProbeConfig } from "@shared/schema";
import { DEFAULT_CHARSET, normalizeCharset } from "../services/timing-oracle/charset";
import { ProbeConfigError } from "../services/timing-oracle/errors";

type Loose<T> = T extends string ? string : T;

/** Values that take precedence over the environment, checked like the rest. */
export type ProbeConfigOverrides = { [K in keyof ProbeConfig]?: Loose<ProbeConfig[K]> };

export const PROBE_DEFAULTS = {
  parameterName: "q",
  parameterLocation: "url_param",
  httpMethod: "GET",
  charset: DEFAULT_CHARSET,
  seed: "",
  thresholdMs: 170,
  repeats: 7,
  timeoutMs: 3000,
  delayMs: 0,
  maxLength: 64,
  stallRetries: 0,
  aggregation: "mean",
  trimFraction: 0.1,
  topN: 5,
  userAgent: "timing-probe/1.0",
} as const;

function definedEntries(overrides: ProbeConfigOverrides): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined),
  );
}

/**
 * Builds the probe configuration from TIMING_PROBE_* variables, applies the
 * overrides on top and validates the result.
 *
 * @throws ProbeConfigError listing every invalid field
 */
export function loadProbeConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ProbeConfigOverrides = {},
): ProbeConfig {
  const fromEnv: ProbeConfigOverrides = {
    targetUrl: env.TIMING_PROBE_URL,
    parameterName: env.TIMING_PROBE_PARAM || PROBE_DEFAULTS.parameterName,
    parameterLocation: env.TIMING_PROBE_PARAM_LOCATION || PROBE_DEFAULTS.parameterLocation,
    httpMethod: (env.TIMING_PROBE_METHOD || PROBE_DEFAULTS.httpMethod).toUpperCase(),
    charset: env.TIMING_PROBE_CHARSET || PROBE_DEFAULTS.charset,
    seed: env.TIMING_PROBE_SEED ?? PROBE_DEFAULTS.seed,
    thresholdMs: parseFloat(env.TIMING_PROBE_THRESHOLD_MS || String(PROBE_DEFAULTS.thresholdMs)),
    repeats: parseInt(env.TIMING_PROBE_REPEATS || String(PROBE_DEFAULTS.repeats), 10),
    timeoutMs: parseInt(env.TIMING_PROBE_TIMEOUT_MS || String(PROBE_DEFAULTS.timeoutMs), 10),
    delayMs: parseInt(env.TIMING_PROBE_DELAY_MS || String(PROBE_DEFAULTS.delayMs), 10),
    maxLength: parseInt(env.TIMING_PROBE_MAX_LENGTH || String(PROBE_DEFAULTS.maxLength), 10),
    stallRetries: parseInt(env.TIMING_PROBE_STALL_RETRIES || String(PROBE_DEFAULTS.stallRetries), 10),
    aggregation: env.TIMING_PROBE_AGGREGATION || PROBE_DEFAULTS.aggregation,
    trimFraction: parseFloat(env.TIMING_PROBE_TRIM_FRACTION || String(PROBE_DEFAULTS.trimFraction)),
    topN: parseInt(env.TIMING_PROBE_TOP_N || String(PROBE_DEFAULTS.topN), 10),
    userAgent: env.TIMING_PROBE_USER_AGENT || PROBE_DEFAULTS.userAgent,
    headers: {},
  };

  const parsed = probeConfigSchema.safeParse({ ...fromEnv, ...definedEntries(overrides) });
  if (!parsed.success) {
    throw new ProbeConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`),
    );
  }

  return {
    ...parsed.data,
    charset: normalizeCharset(parsed.data.charset).join(""),
  };
}
