import type { ProbeConfigOverrides } from "../../config/timing-probe";
import { ProbeConfigError } from "./errors";

export interface ProbeCliArgs {
  overrides: ProbeConfigOverrides;
  outputPath?: string;
  quiet: boolean;
  help: boolean;
}

export const USAGE = `Usage: npx tsx scripts/timing-probe.ts <target-url> [options]

Options:
  --param <name>           Parameter carrying the candidate (default: q)
  --location <where>       url_param | body_param | header | cookie | path
  --method <verb>          GET | POST | PUT | DELETE | PATCH (default: GET)
  --charset <chars>        Candidate characters, tried in order
  --seed <prefix>          Known start of the secret
  --threshold-ms <n>       Latency above which a character is accepted (default: 170)
  --repeats <n>            Requests per candidate (default: 7)
  --timeout-ms <n>         Per-request timeout (default: 3000)
  --delay-ms <n>           Pause between requests (default: 0)
  --max-length <n>         Stop once the secret is this long (default: 64)
  --stall-retries <n>      Re-probe a stalled position up to n times per run (default: 0)
  --aggregation <policy>   mean | median | trimmed_mean (default: mean)
  --trim-fraction <f>      Fraction trimmed from each end for trimmed_mean (default: 0.1)
  --top <n>                Slowest candidates listed on a stall (default: 5)
  --user-agent <ua>        User-Agent header
  --header "Name: value"   Extra request header, repeatable
  --output <path>          Write a JSON report to file
  --quiet                  Only print discoveries and the result

Every option can also be set through TIMING_PROBE_* environment variables.`;

const STRING_FLAGS = {
  "--url": "targetUrl",
  "--param": "parameterName",
  "--location": "parameterLocation",
  "--charset": "charset",
  "--seed": "seed",
  "--aggregation": "aggregation",
  "--user-agent": "userAgent",
} as const;

const INT_FLAGS = {
  "--repeats": "repeats",
  "--timeout-ms": "timeoutMs",
  "--delay-ms": "delayMs",
  "--max-length": "maxLength",
  "--stall-retries": "stallRetries",
  "--top": "topN",
} as const;

const FLOAT_FLAGS = {
  "--threshold-ms": "thresholdMs",
  "--trim-fraction": "trimFraction",
} as const;

function isKeyOf<T extends object>(table: T, key: string): key is Extract<keyof T, string> {
  return Object.prototype.hasOwnProperty.call(table, key);
}

export function parseHeader(raw: string): [string, string] {
  const idx = raw.indexOf(":");
  if (idx <= 0) {
    throw new ProbeConfigError([`header: expected "Name: value", got "${raw}"`]);
  }
  return [raw.slice(0, idx).trim(), raw.slice(idx + 1).trim()];
}

/**
 * Parses command-line arguments into configuration overrides. Values are
 * validated later, together with the environment.
 */
export function parseCliArgs(argv: readonly string[]): ProbeCliArgs {
  const overrides: ProbeConfigOverrides = {};
  const headers: Record<string, string> = {};
  const result: ProbeCliArgs = { overrides, quiet: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === "--help" || arg === "-h") {
      result.help = true;
      continue;
    }
    if (arg === "--quiet") {
      result.quiet = true;
      continue;
    }
    if (!arg.startsWith("--")) {
      if (overrides.targetUrl !== undefined) {
        throw new ProbeConfigError([`unexpected argument "${arg}"`]);
      }
      overrides.targetUrl = arg;
      continue;
    }

    const value = argv[i + 1];
    if (value === undefined) {
      throw new ProbeConfigError([`${arg}: missing value`]);
    }
    i++;

    if (arg === "--method") {
      overrides.httpMethod = value.toUpperCase();
    } else if (arg === "--header") {
      const [name, headerValue] = parseHeader(value);
      headers[name] = headerValue;
    } else if (arg === "--output") {
      result.outputPath = value;
    } else if (isKeyOf(STRING_FLAGS, arg)) {
      overrides[STRING_FLAGS[arg]] = value;
    } else if (isKeyOf(INT_FLAGS, arg)) {
      overrides[INT_FLAGS[arg]] = parseInt(value, 10);
    } else if (isKeyOf(FLOAT_FLAGS, arg)) {
      overrides[FLOAT_FLAGS[arg]] = parseFloat(value);
    } else {
      throw new ProbeConfigError([`unknown option "${arg}"`]);
    }
  }

  if (Object.keys(headers).length > 0) {
    overrides.headers = headers;
  }

  return result;
}
