import { describe, it, expect } from "vitest";
import { loadProbeConfig } from "../../../config/timing-probe";
import { parseCliArgs, parseHeader } from "../cli-args";
import { ProbeConfigError } from "../errors";

describe("parseCliArgs", () => {
  it("collects overrides, headers and output options", () => {
    const args = parseCliArgs([
      "http://ctf.local/search",
      "--seed", "flag{",
      "--repeats", "9",
      "--threshold-ms", "120.5",
      "--method", "post",
      "--header", "Cookie: session=test-session",
      "--header", "X-Trace: 1",
      "--output", "out.json",
      "--quiet",
    ]);

    expect(args).toEqual({
      overrides: {
        targetUrl: "http://ctf.local/search",
        seed: "flag{",
        repeats: 9,
        thresholdMs: 120.5,
        httpMethod: "POST",
        headers: { Cookie: "session=test-session", "X-Trace": "1" },
      },
      outputPath: "out.json",
      quiet: true,
      help: false,
    });
  });

  it("accepts the target as --url", () => {
    expect(parseCliArgs(["--url", "http://ctf.local/"]).overrides).toEqual({ targetUrl: "http://ctf.local/" });
  });

  it("recognises --help", () => {
    expect(parseCliArgs(["-h"]).help).toBe(true);
  });

  it("rejects unknown options", () => {
    expect(() => parseCliArgs(["--nope", "1"])).toThrow('unknown option "--nope"');
  });

  it("rejects an option without a value", () => {
    expect(() => parseCliArgs(["--seed"])).toThrow("--seed: missing value");
  });

  it("rejects a second positional argument", () => {
    expect(() => parseCliArgs(["http://a.local/", "http://b.local/"])).toThrow(ProbeConfigError);
  });

  it("leaves numeric validation to the config loader", () => {
    const { overrides } = parseCliArgs(["--url", "http://ctf.local/", "--repeats", "many"]);

    expect(Number.isNaN(overrides.repeats)).toBe(true);
    expect(() => loadProbeConfig({}, overrides)).toThrow(ProbeConfigError);
  });
});

describe("parseHeader", () => {
  it("splits on the first colon", () => {
    expect(parseHeader("Cookie: a=b:c")).toEqual(["Cookie", "a=b:c"]);
  });

  it("rejects a header without a name", () => {
    expect(() => parseHeader("no-colon")).toThrow(ProbeConfigError);
  });
});
