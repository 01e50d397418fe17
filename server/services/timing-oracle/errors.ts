/**
 * Typed error classes for the timing probe.
 *
 * Transport failures are not errors here: the HTTP client turns them into
 * trial outcomes. These classes cover setup problems that stop a run before
 * the first request.
 */

/**
 * Base error class for all timing probe errors.
 */
export class TimingProbeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TimingProbeError";
  }
}

/**
 * Thrown when the merged configuration fails validation.
 *
 * @example
 * ```typescript
 * try {
 *   loadProbeConfig(process.env, overrides);
 * } catch (e) {
 *   if (e instanceof ProbeConfigError) {
 *     e.issues.forEach((issue) => console.error(issue));
 *   }
 * }
 * ```
 */
export class ProbeConfigError extends TimingProbeError {
  constructor(readonly issues: string[]) {
    super(`Invalid probe configuration: ${issues.join("; ")}`);
    this.name = "ProbeConfigError";
  }
}

/**
 * Thrown when there is no character left to try at a position.
 */
export class EmptyCharsetError extends TimingProbeError {
  constructor() {
    super("Charset is empty: at least one candidate character is required");
    this.name = "EmptyCharsetError";
  }
}
