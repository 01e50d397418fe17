import type { HttpMethod, TrialOutcome } from "@shared/schema";
import { buildCandidateRequest, type CandidateRequestTarget } from "./candidate-request";
import { toTransportFailure } from "./transport-errors";
import type { CandidateTransport } from "./types";

const DEFAULT_TIMEOUT_MS = 3000;
const DEFAULT_USER_AGENT = "timing-probe/1.0";

export interface TimedRequestOptions {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  body?: string;
  timeout?: number;
}

export interface TimingHttpClientOptions {
  timeout?: number;
  userAgent?: string;
  headers?: Record<string, string>;
  /** Monotonic clock in milliseconds. */
  now?: () => number;
}

/**
 * Sends one request and reports how long it took.
 *
 * Never throws for transport problems: timeouts, refused connections and DNS
 * failures come back as an outcome with `ok: false` and a classified failure.
 */
export class TimingHttpClient {
  private defaultTimeout: number;
  private userAgent: string;
  private baseHeaders: Record<string, string>;
  private now: () => number;

  constructor(options?: TimingHttpClientOptions) {
    this.defaultTimeout = options?.timeout ?? DEFAULT_TIMEOUT_MS;
    this.userAgent = options?.userAgent ?? DEFAULT_USER_AGENT;
    this.baseHeaders = options?.headers ?? {};
    this.now = options?.now ?? (() => performance.now());
  }

  get timeoutMs(): number {
    return this.defaultTimeout;
  }

  async request(options: TimedRequestOptions): Promise<TrialOutcome> {
    const headers: Record<string, string> = {
      "User-Agent": this.userAgent,
      ...this.baseHeaders,
      ...options.headers,
    };

    const controller = new AbortController();
    const timeout = setTimeout(() => {
      controller.abort();
    }, options.timeout ?? this.defaultTimeout);

    const startTime = this.now();

    try {
      const response = await fetch(options.url, {
        method: options.method,
        headers,
        body: options.body,
        signal: controller.signal,
        redirect: "follow",
      });

      // Drain the body so the timing covers the whole response
      await response.arrayBuffer();

      return {
        ok: true,
        statusCode: response.status,
        durationMs: Math.max(0, this.now() - startTime),
      };
    } catch (error) {
      return {
        ok: false,
        statusCode: 0,
        durationMs: Math.max(0, this.now() - startTime),
        failure: toTransportFailure(error),
      };
    } finally {
      clearTimeout(timeout);
    }
  }
}

/**
 * Sends each candidate to the configured target through a TimingHttpClient.
 */
export class HttpCandidateTransport implements CandidateTransport {
  constructor(
    private readonly client: TimingHttpClient,
    private readonly target: CandidateRequestTarget,
  ) {}

  get timeoutMs(): number {
    return this.client.timeoutMs;
  }

  send(candidate: string): Promise<TrialOutcome> {
    const prepared = buildCandidateRequest(this.target, candidate);
    return this.client.request({
      method: this.target.httpMethod,
      url: prepared.url,
      headers: prepared.headers,
      body: prepared.body,
    });
  }
}
