import { describe, it, expect, vi } from "vitest";
import { HttpCandidateTransport, TimingHttpClient } from "../timing-http-client";

type FetchArgs = [input: string | URL | Request, init?: RequestInit];

function scriptedClock(...ticks: number[]): () => number {
  return () => ticks.shift() ?? 0;
}

function stubFetch(impl: (...args: FetchArgs) => Promise<Response>) {
  const fetchMock = vi.fn(impl);
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

describe("TimingHttpClient", () => {
  it("times a successful request", async () => {
    const fetchMock = stubFetch(async () => new Response("ok", { status: 200 }));
    const client = new TimingHttpClient({
      timeout: 3000,
      headers: { Cookie: "session=test-session" },
      now: scriptedClock(1000, 1250),
    });

    const outcome = await client.request({ method: "GET", url: "http://ctf.local/search?q=a" });

    expect(outcome).toEqual({ ok: true, statusCode: 200, durationMs: 250 });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://ctf.local/search?q=a");
    expect(init?.method).toBe("GET");
    expect(init?.headers).toEqual({ "User-Agent": "timing-probe/1.0", Cookie: "session=test-session" });
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it("treats error statuses as answered requests", async () => {
    stubFetch(async () => new Response("nope", { status: 500 }));
    const client = new TimingHttpClient({ now: scriptedClock(0, 40) });

    const outcome = await client.request({ method: "GET", url: "http://ctf.local/" });

    expect(outcome).toEqual({ ok: true, statusCode: 500, durationMs: 40 });
  });

  it("returns a classified failure instead of throwing", async () => {
    stubFetch(async () => {
      throw new TypeError("fetch failed", {
        cause: Object.assign(new Error("connect ECONNREFUSED 127.0.0.1:9"), { code: "ECONNREFUSED" }),
      });
    });
    const client = new TimingHttpClient({ now: scriptedClock(10, 15) });

    const outcome = await client.request({ method: "GET", url: "http://127.0.0.1:9/" });

    expect(outcome).toEqual({
      ok: false,
      statusCode: 0,
      durationMs: 5,
      failure: { kind: "connection_refused", message: "fetch failed" },
    });
  });

  it("aborts a request that outlives the timeout", async () => {
    stubFetch(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => {
            reject(Object.assign(new Error("This operation was aborted"), { name: "AbortError" }));
          });
        }),
    );
    const client = new TimingHttpClient({ timeout: 20, now: scriptedClock(0, 20) });

    const outcome = await client.request({ method: "GET", url: "http://ctf.local/slow" });

    expect(outcome.ok).toBe(false);
    expect(outcome.failure?.kind).toBe("timeout");
    expect(outcome.durationMs).toBe(20);
  });

  it("clears its timeout timer", async () => {
    stubFetch(async () => new Response("ok"));
    const setTimeoutSpy = vi.spyOn(globalThis, "setTimeout");
    const clearTimeoutSpy = vi.spyOn(globalThis, "clearTimeout");
    const client = new TimingHttpClient();

    await client.request({ method: "GET", url: "http://ctf.local/" });

    expect(clearTimeoutSpy).toHaveBeenCalledWith(setTimeoutSpy.mock.results[0].value);
  });
});

describe("HttpCandidateTransport", () => {
  it("sends the candidate in the configured parameter", async () => {
    const fetchMock = stubFetch(async () => new Response("ok"));
    const client = new TimingHttpClient({ timeout: 1500, now: scriptedClock(0, 80) });
    const transport = new HttpCandidateTransport(client, {
      targetUrl: "http://ctf.local/search",
      parameterName: "q",
      parameterLocation: "url_param",
      httpMethod: "GET",
    });

    const outcome = await transport.send("Ca");

    expect(transport.timeoutMs).toBe(1500);
    expect(outcome.durationMs).toBe(80);
    expect(fetchMock.mock.calls[0][0]).toBe("http://ctf.local/search?q=Ca");
  });

  it("posts a JSON body with the merged headers", async () => {
    const fetchMock = stubFetch(async () => new Response("ok"));
    const client = new TimingHttpClient({ userAgent: "probe-test" });
    const transport = new HttpCandidateTransport(client, {
      targetUrl: "http://ctf.local/login",
      parameterName: "password",
      parameterLocation: "body_param",
      httpMethod: "POST",
    });

    await transport.send("hunter");

    const init = fetchMock.mock.calls[0][1];
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe('{"password":"hunter"}');
    expect(init?.headers).toEqual({ "User-Agent": "probe-test", "Content-Type": "application/json" });
  });
});
