import type { HttpMethod, ParameterLocation } from "@shared/schema";

export interface CandidateRequestTarget {
  targetUrl: string;
  parameterName: string;
  parameterLocation: ParameterLocation;
  httpMethod: HttpMethod;
}

/** Request pieces that carry one candidate string. */
export interface PreparedRequest {
  url: string;
  body?: string;
  headers?: Record<string, string>;
}

/**
 * Build a PreparedRequest that places the candidate into the configured
 * location (URL query param, JSON body, header, cookie, or path segment).
 */
export function buildCandidateRequest(target: CandidateRequestTarget, candidate: string): PreparedRequest {
  switch (target.parameterLocation) {
    case "url_param": {
      const url = new URL(target.targetUrl);
      url.searchParams.set(target.parameterName, candidate);
      return { url: url.toString() };
    }
    case "body_param":
      return {
        url: target.targetUrl,
        body: JSON.stringify({ [target.parameterName]: candidate }),
        headers: { "Content-Type": "application/json" },
      };
    case "header":
      return {
        url: target.targetUrl,
        headers: { [target.parameterName]: candidate },
      };
    case "cookie":
      return {
        url: target.targetUrl,
        headers: { Cookie: `${target.parameterName}=${encodeURIComponent(candidate)}` },
      };
    case "path": {
      const url = new URL(target.targetUrl);
      const segments = url.pathname.split("/");
      segments[segments.length - 1] = encodeURIComponent(candidate);
      url.pathname = segments.join("/");
      return { url: url.toString() };
    }
  }
}
