/**
 * Transport Error Classifier
 * Maps fetch/undici failures onto the small set of kinds the probe reports
 */

import type { TransportFailure, TransportFailureKind } from "@shared/schema";

function collectMessages(error: unknown): string {
  const parts: string[] = [];
  let current: unknown = error;

  // fetch wraps the socket error in `cause`
  for (let depth = 0; depth < 3 && current instanceof Error; depth++) {
    parts.push(current.name, current.message);
    if ("code" in current && typeof current.code === "string") {
      parts.push(current.code);
    }
    current = current.cause;
  }

  return parts.join(" ").toLowerCase();
}

export function classifyTransportError(error: unknown): TransportFailureKind {
  if (!(error instanceof Error)) {
    return "unknown";
  }

  const text = collectMessages(error);

  if (text.includes("abort") || text.includes("timeout") || text.includes("timed out")) {
    return "timeout";
  }

  if (text.includes("econnrefused") || text.includes("connection refused")) {
    return "connection_refused";
  }

  if (text.includes("enotfound") || text.includes("eai_again") || text.includes("getaddrinfo")) {
    return "dns";
  }

  if (text.includes("fetch failed") || text.includes("econnreset") || text.includes("network") ||
      text.includes("socket") || text.includes("epipe")) {
    return "network";
  }

  return "unknown";
}

export function toTransportFailure(error: unknown): TransportFailure {
  return {
    kind: classifyTransportError(error),
    message: error instanceof Error ? error.message : "Unknown error",
  };
}
