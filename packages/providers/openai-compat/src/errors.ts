// Error classification for OpenAI-compatible providers.
//
// Two families:
//   Transport errors: the server could not be reached (not running, DNS, reset)
//   Provider errors: the server answered but rejected the request (auth, rate limit, ...)

import type { ProviderErrorCode } from "@tidechat/core";

/**
 * Map an HTTP status from the completions endpoint to a provider error code.
 */
export function classifyStatus(status: number): ProviderErrorCode {
  if (status === 401 || status === 403) return "auth_failed";
  if (status === 429) return "throttled";
  if (status === 413) return "context_length_exceeded";
  if (status === 400 || status === 404 || status === 422) return "invalid_request";
  if (status >= 500) return "transient_network";
  return "unknown";
}

/**
 * Map a caught error to a normalized ProviderErrorCode.
 * Handles HTTP errors whose message carries the status and body, as well as
 * network-level errors (ECONNREFUSED, etc.).
 */
export function classifyError(err: unknown): ProviderErrorCode {
  if (err instanceof Error) {
    const msg = err.message.toLowerCase();
    const name = err.name.toLowerCase();

    // AbortError is not a transport failure
    if (name === "aborterror" || msg.includes("aborted") || msg.includes("cancelled")) {
      return "cancelled";
    }

    if (
      msg.includes("econnrefused") ||
      msg.includes("econnreset") ||
      msg.includes("enotfound") ||
      msg.includes("etimedout") ||
      msg.includes("network") ||
      msg.includes("fetch failed")
    ) {
      return "transient_network";
    }

    if (
      msg.includes("api key") ||
      msg.includes("unauthorized") ||
      msg.includes("forbidden") ||
      msg.includes("401") ||
      msg.includes("403")
    ) {
      return "auth_failed";
    }

    if (msg.includes("rate limit") || msg.includes("429") || msg.includes("quota")) {
      return "throttled";
    }

    if (msg.includes("context length") || msg.includes("maximum context") || msg.includes("too long")) {
      return "context_length_exceeded";
    }

    if (msg.includes("invalid") || msg.includes("400") || msg.includes("bad request")) {
      return "invalid_request";
    }
  }
  return "unknown";
}

/**
 * Suffix for connectivity failures, so the operator knows which endpoint
 * was being dialed.
 */
export function buildErrorHint(code: ProviderErrorCode, providerName: string, baseUrl: string): string {
  if (code === "transient_network") {
    return ` (is ${providerName} reachable at ${baseUrl}?)`;
  }
  return "";
}
