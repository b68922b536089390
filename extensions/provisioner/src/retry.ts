/**
 * Converge — Retry Utilities
 *
 * Exponential backoff with jitter, and a default transient-error classifier
 * providers can use as their `classify` implementation.
 */

import type { ErrorClass, RetryConfig } from "./types.js";
import { OperationTimeoutError } from "./errors.js";

// =============================================================================
// Configuration
// =============================================================================

export const RETRY_DEFAULTS: RetryConfig = {
  maxAttempts: 3,
  minDelayMs: 200,
  maxDelayMs: 30_000,
  jitterFactor: 0.2,
};

export type ErrorClassifier = (error: unknown) => ErrorClass;

/**
 * Error codes that are safe to retry.
 */
export const TRANSIENT_ERROR_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EPIPE",
  "EAI_AGAIN",
  "ERR_SOCKET_CONNECTION_TIMEOUT",
  "Throttling",
  "ThrottlingException",
  "TooManyRequestsException",
  "RequestLimitExceeded",
  "ServiceUnavailable",
  "InternalError",
  "UNAVAILABLE",
  "RESOURCE_EXHAUSTED",
  "DEADLINE_EXCEEDED",
]);

const TRANSIENT_MESSAGE_PATTERNS = [
  "throttl",
  "too many requests",
  "rate limit",
  "rate exceeded",
  "temporarily unavailable",
  "service unavailable",
  "connection reset",
  "socket hang up",
  "network error",
  "fetch failed",
];

// =============================================================================
// Error Checking
// =============================================================================

function field(error: object, name: string): unknown {
  return name in error ? Reflect.get(error, name) : undefined;
}

/**
 * Determine whether an error is safe to retry.
 */
export function isTransientError(error: unknown): boolean {
  if (typeof error !== "object" || error === null) return false;
  if (error instanceof OperationTimeoutError) return false;

  const code = field(error, "code") ?? field(error, "Code") ?? field(error, "name");
  if (typeof code === "string" && TRANSIENT_ERROR_CODES.has(code)) return true;

  // 429 = throttled, 5xx = server errors
  const metadata = field(error, "$metadata");
  const status = field(error, "statusCode")
    ?? field(error, "status")
    ?? (typeof metadata === "object" && metadata !== null ? field(metadata, "httpStatusCode") : undefined);
  if (status === 429) return true;
  if (typeof status === "number" && status >= 500 && status < 600) return true;

  const message = field(error, "message");
  if (typeof message !== "string") return false;
  const lower = message.toLowerCase();
  return TRANSIENT_MESSAGE_PATTERNS.some((pattern) => lower.includes(pattern));
}

/** `isTransientError` as an ErrorClassifier. */
export const classifyError: ErrorClassifier = (error) =>
  isTransientError(error) ? "transient" : "fatal";

// =============================================================================
// Backoff
// =============================================================================

/**
 * Delay before retrying after the given (1-based) failed attempt.
 */
export function computeBackoffDelay(
  attempt: number,
  config: RetryConfig,
  random: () => number = Math.random,
): number {
  const baseDelay = config.minDelayMs * 2 ** (attempt - 1);
  const cappedDelay = Math.min(baseDelay, config.maxDelayMs);
  const jitter = cappedDelay * config.jitterFactor * (random() * 2 - 1);
  return Math.round(Math.min(config.maxDelayMs, Math.max(config.minDelayMs, cappedDelay + jitter)));
}

/**
 * Resolve after `ms`, or as soon as the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener("abort", done, { once: true });
  });
}
