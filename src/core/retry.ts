/**
 * Retry configuration for completion requests.
 *
 * Provides exponential backoff with jitter for transient backend failures
 * (rate limits, server errors, timeouts) and classifies arbitrary errors into
 * {@link CompletionErrorKind}s.
 */

import { CompletionError, type CompletionErrorKind, type ErrorKind, isAbortError } from "./errors.js";

/**
 * Decides whether a failed attempt is retried.
 *
 * @param attempt - 1-based number of the attempt that just failed
 * @param kind - Classified failure
 */
export type ShouldRetry = (attempt: number, kind: ErrorKind) => boolean;

/**
 * Configuration options for retry behavior.
 *
 * @example
 * ```typescript
 * const pipeline = new CompletionPipeline(client, {
 *   retry: {
 *     retries: 5,
 *     minTimeout: 2000,
 *     onRetry: (error, attempt) => console.error(`Retry ${attempt}: ${error.message}`),
 *   },
 * });
 * ```
 */
export interface RetryConfig {
  /**
   * Whether retry is enabled.
   * @default true
   */
  enabled?: boolean;

  /**
   * Maximum number of retries after the first attempt.
   * @default 3
   */
  retries?: number;

  /**
   * Minimum delay before the first retry in milliseconds.
   * @default 1000
   */
  minTimeout?: number;

  /**
   * Maximum delay between retries in milliseconds.
   * @default 30000
   */
  maxTimeout?: number;

  /**
   * Exponential factor for backoff calculation.
   * @default 2
   */
  factor?: number;

  /**
   * Whether to add random jitter to the delay.
   * @default true
   */
  randomize?: boolean;

  /**
   * Called before each retry attempt.
   */
  onRetry?: (error: CompletionError, attempt: number) => void;

  /**
   * Called when all retries are exhausted. The error is still reported as the
   * chunk's failure afterwards.
   */
  onRetriesExhausted?: (error: CompletionError, attempts: number) => void;

  /**
   * Custom retry decision. Defaults to retrying the transient kinds
   * (see {@link isRetryableKind}).
   */
  shouldRetry?: ShouldRetry;
}

/**
 * Resolved retry configuration with all defaults applied.
 */
export interface RetryPolicy {
  enabled: boolean;
  retries: number;
  minTimeout: number;
  maxTimeout: number;
  factor: number;
  randomize: boolean;
  onRetry?: (error: CompletionError, attempt: number) => void;
  onRetriesExhausted?: (error: CompletionError, attempts: number) => void;
  shouldRetry: ShouldRetry;
}

/**
 * Default retry configuration values.
 * Conservative defaults: 3 retries with up to 30s delay.
 */
export const DEFAULT_RETRY_CONFIG: Omit<RetryPolicy, "onRetry" | "onRetriesExhausted" | "shouldRetry"> = {
  enabled: true,
  retries: 3,
  minTimeout: 1000,
  maxTimeout: 30000,
  factor: 2,
  randomize: true,
};

const RETRYABLE_KINDS: ReadonlySet<ErrorKind> = new Set<ErrorKind>(["RateLimited", "ServiceUnavailable", "Timeout"]);

/**
 * True for transient failures: `RateLimited`, `ServiceUnavailable`, `Timeout`.
 */
export function isRetryableKind(kind: ErrorKind): boolean {
  return RETRYABLE_KINDS.has(kind);
}

export const defaultShouldRetry: ShouldRetry = (_attempt, kind) => isRetryableKind(kind);

/**
 * Resolves a partial retry configuration by applying defaults.
 */
export function createRetryPolicy(config?: RetryConfig): RetryPolicy {
  if (!config) {
    return { ...DEFAULT_RETRY_CONFIG, shouldRetry: defaultShouldRetry };
  }

  return {
    enabled: config.enabled ?? DEFAULT_RETRY_CONFIG.enabled,
    retries: config.retries ?? DEFAULT_RETRY_CONFIG.retries,
    minTimeout: config.minTimeout ?? DEFAULT_RETRY_CONFIG.minTimeout,
    maxTimeout: config.maxTimeout ?? DEFAULT_RETRY_CONFIG.maxTimeout,
    factor: config.factor ?? DEFAULT_RETRY_CONFIG.factor,
    randomize: config.randomize ?? DEFAULT_RETRY_CONFIG.randomize,
    onRetry: config.onRetry,
    onRetriesExhausted: config.onRetriesExhausted,
    shouldRetry: config.shouldRetry ?? defaultShouldRetry,
  };
}

function readStatus(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
    return error.status;
  }
  return undefined;
}

/**
 * Maps an HTTP status to a failure kind.
 */
export function kindFromStatus(status: number): CompletionErrorKind {
  if (status === 408) return "Timeout";
  if (status === 429) return "RateLimited";
  if (status === 401 || status === 403) return "AuthInvalid";
  if (status >= 500) return "ServiceUnavailable";
  return "InvalidRequest";
}

const KIND_BY_ERROR_NAME: Readonly<Record<string, CompletionErrorKind>> = {
  APIUserAbortError: "Cancelled",
  AbortError: "Cancelled",
  APIConnectionTimeoutError: "Timeout",
  APITimeoutError: "Timeout",
  TimeoutError: "Timeout",
  RateLimitError: "RateLimited",
  InternalServerError: "ServiceUnavailable",
  ServiceUnavailableError: "ServiceUnavailable",
  APIConnectionError: "ServiceUnavailable",
  AuthenticationError: "AuthInvalid",
  PermissionDeniedError: "AuthInvalid",
  BadRequestError: "InvalidRequest",
  NotFoundError: "InvalidRequest",
  UnprocessableEntityError: "InvalidRequest",
};

function kindFromMessage(message: string): CompletionErrorKind {
  const text = message.toLowerCase();

  if (text.includes("429") || text.includes("rate limit") || text.includes("rate_limit")) {
    return "RateLimited";
  }

  if (
    text.includes("401") ||
    text.includes("403") ||
    text.includes("unauthorized") ||
    text.includes("forbidden") ||
    text.includes("invalid api key") ||
    text.includes("incorrect api key")
  ) {
    return "AuthInvalid";
  }

  if (text.includes("timeout") || text.includes("etimedout") || text.includes("timed out")) {
    return "Timeout";
  }

  if (
    text.includes("500") ||
    text.includes("502") ||
    text.includes("503") ||
    text.includes("504") ||
    text.includes("internal server error") ||
    text.includes("bad gateway") ||
    text.includes("service unavailable") ||
    text.includes("overloaded") ||
    text.includes("econnreset") ||
    text.includes("econnrefused") ||
    text.includes("enotfound") ||
    text.includes("network")
  ) {
    return "ServiceUnavailable";
  }

  return "InvalidRequest";
}

/**
 * Classifies any thrown value into a completion failure kind.
 *
 * Order: our own {@link CompletionError}, abort errors, HTTP status, SDK error
 * class names, then message patterns. Anything unrecognised is treated as a
 * non-retryable `InvalidRequest`.
 */
export function classifyError(error: unknown): CompletionErrorKind {
  if (error instanceof CompletionError) {
    return error.kind;
  }
  if (isAbortError(error)) {
    return "Cancelled";
  }

  const status = readStatus(error);
  if (status !== undefined) {
    return kindFromStatus(status);
  }

  if (error instanceof Error) {
    return KIND_BY_ERROR_NAME[error.name] ?? kindFromMessage(error.message);
  }

  return kindFromMessage(String(error));
}

/**
 * Wraps any thrown value in a {@link CompletionError}, keeping it as `cause`.
 */
export function toCompletionError(error: unknown): CompletionError {
  if (error instanceof CompletionError) {
    return error;
  }
  const kind = classifyError(error);
  const message = error instanceof Error ? formatCompletionError(error) : String(error);
  return new CompletionError(kind, message, { cause: error, status: readStatus(error) });
}

/**
 * Formats a backend error into a short, single-line message.
 *
 * @example
 * ```typescript
 * formatCompletionError(new Error("429 You exceeded your current quota"));
 * // "Rate limit exceeded (429) - retry after a few seconds"
 * ```
 */
export function formatCompletionError(error: Error): string {
  const message = error.message;
  const lower = message.toLowerCase();
  const name = error.name;

  if (message.includes("429") || lower.includes("rate limit") || lower.includes("rate_limit")) {
    return "Rate limit exceeded (429) - retry after a few seconds";
  }
  if (lower.includes("overloaded") || lower.includes("capacity")) {
    return "API overloaded - retry later";
  }
  if (message.includes("500") || lower.includes("internal server error")) {
    return "Internal server error (500) - the API is experiencing issues";
  }
  if (message.includes("502") || lower.includes("bad gateway")) {
    return "Bad gateway (502) - the API is temporarily unavailable";
  }
  if (message.includes("503") || lower.includes("service unavailable")) {
    return "Service unavailable (503) - the API is temporarily down";
  }
  if (message.includes("504") || lower.includes("gateway timeout")) {
    return "Gateway timeout (504) - the request took too long";
  }
  if (lower.includes("timeout") || lower.includes("timed out")) {
    return "Request timed out - the API took too long to respond";
  }
  if (lower.includes("econnrefused")) {
    return "Connection refused - unable to reach the API";
  }
  if (lower.includes("econnreset")) {
    return "Connection reset - the API closed the connection";
  }
  if (lower.includes("enotfound")) {
    return "DNS error - unable to resolve API hostname";
  }
  if (message.includes("401") || lower.includes("unauthorized") || name === "AuthenticationError") {
    return "Authentication failed - check your API key";
  }
  if (message.includes("403") || lower.includes("forbidden") || name === "PermissionDeniedError") {
    return "Permission denied - your API key lacks required permissions";
  }
  if (message.includes("400") || name === "BadRequestError") {
    const match = message.match(/message['":\s]+['"]?([^'"}\]]+)/i);
    if (match?.[1]) {
      return `Bad request: ${match[1].trim()}`;
    }
    return "Bad request - check your input parameters";
  }

  // JSON payloads: "message": "...", 'message': '...', message: ...
  const jsonMatch = message.match(/["']?message["']?\s*[:=]\s*["']([^"']+)["']/i);
  if (jsonMatch?.[1]) {
    return jsonMatch[1].trim();
  }

  if (message.length > 200) {
    const firstPart = message.split(/[.!?\n]/)[0];
    if (firstPart && firstPart.length > 10 && firstPart.length < 150) {
      return firstPart.trim();
    }
    return `${message.slice(0, 150).trim()}...`;
  }

  return message;
}
