/**
 * Error taxonomy for promptloom.
 *
 * Every failure surfaced by the core carries a {@link ErrorKind} so callers can
 * decide between retrying, aborting and reporting without string matching.
 */

/**
 * Failure categories.
 *
 * - `InvalidConfiguration`: bad sizes, parameters or config files (fatal)
 * - `TemplateNotFound` / `MissingTemplateKey`: template problems, raised before any request
 * - `RateLimited` / `ServiceUnavailable` / `Timeout`: transient backend failures
 * - `AuthInvalid` / `InvalidRequest`: backend rejected the request (fatal)
 * - `Cancelled`: the run was aborted by the caller
 * - `ChunkFailed`: a chunk could not be completed; wraps the underlying error
 */
export type ErrorKind =
  | "InvalidConfiguration"
  | "TemplateNotFound"
  | "MissingTemplateKey"
  | "RateLimited"
  | "AuthInvalid"
  | "ServiceUnavailable"
  | "Timeout"
  | "InvalidRequest"
  | "Cancelled"
  | "ChunkFailed";

/**
 * Kinds a {@link CompletionClient} may report.
 */
export type CompletionErrorKind = Extract<
  ErrorKind,
  "RateLimited" | "AuthInvalid" | "ServiceUnavailable" | "Timeout" | "InvalidRequest" | "Cancelled"
>;

export abstract class LoomError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidConfigurationError extends LoomError {
  readonly kind = "InvalidConfiguration" as const;
}

export class TemplateNotFoundError extends LoomError {
  readonly kind = "TemplateNotFound" as const;

  constructor(readonly templateName: string) {
    super(`Template '${templateName}' not found`);
  }
}

export class MissingTemplateKeyError extends LoomError {
  readonly kind = "MissingTemplateKey" as const;

  constructor(
    readonly templateName: string,
    readonly keys: readonly string[],
  ) {
    super(
      `Template '${templateName}' is missing ${keys.length === 1 ? "a value" : "values"} for: ${keys.join(", ")}`,
    );
  }
}

/**
 * Thrown when a template cannot be compiled or rendered.
 */
export class TemplateSyntaxError extends LoomError {
  readonly kind = "InvalidConfiguration" as const;

  constructor(
    message: string,
    readonly templateName?: string,
  ) {
    super(templateName ? `[template ${templateName}]: ${message}` : message);
  }
}

export class CompletionError extends LoomError {
  /** HTTP status reported by the backend, when there was one. */
  readonly status?: number;

  constructor(
    readonly kind: CompletionErrorKind,
    message: string,
    options?: { cause?: unknown; status?: number },
  ) {
    super(message, options);
    this.status = options?.status;
  }
}

export class CancelledError extends CompletionError {
  constructor(message = "Run cancelled", options?: { cause?: unknown }) {
    super("Cancelled", message, options);
  }
}

export class ChunkFailedError extends LoomError {
  readonly kind = "ChunkFailed" as const;

  constructor(
    readonly chunkIndex: number,
    readonly cause: LoomError,
    readonly attempts: number,
  ) {
    super(`Chunk ${chunkIndex} failed after ${attempts} attempt${attempts === 1 ? "" : "s"}: ${cause.message}`, {
      cause,
    });
  }
}

export function isLoomError(error: unknown): error is LoomError {
  return error instanceof LoomError;
}

/**
 * Detects if an error is an abort/cancellation error.
 *
 * Covers `AbortError` from fetch/AbortController, the OpenAI SDK's
 * `APIUserAbortError`, our own {@link CancelledError}, and messages mentioning
 * abort or cancellation.
 */
export function isAbortError(error: unknown): boolean {
  if (error instanceof CancelledError) return true;
  if (!(error instanceof Error)) return false;

  if (error.name === "AbortError") return true;
  if (error.name === "APIUserAbortError") return true;

  const message = error.message.toLowerCase();
  if (message.includes("abort")) return true;
  if (message.includes("cancelled")) return true;
  if (message.includes("canceled")) return true;

  return false;
}
