/**
 * Typed errors for the remote collaborators and a shared classifier.
 *
 * Embedding and issue-source failures are distinct classes so callers can tell
 * a failed lookup apart from a legitimate empty result.
 */

/** The four categories used in logs and HTTP error bodies */
export type ErrorCategory =
  | "timeout"
  | "api_error"
  | "config_error"
  | "internal_error";

export type EmbeddingFailureReason =
  | "auth"
  | "quota"
  | "timeout"
  | "aborted"
  | "network"
  | "malformed_response"
  | "unknown";

export class EmbeddingBackendError extends Error {
  readonly reason: EmbeddingFailureReason;
  readonly statusCode: number | undefined;

  constructor(
    message: string,
    opts: { reason: EmbeddingFailureReason; statusCode?: number; cause?: unknown },
  ) {
    super(message, { cause: opts.cause });
    this.name = "EmbeddingBackendError";
    this.reason = opts.reason;
    this.statusCode = opts.statusCode;
  }
}

export class IssueSourceError extends Error {
  readonly statusCode: number | undefined;

  constructor(message: string, opts: { statusCode?: number; cause?: unknown } = {}) {
    super(message, { cause: opts.cause });
    this.name = "IssueSourceError";
    this.statusCode = opts.statusCode;
  }
}

/**
 * Read an HTTP status from an error thrown by an SDK. Octokit uses `status`,
 * the AI SDK uses `statusCode`.
 */
export function readStatusCode(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  if ("statusCode" in err && typeof err.statusCode === "number") return err.statusCode;
  if ("status" in err && typeof err.status === "number") return err.status;
  return undefined;
}

/**
 * Classify an error into a category for logging and responses.
 */
export function classifyError(error: unknown): ErrorCategory {
  if (error instanceof EmbeddingBackendError) {
    switch (error.reason) {
      case "timeout":
      case "aborted":
        return "timeout";
      case "auth":
        return "config_error";
      default:
        return "api_error";
    }
  }

  if (error instanceof IssueSourceError) return "api_error";

  if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
    return "timeout";
  }

  const message = error instanceof Error ? error.message : String(error);

  if (/timed? ?out/i.test(message)) return "timeout";
  if (/rate limit|API|\b[45]\d{2}\b/i.test(message)) return "api_error";

  return "internal_error";
}

/** Short human-readable summary for each category */
export const ERROR_SUMMARIES: Record<ErrorCategory, string> = {
  timeout: "The request timed out",
  api_error: "A remote API returned an error",
  config_error: "The service is misconfigured",
  internal_error: "An internal error occurred",
};
