import pRetry, { AbortError } from "p-retry";
import { errorMessage } from "./errors.js";

export { AbortError };

export interface RetryOptions {
  /** Retries after the first attempt (default: 3) */
  retries?: number;
  /** Delay before the first retry in ms (default: 1000) */
  minTimeout?: number;
  signal?: AbortSignal;
  permanentErrorPatterns?: RegExp[];
  transientErrorPatterns?: RegExp[];
}

/**
 * Failures that will not change on retry: missing resources, bad
 * credentials, validation errors.
 */
export const DEFAULT_PERMANENT_ERROR_PATTERNS: RegExp[] = [
  /HTTP 404/,
  /Not Found/i,
  /HTTP 401/,
  /Bad credentials/i,
  /HTTP 403/,
  /Resource not accessible/i,
  /HTTP 422/,
  /Validation Failed/i,
];

/**
 * Failures worth retrying even when a permanent pattern also matches,
 * e.g. a 403 caused by a secondary rate limit.
 */
export const DEFAULT_TRANSIENT_ERROR_PATTERNS: RegExp[] = [
  /rate limit/i,
  /HTTP 5\d\d/,
  /ETIMEDOUT/,
  /ECONNRESET/,
  /ECONNREFUSED/,
  /ENOTFOUND/,
  /socket hang up/i,
  /timed out/i,
];

function errorText(error: unknown): string {
  const stderr =
    error instanceof Error && "stderr" in error ? String(error.stderr) : "";
  return `${errorMessage(error)}\n${stderr}`;
}

export function isTransientError(
  error: unknown,
  patterns: RegExp[] = DEFAULT_TRANSIENT_ERROR_PATTERNS
): boolean {
  const text = errorText(error);
  return patterns.some((pattern) => pattern.test(text));
}

export function isPermanentError(
  error: unknown,
  permanentPatterns: RegExp[] = DEFAULT_PERMANENT_ERROR_PATTERNS,
  transientPatterns: RegExp[] = DEFAULT_TRANSIENT_ERROR_PATTERNS
): boolean {
  if (isTransientError(error, transientPatterns)) {
    return false;
  }
  const text = errorText(error);
  return permanentPatterns.some((pattern) => pattern.test(text));
}

/**
 * Runs an operation, retrying transient failures with exponential backoff.
 * Permanent failures are rethrown immediately, unwrapped.
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  options?: RetryOptions
): Promise<T> {
  const permanent =
    options?.permanentErrorPatterns ?? DEFAULT_PERMANENT_ERROR_PATTERNS;
  const transient =
    options?.transientErrorPatterns ?? DEFAULT_TRANSIENT_ERROR_PATTERNS;

  return pRetry(
    async () => {
      try {
        return await operation();
      } catch (error) {
        if (
          error instanceof Error &&
          isPermanentError(error, permanent, transient)
        ) {
          throw new AbortError(error);
        }
        throw error;
      }
    },
    {
      retries: options?.retries ?? 3,
      minTimeout: options?.minTimeout ?? 1000,
      signal: options?.signal,
    }
  );
}
