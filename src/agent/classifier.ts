// ============================================================
// Doc Analyzer - Retry Classification
// Decides which tool-reported errors are worth retrying
// ============================================================

/**
 * Maps an error message to "retryable" (true) or "terminal" (false).
 * Swap it out if the CLI ever reports structured error codes.
 */
export type ErrorClassifier = (message: string) => boolean;

const TRANSIENT_MARKERS = ['rate', 'limit'];

/**
 * Default classifier: a message mentioning "rate" or "limit"
 * (any case) is treated as a transient rate-limit error.
 */
export const isTransientErrorMessage: ErrorClassifier = (message) => {
  const lower = message.toLowerCase();
  return TRANSIENT_MARKERS.some((marker) => lower.includes(marker));
};

/**
 * Linear backoff: attempt N waits N * retryWaitSeconds.
 *
 * @param attempt - 1-indexed attempt that just failed
 * @returns Delay in milliseconds
 */
export function backoffDelayMs(attempt: number, retryWaitSeconds: number): number {
  return attempt * retryWaitSeconds * 1000;
}
