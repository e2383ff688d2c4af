/**
 * Backoff and Sleep Utilities
 *
 * Exponential backoff with jitter and an abortable sleep, shared by the
 * stream listener and the poll scheduler.
 */

// ============================================================================
// Configuration
// ============================================================================

export interface BackoffConfig {
  /** Base delay in ms for exponential backoff */
  baseDelayMs: number;
  /** Maximum delay in ms */
  maxDelayMs: number;
  /** Jitter factor (0-1) for randomization */
  jitterFactor: number;
}

export const DEFAULT_BACKOFF_CONFIG: Readonly<BackoffConfig> = {
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterFactor: 0.3,
};

// ============================================================================
// Backoff
// ============================================================================

/**
 * Calculate delay for exponential backoff with jitter.
 * The result never exceeds maxDelayMs.
 */
export function calculateBackoff(
  attempt: number,
  config: BackoffConfig = DEFAULT_BACKOFF_CONFIG,
  random: () => number = Math.random,
): number {
  const { baseDelayMs, maxDelayMs, jitterFactor } = config;

  // Exponential backoff: base * 2^attempt
  const exponentialDelay = Math.min(
    baseDelayMs * Math.pow(2, Math.max(0, attempt)),
    maxDelayMs,
  );

  const jitter = exponentialDelay * jitterFactor * random();

  return Math.min(Math.round(exponentialDelay + jitter), maxDelayMs);
}

// ============================================================================
// Sleep
// ============================================================================

/**
 * Sleep for a specified duration. Resolves early (without throwing) when the
 * signal is aborted, so loops can re-check their own stop condition.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
