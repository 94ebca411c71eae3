/**
 * Backoff utilities for transport retries.
 */

/** Delays in ms: 1s → 2s → 5s → 10s */
export const BACKOFF_DELAYS_MS = [1_000, 2_000, 5_000, 10_000] as const;

export function computeBackoffMs(consecutiveFailures: number): number {
  const idx = Math.min(consecutiveFailures - 1, BACKOFF_DELAYS_MS.length - 1);
  return BACKOFF_DELAYS_MS[Math.max(0, idx)] ?? BACKOFF_DELAYS_MS[0];
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
