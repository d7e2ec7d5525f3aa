/**
 * Exponential backoff for polling the admin server while it boots.
 * Pure, no side effects.
 */

export interface BackoffOptions {
  /** First delay in milliseconds (default: 1000) */
  baseDelayMs?: number;
  /** Upper bound in milliseconds (default: 30000) */
  maxDelayMs?: number;
}

const DEFAULT_BACKOFF_OPTIONS: Required<BackoffOptions> = {
  baseDelayMs: 1000,
  maxDelayMs: 30000,
};

/**
 * Delay before poll number `attempt + 1` (0-indexed).
 *
 * @example
 * calculateBackoff(0, { baseDelayMs: 2000 }) // 2000
 * calculateBackoff(3, { baseDelayMs: 2000 }) // 16000
 * calculateBackoff(9, { baseDelayMs: 2000 }) // 30000 (capped)
 */
export function calculateBackoff(attempt: number, options?: BackoffOptions): number {
  const { baseDelayMs, maxDelayMs } = { ...DEFAULT_BACKOFF_OPTIONS, ...options };
  const exponent = Math.max(0, attempt);
  return Math.min(baseDelayMs * 2 ** exponent, maxDelayMs);
}

/**
 * Clamp a delay so the next poll never lands past the deadline.
 */
export function delayUntilDeadline(delayMs: number, remainingMs: number): number {
  return Math.max(0, Math.min(delayMs, remainingMs));
}
