import type { RetryConfig } from "../config/types.js";

/**
 * Exponential backoff without jitter:
 *   min(initialDelayMs * backoffMultiplier^attempt, maxDelayMs)
 */
export function delayFor(attempt: number, config: RetryConfig): number {
  // 0 * Infinity is NaN once the power overflows
  if (config.initialDelayMs === 0) return 0;
  const exponential = config.initialDelayMs * config.backoffMultiplier ** attempt;
  return Math.min(exponential, config.maxDelayMs);
}
