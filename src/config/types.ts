export interface RetryConfig {
  /** Retries after the first attempt; total attempts = maxRetries + 1 (default: 3) */
  readonly maxRetries: number;
  /** Delay before the first retry in ms (default: 1000) */
  readonly initialDelayMs: number;
  /** Exponential multiplier, at least 1 (default: 2) */
  readonly backoffMultiplier: number;
  /** Upper bound for any single delay in ms (default: 30000) */
  readonly maxDelayMs: number;
}

/** Bounds one transport attempt, independent of the retry budget */
export interface TimeoutConfig {
  /** Whole request, headers and body (default: 30000ms) */
  readonly requestTimeoutMs: number;
  /** Time allowed until the server answers with headers (default: 10000ms) */
  readonly connectTimeoutMs: number;
}
