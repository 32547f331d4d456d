import { loadRetryConfig } from "../config/loader.js";
import type { RetryConfig } from "../config/types.js";
import { cancelledError, retryExhaustedError } from "../errors.js";
import { silentLogger } from "../logger.js";
import type { Logger } from "../types.js";
import { delayFor } from "./backoff.js";
import { isRetryable } from "./error-classifier.js";
import type { ErrorClass, ErrorClassifierFn, RetryContext, RetryDecision, RetryOptions } from "./types.js";

/** RetryOptions with every default applied. Shared by the async and blocking adapters. */
export interface RetryPolicy {
  readonly config: RetryConfig;
  readonly classify: ErrorClassifierFn;
  readonly retryableErrors: readonly ErrorClass[] | undefined;
  readonly signal: AbortSignal | undefined;
  readonly logger: Logger;
  readonly label: string;
  readonly onRetry: ((error: Error, attempt: number, delayMs: number) => void) | undefined;
}

export function resolveRetryPolicy(options: RetryOptions = {}): RetryPolicy {
  return {
    config: loadRetryConfig(options.config),
    classify: options.classify ?? isRetryable,
    retryableErrors: options.retryableErrors,
    signal: options.signal,
    logger: options.logger ?? silentLogger,
    label: options.label ?? "operation",
    onRetry: options.onRetry,
  };
}

export function buildContext(
  policy: RetryPolicy,
  attempt: number,
  startTime: number,
  lastError: Error | undefined,
): RetryContext {
  return {
    attempt,
    totalAttempts: policy.config.maxRetries + 1,
    elapsedMs: Date.now() - startTime,
    lastError,
  };
}

/** @throws {SecretAIError} CANCELLED when the policy's signal has been aborted */
export function ensureNotCancelled(policy: RetryPolicy, attempt: number): void {
  if (policy.signal?.aborted) {
    policy.logger.debug(`${policy.label} cancelled`, { attempt });
    throw cancelledError(attempt, policy.signal.reason);
  }
}

/**
 * Decide what follows a failed attempt:
 *   1. allow-list set and error not listed -> rethrow
 *   2. classifier says non-retryable      -> rethrow
 *   3. last allowed attempt               -> exhausted
 *   4. otherwise                          -> wait delayFor(attempt) and retry
 */
export function planAfterFailure(error: Error, attempt: number, policy: RetryPolicy): RetryDecision {
  if (policy.retryableErrors) {
    if (!policy.retryableErrors.some((errorClass) => error instanceof errorClass)) {
      return { action: "rethrow", reason: "not in retryableErrors" };
    }
  } else if (!policy.classify(error)) {
    return { action: "rethrow", reason: "non-retryable" };
  }

  if (attempt >= policy.config.maxRetries) {
    return { action: "exhausted", error: retryExhaustedError(policy.config.maxRetries + 1, error) };
  }

  return { action: "retry", delayMs: delayFor(attempt, policy.config) };
}

/** Log the decision and fire the onRetry hook */
export function reportDecision(decision: RetryDecision, error: Error, attempt: number, policy: RetryPolicy): void {
  const totalAttempts = policy.config.maxRetries + 1;

  switch (decision.action) {
    case "rethrow":
      policy.logger.debug(`Non-retryable error in ${policy.label}: ${error.message}`, {
        attempt,
        reason: decision.reason,
      });
      return;
    case "exhausted":
      policy.logger.error(`All ${totalAttempts} attempts failed for ${policy.label}`, {
        lastError: error.message,
      });
      return;
    case "retry":
      policy.logger.warn(
        `Attempt ${attempt + 1}/${totalAttempts} failed for ${policy.label}: ${error.message}. ` +
          `Retrying in ${decision.delayMs}ms`,
        { attempt, delayMs: decision.delayMs },
      );
      policy.onRetry?.(error, attempt, decision.delayMs);
      return;
  }
}
