import { cancelledError, toError } from "../errors.js";
import { buildContext, ensureNotCancelled, planAfterFailure, reportDecision, resolveRetryPolicy } from "./policy.js";
import { sleep, sleepSync } from "./sleep.js";
import type { RetryContext, RetryOptions } from "./types.js";

/**
 * Execute `fn` with retries, waiting between attempts without blocking the
 * event loop. Returns the first successful result.
 *
 * Non-retryable errors are rethrown as they were thrown. A retryable error on
 * the last attempt becomes RETRY_EXHAUSTED; an aborted `signal` becomes CANCELLED.
 */
export async function withRetry<T>(fn: (context: RetryContext) => Promise<T>, options?: RetryOptions): Promise<T> {
  const policy = resolveRetryPolicy(options);
  const startTime = Date.now();
  let lastError: Error | undefined;

  for (let attempt = 0; ; attempt++) {
    ensureNotCancelled(policy, attempt);

    try {
      return await fn(buildContext(policy, attempt, startTime, lastError));
    } catch (err) {
      // An abort during the attempt ends the call, whatever the attempt threw
      ensureNotCancelled(policy, attempt + 1);
      const error = toError(err);
      lastError = error;

      const decision = planAfterFailure(error, attempt, policy);
      reportDecision(decision, error, attempt, policy);
      if (decision.action === "rethrow") throw err;
      if (decision.action === "exhausted") throw decision.error;

      const completed = await sleep(decision.delayMs, policy.signal);
      if (!completed) {
        policy.logger.debug(`${policy.label} cancelled while waiting`, { attempt });
        throw cancelledError(attempt + 1, policy.signal?.reason);
      }
    }
  }
}

/**
 * Blocking counterpart of {@link withRetry}: same decisions and errors, but the
 * wait between attempts blocks the thread. For synchronous call sites only.
 */
export function withRetrySync<T>(fn: (context: RetryContext) => T, options?: RetryOptions): T {
  const policy = resolveRetryPolicy(options);
  const startTime = Date.now();
  let lastError: Error | undefined;

  for (let attempt = 0; ; attempt++) {
    ensureNotCancelled(policy, attempt);

    try {
      return fn(buildContext(policy, attempt, startTime, lastError));
    } catch (err) {
      // An abort during the attempt ends the call, whatever the attempt threw
      ensureNotCancelled(policy, attempt + 1);
      const error = toError(err);
      lastError = error;

      const decision = planAfterFailure(error, attempt, policy);
      reportDecision(decision, error, attempt, policy);
      if (decision.action === "rethrow") throw err;
      if (decision.action === "exhausted") throw decision.error;

      sleepSync(decision.delayMs);
    }
  }
}
