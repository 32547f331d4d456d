import type { RetryConfig } from "../config/types.js";
import type { Logger } from "../types.js";

/** Classifier deciding whether a failure is worth another attempt */
export type ErrorClassifierFn = (error: Error) => boolean;

export type ErrorClass = abstract new (...args: never[]) => Error;

export interface RetryOptions {
  /** Full config, or a partial one merged over the environment/built-in defaults */
  config?: RetryConfig | Partial<RetryConfig> | undefined;
  /** Defaults to {@link isRetryable} */
  classify?: ErrorClassifierFn | undefined;
  /** Explicit allow-list; when set it replaces the classifier */
  retryableErrors?: readonly ErrorClass[] | undefined;
  /** Checked before every attempt and during the wait between attempts */
  signal?: AbortSignal | undefined;
  logger?: Logger | undefined;
  /** Name used in log lines, e.g. "chat" */
  label?: string | undefined;
  /** Called before each wait, after the warning is logged */
  onRetry?: ((error: Error, attempt: number, delayMs: number) => void) | undefined;
}

export interface RetryContext {
  /** Zero-based attempt index */
  attempt: number;
  totalAttempts: number;
  elapsedMs: number;
  lastError?: Error | undefined;
}

export type RetryDecision =
  | { action: "retry"; delayMs: number }
  | { action: "rethrow"; reason: string }
  | { action: "exhausted"; error: Error };
