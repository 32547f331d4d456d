import { SecretAIError, SecretAIErrorCode } from "../errors.js";

export interface ErrorClassification {
  retryable: boolean;
  /** Short label for log lines: the error code or the keyword that matched */
  reason: string;
}

/** Lower-cased substrings that mark an unclassified error as transient */
export const RETRYABLE_KEYWORDS: readonly string[] = [
  "timeout",
  "timed out",
  "connection",
  "network",
  "temporarily unavailable",
  "service unavailable",
  "502",
  "503",
  "504",
  "gateway timeout",
];

const FATAL_CODES: ReadonlySet<SecretAIErrorCode> = new Set([
  SecretAIErrorCode.CONFIG,
  SecretAIErrorCode.RESPONSE,
  SecretAIErrorCode.RETRY_EXHAUSTED,
  SecretAIErrorCode.CANCELLED,
]);

/**
 * Classify an error. Typed SDK errors are decided by code; anything else
 * falls back to a keyword match on its message.
 */
export function classifyError(error: Error): ErrorClassification {
  if (error instanceof SecretAIError) {
    return { retryable: !FATAL_CODES.has(error.code), reason: error.code };
  }

  const msg = error.message.toLowerCase();
  const keyword = RETRYABLE_KEYWORDS.find((candidate) => msg.includes(candidate));
  if (keyword) {
    return { retryable: true, reason: keyword };
  }

  return { retryable: false, reason: "UNKNOWN" };
}

export function isRetryable(error: Error): boolean {
  return classifyError(error).retryable;
}
