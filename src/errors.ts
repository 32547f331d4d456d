/** Error codes for all secret-ai-kit error variants */
export enum SecretAIErrorCode {
  CONFIG = "CONFIG",

  NETWORK = "NETWORK",
  TIMEOUT = "TIMEOUT",
  CONNECTION = "CONNECTION",

  RESPONSE = "RESPONSE",

  RETRY_EXHAUSTED = "RETRY_EXHAUSTED",
  CANCELLED = "CANCELLED",
}

/** Fields carried by each variant, keyed by code */
export interface SecretAIErrorContextMap {
  [SecretAIErrorCode.CONFIG]: { setting?: string | undefined };
  [SecretAIErrorCode.NETWORK]: Record<string, never>;
  [SecretAIErrorCode.TIMEOUT]: { timeoutMs: number; operation: string };
  [SecretAIErrorCode.CONNECTION]: { host: string };
  [SecretAIErrorCode.RESPONSE]: { responseData: unknown };
  [SecretAIErrorCode.RETRY_EXHAUSTED]: { attempts: number };
  [SecretAIErrorCode.CANCELLED]: { attempt: number };
}

const NETWORK_CODES: ReadonlySet<SecretAIErrorCode> = new Set([
  SecretAIErrorCode.NETWORK,
  SecretAIErrorCode.TIMEOUT,
  SecretAIErrorCode.CONNECTION,
]);

/**
 * Single error type for the SDK. The `code` discriminates the variant and
 * `context` holds exactly the fields that variant needs.
 */
export class SecretAIError<C extends SecretAIErrorCode = SecretAIErrorCode> extends Error {
  readonly code: C;
  override readonly cause?: Error | undefined;
  readonly context: SecretAIErrorContextMap[C];

  constructor(code: C, message: string, context: SecretAIErrorContextMap[C], options?: { cause?: Error | undefined }) {
    super(message);
    this.name = "SecretAIError";
    this.code = code;
    this.cause = options?.cause;
    this.context = context;
  }
}

/** Narrow an unknown value to a SecretAIError, optionally of one specific code */
export function isSecretAIError<C extends SecretAIErrorCode>(error: unknown, code: C): error is SecretAIError<C>;
export function isSecretAIError(error: unknown): error is SecretAIError;
export function isSecretAIError(error: unknown, code?: SecretAIErrorCode): boolean {
  if (!(error instanceof SecretAIError)) return false;
  return code === undefined || error.code === code;
}

/** True for the NETWORK family: generic network, timeout and connection failures */
export function isNetworkError(
  error: unknown,
): error is SecretAIError<SecretAIErrorCode.NETWORK | SecretAIErrorCode.TIMEOUT | SecretAIErrorCode.CONNECTION> {
  return error instanceof SecretAIError && NETWORK_CODES.has(error.code);
}

export function configError(message: string, setting?: string, cause?: Error): SecretAIError<SecretAIErrorCode.CONFIG> {
  return new SecretAIError(SecretAIErrorCode.CONFIG, message, { setting }, { cause });
}

export function networkError(message: string, cause?: Error): SecretAIError<SecretAIErrorCode.NETWORK> {
  return new SecretAIError(SecretAIErrorCode.NETWORK, `Network error: ${message}`, {}, { cause });
}

export function timeoutError(
  timeoutMs: number,
  operation: string,
  cause?: Error,
): SecretAIError<SecretAIErrorCode.TIMEOUT> {
  return new SecretAIError(
    SecretAIErrorCode.TIMEOUT,
    `${operation} timed out after ${timeoutMs}ms`,
    { timeoutMs, operation },
    { cause },
  );
}

export function connectionError(host: string, cause?: Error): SecretAIError<SecretAIErrorCode.CONNECTION> {
  const detail = cause ? `: ${cause.message}` : "";
  return new SecretAIError(SecretAIErrorCode.CONNECTION, `Failed to connect to ${host}${detail}`, { host }, { cause });
}

export function responseError(
  message: string,
  responseData?: unknown,
  cause?: Error,
): SecretAIError<SecretAIErrorCode.RESPONSE> {
  return new SecretAIError(SecretAIErrorCode.RESPONSE, `Invalid response: ${message}`, { responseData }, { cause });
}

export function retryExhaustedError(attempts: number, lastError: Error): SecretAIError<SecretAIErrorCode.RETRY_EXHAUSTED> {
  return new SecretAIError(
    SecretAIErrorCode.RETRY_EXHAUSTED,
    `All ${attempts} retry attempts failed. Last error: ${lastError.message}`,
    { attempts },
    { cause: lastError },
  );
}

export function cancelledError(attempt: number, reason?: unknown): SecretAIError<SecretAIErrorCode.CANCELLED> {
  return new SecretAIError(
    SecretAIErrorCode.CANCELLED,
    `Operation cancelled before attempt ${attempt + 1}`,
    { attempt },
    { cause: reason instanceof Error ? reason : undefined },
  );
}

/** Normalize any thrown value to an Error */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
