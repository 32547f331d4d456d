import {
  SecretAIError,
  SecretAIErrorCode,
  cancelledError,
  connectionError,
  isSecretAIError,
  networkError,
  responseError,
  timeoutError,
  toError,
} from "../errors.js";
import { isRetryable } from "../retry/error-classifier.js";

export interface TransportErrorContext {
  operation: string;
  host: string;
  requestTimeoutMs: number;
  /** Caller's signal; once aborted every failure maps to CANCELLED */
  signal?: AbortSignal | undefined;
  /** Zero-based index of the attempt that failed */
  attempt?: number | undefined;
}

const TIMEOUT_CODES = new Set([
  "ETIMEDOUT",
  "ESOCKETTIMEDOUT",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
]);

const CONNECTION_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "UND_ERR_SOCKET",
]);

/** HTTP statuses worth another attempt */
const TRANSIENT_STATUSES = new Set([408, 429, 500, 502, 503, 504]);

function readCode(value: unknown): string | undefined {
  if (typeof value === "object" && value !== null && "code" in value && typeof value.code === "string") {
    return value.code;
  }
  return undefined;
}

/** Status carried by the Ollama client's ResponseError */
function readStatus(value: unknown): number | undefined {
  if (
    typeof value === "object" &&
    value !== null &&
    "status_code" in value &&
    typeof value.status_code === "number"
  ) {
    return value.status_code;
  }
  return undefined;
}

/**
 * Translate a raw transport failure into the SDK taxonomy so the classifier
 * sees typed errors. SecretAIErrors pass through, except timeouts raised
 * under another operation name, which are renamed.
 *
 *   caller aborted                                -> CANCELLED
 *   timeouts (abort, ETIMEDOUT, undici timeouts) -> TIMEOUT
 *   refused / reset / DNS failures                -> CONNECTION
 *   HTTP 408, 429, 500, 502-504                   -> NETWORK
 *   other HTTP statuses, unparseable bodies       -> RESPONSE
 *   anything else                                 -> NETWORK if the keyword heuristic matches, else RESPONSE
 */
export function mapTransportError(err: unknown, context: TransportErrorContext): SecretAIError {
  const { operation, host, requestTimeoutMs, signal } = context;

  if (signal?.aborted) {
    return cancelledError((context.attempt ?? 0) + 1, signal.reason);
  }

  if (err instanceof SecretAIError) {
    // Connect timeouts fire inside fetch, before the operation is known
    if (isSecretAIError(err, SecretAIErrorCode.TIMEOUT) && err.context.operation !== operation) {
      return timeoutError(err.context.timeoutMs, operation, err);
    }
    return err;
  }

  const error = toError(err);

  if (error.name === "TimeoutError") {
    return timeoutError(requestTimeoutMs, operation, error);
  }

  const status = readStatus(error);
  if (status !== undefined) {
    if (TRANSIENT_STATUSES.has(status)) {
      return networkError(`${operation} failed with HTTP ${status}: ${error.message}`, error);
    }
    return responseError(`${operation} rejected with HTTP ${status}: ${error.message}`, { status }, error);
  }

  const code = readCode(error) ?? readCode(error.cause);
  if (code !== undefined && TIMEOUT_CODES.has(code)) {
    return timeoutError(requestTimeoutMs, operation, error);
  }
  if (code !== undefined && CONNECTION_CODES.has(code)) {
    return connectionError(host, error);
  }
  if (error instanceof TypeError && error.message === "fetch failed") {
    return connectionError(host, error);
  }
  if (error.name === "AbortError") {
    return networkError(`${operation} aborted`, error);
  }
  if (error instanceof SyntaxError) {
    return responseError(`${operation} returned a malformed body: ${error.message}`, undefined, error);
  }

  if (isRetryable(error)) {
    return networkError(`${operation} failed: ${error.message}`, error);
  }
  return responseError(`${operation} failed: ${error.message}`, undefined, error);
}
