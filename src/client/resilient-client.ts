import { loadRetryConfig } from "../config/loader.js";
import type { RetryConfig } from "../config/types.js";
import { toError } from "../errors.js";
import { ClientEvent, type ClientOperation } from "../events.js";
import { withRetry } from "../retry/retry.js";
import { ResponseValidator } from "../validation/response-validator.js";
import { ChatClientBase } from "./base.js";
import type { CallOptions, ClientOptions } from "./types.js";

/**
 * Client that runs every call through the retry engine and validates the
 * final payload.
 *
 * Per call:
 *   INIT -> ATTEMPTING -> SUCCESS
 *                      -> FATAL_FAILURE (non-retryable error, rethrown)
 *                      -> WAITING -> ATTEMPTING
 *                      -> EXHAUSTED (RETRY_EXHAUSTED)
 *                      -> CANCELLED (signal aborted)
 *
 * Each call owns its attempt counter; only the frozen configs and auth header
 * are shared between concurrent calls.
 */
export class ResilientClient extends ChatClientBase {
  override readonly mode = "resilient" as const;
  readonly retryConfig: RetryConfig;
  private readonly validator: ResponseValidator;

  /** @throws {SecretAIError} CONFIG on a missing API key or out-of-domain retry/timeout values */
  constructor(options: ClientOptions = {}) {
    super(options);
    this.retryConfig = loadRetryConfig(options.retry, options.env ?? process.env);
    this.validator = new ResponseValidator({ enabled: options.validateResponses ?? true, logger: this.logger });

    this.logger.info("Initialized ResilientClient", {
      host: this.host,
      requestTimeoutMs: this.timeoutConfig.requestTimeoutMs,
      maxRetries: this.retryConfig.maxRetries,
    });
  }

  get validatesResponses(): boolean {
    return this.validator.enabled;
  }

  protected override async execute<T>(
    operation: ClientOperation,
    call: (signal: AbortSignal | undefined) => Promise<T>,
    options: CallOptions | undefined,
  ): Promise<T> {
    const startTime = Date.now();
    let attempts = 0;

    try {
      const response = await withRetry(
        async (ctx) => {
          attempts = ctx.attempt + 1;
          this.events.emit(ClientEvent.REQUEST, { operation, attempt: ctx.attempt });
          try {
            return await call(options?.signal);
          } catch (err) {
            throw this.toSdkError(err, operation, options?.signal, ctx.attempt);
          }
        },
        {
          config: this.retryConfig,
          logger: this.logger,
          label: operation,
          signal: options?.signal,
          onRetry: (error, attempt, delayMs) => {
            this.events.emit(ClientEvent.RETRYING, {
              operation,
              attempt,
              maxRetries: this.retryConfig.maxRetries,
              error,
              delayMs,
            });
          },
        },
      );

      this.validator.validate(response, operation);
      this.events.emit(ClientEvent.SUCCEEDED, { operation, attempts, latencyMs: Date.now() - startTime });
      return response;
    } catch (err) {
      this.events.emit(ClientEvent.FAILED, { operation, error: toError(err) });
      throw err;
    }
  }
}
