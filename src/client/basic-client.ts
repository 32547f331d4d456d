import { cancelledError } from "../errors.js";
import { ClientEvent, type ClientOperation } from "../events.js";
import { ChatClientBase } from "./base.js";
import type { CallOptions, ClientOptions } from "./types.js";

/**
 * Authenticated client without retries or payload validation. Transport
 * failures are still mapped to SecretAIError.
 */
export class BasicClient extends ChatClientBase {
  override readonly mode = "basic" as const;

  constructor(options: ClientOptions = {}) {
    super(options);
    this.logger.debug("Initialized BasicClient", { host: this.host });
  }

  protected override async execute<T>(
    operation: ClientOperation,
    call: (signal: AbortSignal | undefined) => Promise<T>,
    options: CallOptions | undefined,
  ): Promise<T> {
    if (options?.signal?.aborted) {
      throw cancelledError(0, options.signal.reason);
    }

    const startTime = Date.now();
    this.events.emit(ClientEvent.REQUEST, { operation, attempt: 0 });

    try {
      const response = await call(options?.signal);
      this.events.emit(ClientEvent.SUCCEEDED, { operation, attempts: 1, latencyMs: Date.now() - startTime });
      return response;
    } catch (err) {
      const error = this.toSdkError(err, operation, options?.signal, 0);
      this.logger.error(`${operation} failed: ${error.message}`, { code: error.code });
      this.events.emit(ClientEvent.FAILED, { operation, error });
      throw error;
    }
  }
}
