import type { ChatRequest, ChatResponse, GenerateRequest, GenerateResponse } from "ollama";
import { loadTimeoutConfig, resolveApiKey } from "../config/loader.js";
import type { TimeoutConfig } from "../config/types.js";
import { DEFAULT_HOST } from "../constants.js";
import type { SecretAIError } from "../errors.js";
import { type ClientOperation, ClientEventEmitter } from "../events.js";
import { createDefaultLogger, resolveLogLevel } from "../logger.js";
import type { Logger } from "../types.js";
import { type ChatTransport, type TransportSettings, createOllamaTransport } from "./transport.js";
import { mapTransportError } from "./transport-errors.js";
import type { CallOptions, ChatClient, ClientMode, ClientOptions } from "./types.js";

/**
 * Shared construction for every client mode: API key resolution, the frozen
 * bearer header, timeouts and the transport. Subclasses decide how a single
 * call is executed.
 */
export abstract class ChatClientBase implements ChatClient {
  abstract readonly mode: ClientMode;
  readonly host: string;
  readonly events: ClientEventEmitter;
  readonly timeoutConfig: TimeoutConfig;
  protected readonly logger: Logger;
  protected readonly transport: ChatTransport;

  /** @throws {SecretAIError} CONFIG when no API key can be resolved or a timeout is invalid */
  constructor(options: ClientOptions = {}) {
    const env = options.env ?? process.env;
    // Resolved first: nothing touches the network without a key
    const apiKey = resolveApiKey(options.apiKey, env);

    this.host = options.host ?? DEFAULT_HOST;
    this.logger = options.logger ?? createDefaultLogger(resolveLogLevel(env));
    this.events = new ClientEventEmitter();
    this.timeoutConfig = loadTimeoutConfig(options.timeouts, env);

    const settings: TransportSettings = {
      host: this.host,
      headers: Object.freeze({ Authorization: `Bearer ${apiKey}` }),
      timeouts: this.timeoutConfig,
      fetch: options.fetch,
    };
    this.transport = (options.transport ?? createOllamaTransport)(settings);
  }

  generate(request: GenerateRequest, options?: CallOptions): Promise<GenerateResponse> {
    return this.execute("generate", (signal) => this.transport.generate(request, signal), options);
  }

  chat(request: ChatRequest, options?: CallOptions): Promise<ChatResponse> {
    return this.execute("chat", (signal) => this.transport.chat(request, signal), options);
  }

  /** Run one public operation; `call` performs a single transport attempt, aborted by `signal` */
  protected abstract execute<T>(
    operation: ClientOperation,
    call: (signal: AbortSignal | undefined) => Promise<T>,
    options: CallOptions | undefined,
  ): Promise<T>;

  protected toSdkError(
    error: unknown,
    operation: ClientOperation,
    signal: AbortSignal | undefined,
    attempt: number,
  ): SecretAIError {
    return mapTransportError(error, {
      operation,
      host: this.host,
      requestTimeoutMs: this.timeoutConfig.requestTimeoutMs,
      signal,
      attempt,
    });
  }
}
