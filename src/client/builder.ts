import type { RetryConfig, TimeoutConfig } from "../config/types.js";
import type { Env, Logger } from "../types.js";
import { type CreateClientOptions, createClient } from "./factory.js";
import type { TransportFactory } from "./transport.js";
import type { ChatClient } from "./types.js";

/**
 * Fluent builder for constructing a chat client.
 *
 * Usage:
 *   const client = new ClientBuilder()
 *     .host("https://worker.example:21434")
 *     .apiKey(process.env.SECRET_AI_API_KEY)
 *     .withRetry({ maxRetries: 5 })
 *     .withTimeouts({ requestTimeoutMs: 60_000 })
 *     .build();
 */
export class ClientBuilder {
  private config: CreateClientOptions = {};

  /** Set the worker URL */
  host(url: string): this {
    this.config.host = url;
    return this;
  }

  /** Set the API key; without it the builder falls back to SECRET_AI_API_KEY */
  apiKey(key: string | undefined): this {
    this.config.apiKey = key;
    return this;
  }

  /** Configure retry behavior (resilient mode) */
  withRetry(config: Partial<RetryConfig>): this {
    this.config.retry = { ...this.config.retry, ...config };
    return this;
  }

  /** Configure per-attempt timeouts */
  withTimeouts(config: Partial<TimeoutConfig>): this {
    this.config.timeouts = { ...this.config.timeouts, ...config };
    return this;
  }

  /** Skip payload validation (resilient mode) */
  disableValidation(): this {
    this.config.validateResponses = false;
    return this;
  }

  /** Set the logger */
  withLogger(logger: Logger): this {
    this.config.logger = logger;
    return this;
  }

  /** Replace the default Ollama transport */
  withTransport(factory: TransportFactory): this {
    this.config.transport = factory;
    return this;
  }

  /** Use a specific fetch implementation for the default transport */
  withFetch(fetchImpl: typeof fetch): this {
    this.config.fetch = fetchImpl;
    return this;
  }

  /** Read defaults from this environment instead of process.env */
  withEnv(env: Env): this {
    this.config.env = env;
    return this;
  }

  /** Build a client without retries or validation */
  basic(): this {
    this.config.mode = "basic";
    return this;
  }

  /** Build a client with retries and validation (the default) */
  resilient(): this {
    this.config.mode = "resilient";
    return this;
  }

  /** Build and return the client */
  build(): ChatClient {
    return createClient(this.config);
  }
}
