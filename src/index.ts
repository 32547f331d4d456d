// Clients
export { ResilientClient } from "./client/resilient-client.js";
export { BasicClient } from "./client/basic-client.js";
export { ClientBuilder } from "./client/builder.js";
export { createClient } from "./client/factory.js";
export type { CreateClientOptions } from "./client/factory.js";
export type { CallOptions, ChatClient, ClientMode, ClientOptions } from "./client/types.js";

// Transport
export { OllamaTransport, createOllamaTransport, createTimedFetch } from "./client/transport.js";
export { mapTransportError } from "./client/transport-errors.js";
export type { ChatTransport, TransportFactory, TransportSettings } from "./client/transport.js";

// Retry
export { withRetry, withRetrySync } from "./retry/retry.js";
export { delayFor } from "./retry/backoff.js";
export { classifyError, isRetryable, RETRYABLE_KEYWORDS } from "./retry/error-classifier.js";
export type { ErrorClassification } from "./retry/error-classifier.js";
export type { ErrorClass, ErrorClassifierFn, RetryContext, RetryOptions } from "./retry/types.js";

// Config
export { loadRetryConfig, loadTimeoutConfig, resolveApiKey } from "./config/loader.js";
export type { RetryConfig, TimeoutConfig } from "./config/types.js";

// Validation
export { ResponseValidator } from "./validation/response-validator.js";
export type { ResponseShape, ResponseValidatorOptions } from "./validation/response-validator.js";

// Registry
export { WorkerRegistry } from "./registry/worker-registry.js";
export type { ContractQueryClient, RegistryConfig, WorkerRegistryOptions } from "./registry/types.js";

// Shared
export { SecretAIError, SecretAIErrorCode, isSecretAIError, isNetworkError } from "./errors.js";
export type { SecretAIErrorContextMap } from "./errors.js";
export { ClientEventEmitter, ClientEvent } from "./events.js";
export type { ClientEventMap, ClientOperation } from "./events.js";
export type { Env, Logger, LogLevel } from "./types.js";
export { DEFAULT_HOST, DEFAULT_REGISTRY_CONFIG, DEFAULT_RETRY_CONFIG, DEFAULT_TIMEOUT_CONFIG, ENV } from "./constants.js";
export { createDefaultLogger, resolveLogLevel, silentLogger } from "./logger.js";
