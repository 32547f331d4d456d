/** Environment variables read by the SDK. Durations in the environment are expressed in seconds. */
export const ENV = {
  API_KEY: "SECRET_AI_API_KEY",
  LOG_LEVEL: "SECRET_SDK_LOG_LEVEL",

  MAX_RETRIES: "SECRET_AI_MAX_RETRIES",
  RETRY_DELAY: "SECRET_AI_RETRY_DELAY",
  RETRY_BACKOFF: "SECRET_AI_RETRY_BACKOFF",
  MAX_RETRY_DELAY: "SECRET_AI_MAX_RETRY_DELAY",

  REQUEST_TIMEOUT: "SECRET_AI_REQUEST_TIMEOUT",
  CONNECT_TIMEOUT: "SECRET_AI_CONNECT_TIMEOUT",

  CHAIN_ID: "SECRET_CHAIN_ID",
  NODE_URL: "SECRET_NODE_URL",
  WORKER_CONTRACT: "SECRET_WORKER_SMART_CONTRACT",
} as const;

export const DEFAULT_RETRY_CONFIG = {
  maxRetries: 3,
  initialDelayMs: 1_000,
  backoffMultiplier: 2,
  maxDelayMs: 30_000,
} as const;

export const DEFAULT_TIMEOUT_CONFIG = {
  requestTimeoutMs: 30_000,
  connectTimeoutMs: 10_000,
} as const;

export const DEFAULT_REGISTRY_CONFIG = {
  chainId: "pulsar-3",
  nodeUrl: "https://pulsar.lcd.secretnodes.com",
  contractAddress: "secret18cy3cgnmkft3ayma4nr37wgtj4faxfnrnngrlq",
  maxRetries: 3,
} as const;

export const DEFAULT_HOST = "http://127.0.0.1:11434";

export const LOG_PREFIX = "[secret-ai-kit]";
