import type { ChatRequest, ChatResponse, GenerateRequest, GenerateResponse } from "ollama";
import type { RetryConfig, TimeoutConfig } from "../config/types.js";
import type { ClientEventEmitter } from "../events.js";
import type { Env, Logger } from "../types.js";
import type { TransportFactory } from "./transport.js";

/** Capability set a client is built with */
export type ClientMode = "basic" | "resilient";

export interface ClientOptions {
  /** Worker URL (default: http://127.0.0.1:11434) */
  host?: string | undefined;
  /** Falls back to SECRET_AI_API_KEY */
  apiKey?: string | undefined;
  /** Retry overrides; ignored by the basic client */
  retry?: Partial<RetryConfig> | undefined;
  timeouts?: Partial<TimeoutConfig> | undefined;
  /** Check payloads before returning them (default: true); ignored by the basic client */
  validateResponses?: boolean | undefined;
  logger?: Logger | undefined;
  /** Builds the transport from the resolved settings (default: Ollama HTTP transport) */
  transport?: TransportFactory | undefined;
  /** fetch implementation handed to the default transport */
  fetch?: typeof fetch | undefined;
  /** Environment used for defaults (default: process.env) */
  env?: Env | undefined;
}

export interface CallOptions {
  /** Abort before the next attempt or during the wait between attempts */
  signal?: AbortSignal | undefined;
}

export interface ChatClient {
  readonly mode: ClientMode;
  readonly host: string;
  readonly events: ClientEventEmitter;
  generate(request: GenerateRequest, options?: CallOptions): Promise<GenerateResponse>;
  chat(request: ChatRequest, options?: CallOptions): Promise<ChatResponse>;
}
