import { Ollama } from "ollama";
import type { ChatRequest, ChatResponse, GenerateRequest, GenerateResponse } from "ollama";
import type { TimeoutConfig } from "../config/types.js";
import { timeoutError } from "../errors.js";

/** Everything a transport needs; fixed when the client is constructed */
export interface TransportSettings {
  host: string;
  /** Frozen headers added to every request (the bearer token lives here) */
  headers: Readonly<Record<string, string>>;
  timeouts: TimeoutConfig;
  /** Underlying fetch implementation (default: global fetch) */
  fetch?: typeof fetch | undefined;
}

/**
 * The network call the clients wrap. Implementations throw raw transport
 * errors and abort the in-flight request when `signal` fires.
 */
export interface ChatTransport {
  generate(request: GenerateRequest, signal?: AbortSignal): Promise<GenerateResponse>;
  chat(request: ChatRequest, signal?: AbortSignal): Promise<ChatResponse>;
}

export type TransportFactory = (settings: TransportSettings) => ChatTransport;

/**
 * Wrap fetch so every request carries the fixed headers and is bounded by:
 *   - connectTimeoutMs: until response headers arrive
 *   - requestTimeoutMs: the whole exchange, body included
 */
export function createTimedFetch(settings: Omit<TransportSettings, "host">): typeof fetch {
  const baseFetch = settings.fetch ?? globalThis.fetch;
  const { connectTimeoutMs, requestTimeoutMs } = settings.timeouts;

  return async (input, init) => {
    const headers = new Headers(init?.headers);
    for (const [name, value] of Object.entries(settings.headers)) {
      headers.set(name, value);
    }

    const connect = new AbortController();
    const connectTimer = setTimeout(() => connect.abort(timeoutError(connectTimeoutMs, "connect")), connectTimeoutMs);
    const signals = [AbortSignal.timeout(requestTimeoutMs), connect.signal];
    if (init?.signal) signals.push(init.signal);

    try {
      return await baseFetch(input, { ...init, headers, signal: AbortSignal.any(signals) });
    } finally {
      clearTimeout(connectTimer);
    }
  };
}

/** Transport over the Ollama HTTP API. Streaming is not used; each call returns one payload. */
export class OllamaTransport implements ChatTransport {
  private readonly host: string;
  private readonly timedFetch: typeof fetch;
  private readonly client: Ollama;

  constructor(settings: TransportSettings) {
    this.host = settings.host;
    this.timedFetch = createTimedFetch(settings);
    this.client = new Ollama({ host: this.host, fetch: this.timedFetch });
  }

  generate(request: GenerateRequest, signal?: AbortSignal): Promise<GenerateResponse> {
    return this.clientFor(signal).generate({ ...request, stream: false });
  }

  chat(request: ChatRequest, signal?: AbortSignal): Promise<ChatResponse> {
    return this.clientFor(signal).chat({ ...request, stream: false });
  }

  /** The shared client, or a per-call one whose requests also follow `signal` */
  private clientFor(signal: AbortSignal | undefined): Ollama {
    if (!signal) return this.client;
    const timedFetch = this.timedFetch;
    return new Ollama({
      host: this.host,
      fetch: (input, init) =>
        timedFetch(input, { ...init, signal: init?.signal ? AbortSignal.any([init.signal, signal]) : signal }),
    });
  }
}

export const createOllamaTransport: TransportFactory = (settings) => new OllamaTransport(settings);
