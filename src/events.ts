import { EventEmitter } from "node:events";

export type ClientOperation = "generate" | "chat";

/** Request lifecycle events emitted by the chat clients */
export enum ClientEvent {
  REQUEST = "request",
  RETRYING = "retrying",
  SUCCEEDED = "succeeded",
  FAILED = "failed",
}

export interface ClientEventMap {
  [ClientEvent.REQUEST]: { operation: ClientOperation; attempt: number };
  [ClientEvent.RETRYING]: {
    operation: ClientOperation;
    attempt: number;
    maxRetries: number;
    error: Error;
    delayMs: number;
  };
  [ClientEvent.SUCCEEDED]: { operation: ClientOperation; attempts: number; latencyMs: number };
  [ClientEvent.FAILED]: { operation: ClientOperation; error: Error };
}

/** Type-safe event emitter for client lifecycle events. Subscribe via `.on(ClientEvent.*, handler)`. */
export class ClientEventEmitter extends EventEmitter {
  override emit<K extends ClientEvent>(event: K, data: ClientEventMap[K]): boolean {
    return super.emit(event, data);
  }

  override on<K extends ClientEvent>(event: K, listener: (data: ClientEventMap[K]) => void): this {
    return super.on(event, listener);
  }

  override once<K extends ClientEvent>(event: K, listener: (data: ClientEventMap[K]) => void): this {
    return super.once(event, listener);
  }
}
