import { BasicClient } from "./basic-client.js";
import { ResilientClient } from "./resilient-client.js";
import type { ChatClient, ClientMode, ClientOptions } from "./types.js";

export interface CreateClientOptions extends ClientOptions {
  /** Which capability set to build (default: "resilient") */
  mode?: ClientMode | undefined;
}

/**
 * Build a chat client for the requested mode. The choice is made once, here,
 * from the explicit `mode` flag.
 *
 * @throws {SecretAIError} CONFIG when no API key can be resolved
 */
export function createClient(options: CreateClientOptions = {}): ChatClient {
  const mode = options.mode ?? "resilient";
  switch (mode) {
    case "basic":
      return new BasicClient(options);
    case "resilient":
      return new ResilientClient(options);
  }
}
