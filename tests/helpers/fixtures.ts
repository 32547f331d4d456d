import type { ChatResponse, GenerateResponse } from "ollama";
import { type Mock, vi } from "vitest";
import type { RetryConfig } from "../../src/config/types.js";
import type { Env, Logger } from "../../src/types.js";

export const TEST_API_KEY = "test-secret";
export const TEST_HOST = "https://worker.test:21434";
export const TEST_MODEL = "test-model";

/** Retry config with 1ms waits so tests run on real timers */
export const FAST_RETRY: RetryConfig = {
  maxRetries: 3,
  initialDelayMs: 1,
  backoffMultiplier: 2,
  maxDelayMs: 4,
};

/** Environment with nothing set */
export const EMPTY_ENV: Env = {};

export type MockLogger = { [K in keyof Logger]: Mock<Logger[K]> };

export function createMockLogger(): MockLogger {
  return {
    debug: vi.fn<Logger["debug"]>(),
    info: vi.fn<Logger["info"]>(),
    warn: vi.fn<Logger["warn"]>(),
    error: vi.fn<Logger["error"]>(),
  };
}

export function chatResponse(content = "Hello from the worker"): ChatResponse {
  return {
    model: TEST_MODEL,
    created_at: new Date("2026-01-01T00:00:00Z"),
    message: { role: "assistant", content },
    done: true,
    done_reason: "stop",
    total_duration: 1_000,
    load_duration: 100,
    prompt_eval_count: 5,
    prompt_eval_duration: 200,
    eval_count: 7,
    eval_duration: 700,
  };
}

export function generateResponse(response = "Generated text"): GenerateResponse {
  return {
    model: TEST_MODEL,
    created_at: new Date("2026-01-01T00:00:00Z"),
    response,
    done: true,
    done_reason: "stop",
    context: [1, 2, 3],
    total_duration: 1_000,
    load_duration: 100,
    prompt_eval_count: 5,
    prompt_eval_duration: 200,
    eval_count: 7,
    eval_duration: 700,
  };
}

/** Error shaped like the one node's fetch throws when the socket is refused */
export function connectionRefused(): TypeError {
  const cause = Object.assign(new Error("connect ECONNREFUSED 127.0.0.1:21434"), { code: "ECONNREFUSED" });
  return new TypeError("fetch failed", { cause });
}

/** Run `fn` and return what it threw */
export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected the call to throw");
}
