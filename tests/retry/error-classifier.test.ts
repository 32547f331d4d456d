import { describe, expect, it } from "vitest";
import {
  cancelledError,
  configError,
  connectionError,
  networkError,
  responseError,
  retryExhaustedError,
  timeoutError,
} from "../../src/errors.js";
import { classifyError, isRetryable } from "../../src/retry/error-classifier.js";

describe("classifyError", () => {
  it("retries the network family", () => {
    expect(classifyError(networkError("socket hang up"))).toEqual({ retryable: true, reason: "NETWORK" });
    expect(classifyError(timeoutError(30_000, "chat"))).toEqual({ retryable: true, reason: "TIMEOUT" });
    expect(classifyError(connectionError("http://localhost:11434"))).toEqual({ retryable: true, reason: "CONNECTION" });
  });

  it("never retries response, config, exhausted or cancelled errors", () => {
    expect(classifyError(responseError("bad payload"))).toEqual({ retryable: false, reason: "RESPONSE" });
    expect(classifyError(configError("no key"))).toEqual({ retryable: false, reason: "CONFIG" });
    expect(classifyError(retryExhaustedError(4, new Error("timeout")))).toEqual({
      retryable: false,
      reason: "RETRY_EXHAUSTED",
    });
    expect(classifyError(cancelledError(1))).toEqual({ retryable: false, reason: "CANCELLED" });
  });

  it("decides typed errors by code, not message", () => {
    expect(isRetryable(responseError("upstream said: connection timeout"))).toBe(false);
  });

  it("matches keywords case-insensitively on unknown errors", () => {
    expect(classifyError(new Error("Request Timed Out"))).toEqual({ retryable: true, reason: "timed out" });
    expect(classifyError(new Error("HTTP 503 from upstream"))).toEqual({ retryable: true, reason: "503" });
    expect(classifyError(new Error("Service Unavailable"))).toEqual({
      retryable: true,
      reason: "service unavailable",
    });
    expect(classifyError(new Error("Network is unreachable"))).toEqual({ retryable: true, reason: "network" });
  });

  it("reports the first keyword in list order", () => {
    expect(classifyError(new Error("gateway timeout"))).toEqual({ retryable: true, reason: "timeout" });
  });

  it("retries a bad gateway and not invalid input", () => {
    expect(isRetryable(new Error("502 Bad Gateway"))).toBe(true);
    expect(isRetryable(new Error("Invalid input"))).toBe(false);
  });

  it("treats everything else as non-retryable", () => {
    expect(classifyError(new Error("invalid model name"))).toEqual({ retryable: false, reason: "UNKNOWN" });
    expect(isRetryable(new TypeError("cannot read properties of undefined"))).toBe(false);
  });
});
