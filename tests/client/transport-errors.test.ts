import { describe, expect, it } from "vitest";
import { mapTransportError } from "../../src/client/transport-errors.js";
import { SecretAIErrorCode, responseError, timeoutError } from "../../src/errors.js";
import { TEST_HOST, connectionRefused } from "../helpers/fixtures.js";

const context = { operation: "chat", host: TEST_HOST, requestTimeoutMs: 30_000 };

function httpError(message: string, status: number): Error {
  return Object.assign(new Error(message), { name: "ResponseError", status_code: status });
}

describe("mapTransportError", () => {
  it("passes SDK errors through untouched", () => {
    const original = responseError("already typed");
    expect(mapTransportError(original, context)).toBe(original);
  });

  it("maps an elapsed request timeout to TIMEOUT", () => {
    const error = mapTransportError(Object.assign(new Error("signal timed out"), { name: "TimeoutError" }), context);
    expect(error).toMatchObject({
      code: SecretAIErrorCode.TIMEOUT,
      message: "chat timed out after 30000ms",
      context: { timeoutMs: 30_000, operation: "chat" },
    });
  });

  it("names the operation on a timeout raised while connecting", () => {
    const connect = timeoutError(5, "connect");
    const error = mapTransportError(connect, context);
    expect(error).toMatchObject({
      code: SecretAIErrorCode.TIMEOUT,
      message: "chat timed out after 5ms",
      context: { timeoutMs: 5, operation: "chat" },
    });
    expect(error.cause).toBe(connect);
  });

  it("maps any failure after the caller aborted to CANCELLED", () => {
    const controller = new AbortController();
    controller.abort();
    const error = mapTransportError(connectionRefused(), { ...context, signal: controller.signal, attempt: 2 });
    expect(error).toMatchObject({
      code: SecretAIErrorCode.CANCELLED,
      context: { attempt: 3 },
      message: "Operation cancelled before attempt 4",
    });
  });

  it("maps socket timeout codes to TIMEOUT", () => {
    const error = mapTransportError(Object.assign(new Error("read timed out"), { code: "ETIMEDOUT" }), context);
    expect(error.code).toBe(SecretAIErrorCode.TIMEOUT);
  });

  it("maps refused connections to CONNECTION", () => {
    const error = mapTransportError(connectionRefused(), context);
    expect(error).toMatchObject({
      code: SecretAIErrorCode.CONNECTION,
      message: `Failed to connect to ${TEST_HOST}: fetch failed`,
      context: { host: TEST_HOST },
    });
  });

  it("maps a bare fetch failure to CONNECTION", () => {
    expect(mapTransportError(new TypeError("fetch failed"), context).code).toBe(SecretAIErrorCode.CONNECTION);
  });

  it("maps transient HTTP statuses to NETWORK", () => {
    for (const status of [408, 429, 500, 502, 503, 504]) {
      expect(mapTransportError(httpError("busy", status), context).code).toBe(SecretAIErrorCode.NETWORK);
    }
    expect(mapTransportError(httpError("model busy", 503), context).message).toBe(
      "Network error: chat failed with HTTP 503: model busy",
    );
  });

  it("maps other HTTP statuses to RESPONSE", () => {
    const error = mapTransportError(httpError("model not found", 404), { ...context, operation: "generate" });
    expect(error).toMatchObject({
      code: SecretAIErrorCode.RESPONSE,
      message: "Invalid response: generate rejected with HTTP 404: model not found",
      context: { responseData: { status: 404 } },
    });
  });

  it("maps an aborted request to NETWORK", () => {
    const abort = Object.assign(new Error("This operation was aborted"), { name: "AbortError" });
    expect(mapTransportError(abort, context).message).toBe("Network error: chat aborted");
  });

  it("maps a malformed body to RESPONSE", () => {
    const error = mapTransportError(new SyntaxError("Unexpected token < in JSON"), context);
    expect(error).toMatchObject({
      code: SecretAIErrorCode.RESPONSE,
      message: "Invalid response: chat returned a malformed body: Unexpected token < in JSON",
    });
  });

  it("falls back to the keyword heuristic for anything else", () => {
    expect(mapTransportError(new Error("socket closed: connection lost"), context)).toMatchObject({
      code: SecretAIErrorCode.NETWORK,
      message: "Network error: chat failed: socket closed: connection lost",
    });
    expect(mapTransportError(new Error("unsupported option"), context)).toMatchObject({
      code: SecretAIErrorCode.RESPONSE,
      message: "Invalid response: chat failed: unsupported option",
    });
  });

  it("normalizes thrown non-errors", () => {
    expect(mapTransportError("weird", context)).toMatchObject({
      code: SecretAIErrorCode.RESPONSE,
      message: "Invalid response: chat failed: weird",
    });
  });

  it("keeps the raw error as cause", () => {
    const raw = connectionRefused();
    expect(mapTransportError(raw, context).cause).toBe(raw);
  });
});
