import { describe, expect, it, vi } from "vitest";
import { BasicClient } from "../../src/client/basic-client.js";
import { SecretAIErrorCode } from "../../src/errors.js";
import { ClientEvent } from "../../src/events.js";
import { createFakeTransport, jsonFetch } from "../helpers/fake-transport.js";
import {
  EMPTY_ENV,
  TEST_API_KEY,
  TEST_HOST,
  TEST_MODEL,
  catchError,
  chatResponse,
  connectionRefused,
  createMockLogger,
} from "../helpers/fixtures.js";

const request = { model: TEST_MODEL, messages: [{ role: "user", content: "hello" }] };

describe("BasicClient", () => {
  it("makes a single authenticated call", async () => {
    const fake = createFakeTransport();
    fake.chat.mockResolvedValue(chatResponse("single"));
    const client = new BasicClient({ host: TEST_HOST, apiKey: TEST_API_KEY, transport: fake.factory, env: EMPTY_ENV });

    const response = await client.chat(request);

    expect(client.mode).toBe("basic");
    expect(response.message.content).toBe("single");
    expect(fake.settings?.headers).toEqual({ Authorization: "Bearer test-secret" });
  });

  it("does not retry transient failures", async () => {
    const fake = createFakeTransport();
    fake.chat.mockRejectedValue(connectionRefused());
    const logger = createMockLogger();
    const client = new BasicClient({ host: TEST_HOST, apiKey: TEST_API_KEY, transport: fake.factory, logger, env: EMPTY_ENV });
    const failed = vi.fn();
    client.events.on(ClientEvent.FAILED, failed);

    await expect(client.chat(request)).rejects.toMatchObject({
      code: SecretAIErrorCode.CONNECTION,
      message: `Failed to connect to ${TEST_HOST}: fetch failed`,
    });
    expect(fake.chat).toHaveBeenCalledTimes(1);
    expect(failed).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith(`chat failed: Failed to connect to ${TEST_HOST}: fetch failed`, {
      code: SecretAIErrorCode.CONNECTION,
    });
  });

  it("emits one request and one success event", async () => {
    const fake = createFakeTransport();
    fake.chat.mockResolvedValue(chatResponse());
    const client = new BasicClient({ apiKey: TEST_API_KEY, transport: fake.factory, env: EMPTY_ENV });
    const requests = vi.fn();
    const succeeded = vi.fn();
    client.events.on(ClientEvent.REQUEST, requests);
    client.events.on(ClientEvent.SUCCEEDED, succeeded);

    await client.chat(request);

    expect(requests).toHaveBeenCalledWith({ operation: "chat", attempt: 0 });
    expect(succeeded).toHaveBeenCalledWith({ operation: "chat", attempts: 1, latencyMs: expect.any(Number) });
  });

  it("uses the local default host", () => {
    const client = new BasicClient({ apiKey: TEST_API_KEY, transport: createFakeTransport().factory, env: EMPTY_ENV });
    expect(client.host).toBe("http://127.0.0.1:11434");
  });

  it("returns payloads without validating them", async () => {
    const body = { model: TEST_MODEL, done: true };
    const client = new BasicClient({ host: TEST_HOST, apiKey: TEST_API_KEY, fetch: jsonFetch(body), env: EMPTY_ENV });

    await expect(client.chat(request)).resolves.toEqual(body);
  });

  it("fails with CANCELLED when the signal is already aborted", async () => {
    const fake = createFakeTransport();
    const client = new BasicClient({ apiKey: TEST_API_KEY, transport: fake.factory, env: EMPTY_ENV });
    const controller = new AbortController();
    controller.abort();

    await expect(client.generate({ model: TEST_MODEL, prompt: "hi" }, { signal: controller.signal })).rejects.toMatchObject(
      { code: SecretAIErrorCode.CANCELLED, context: { attempt: 0 } },
    );
    expect(fake.generate).not.toHaveBeenCalled();
  });

  it("fails with CANCELLED when the caller aborts during the call", async () => {
    const fake = createFakeTransport();
    const controller = new AbortController();
    fake.chat.mockImplementation(async () => {
      controller.abort();
      throw connectionRefused();
    });
    const client = new BasicClient({
      apiKey: TEST_API_KEY,
      logger: createMockLogger(),
      transport: fake.factory,
      env: EMPTY_ENV,
    });

    await expect(client.chat(request, { signal: controller.signal })).rejects.toMatchObject({
      code: SecretAIErrorCode.CANCELLED,
      context: { attempt: 1 },
    });
    expect(fake.chat).toHaveBeenCalledWith(request, controller.signal);
  });

  it("requires an API key", () => {
    expect(catchError(() => new BasicClient({ env: EMPTY_ENV }))).toMatchObject({ code: SecretAIErrorCode.CONFIG });
  });
});
