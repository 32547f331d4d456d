import { describe, expect, it } from "vitest";
import { BasicClient } from "../../src/client/basic-client.js";
import { ClientBuilder } from "../../src/client/builder.js";
import { createClient } from "../../src/client/factory.js";
import { ResilientClient } from "../../src/client/resilient-client.js";
import { SecretAIErrorCode } from "../../src/errors.js";
import { createFakeTransport } from "../helpers/fake-transport.js";
import { EMPTY_ENV, TEST_API_KEY, TEST_HOST, catchError, createMockLogger } from "../helpers/fixtures.js";

describe("createClient", () => {
  it("builds a resilient client by default", () => {
    const client = createClient({ apiKey: TEST_API_KEY, transport: createFakeTransport().factory, env: EMPTY_ENV });
    expect(client).toBeInstanceOf(ResilientClient);
    expect(client.mode).toBe("resilient");
  });

  it("builds a basic client on request", () => {
    const client = createClient({
      mode: "basic",
      apiKey: TEST_API_KEY,
      transport: createFakeTransport().factory,
      env: EMPTY_ENV,
    });
    expect(client).toBeInstanceOf(BasicClient);
    expect(client.mode).toBe("basic");
  });
});

describe("ClientBuilder", () => {
  it("merges repeated retry settings", () => {
    const client = new ClientBuilder()
      .apiKey(TEST_API_KEY)
      .withEnv(EMPTY_ENV)
      .withTransport(createFakeTransport().factory)
      .withLogger(createMockLogger())
      .withRetry({ maxRetries: 5 })
      .withRetry({ initialDelayMs: 1, maxDelayMs: 4 })
      .build();

    if (!(client instanceof ResilientClient)) throw new Error("expected a resilient client");
    expect(client.retryConfig).toEqual({ maxRetries: 5, initialDelayMs: 1, backoffMultiplier: 2, maxDelayMs: 4 });
  });

  it("passes host and timeouts to the transport", () => {
    const fake = createFakeTransport();
    new ClientBuilder()
      .host(TEST_HOST)
      .apiKey(TEST_API_KEY)
      .withEnv(EMPTY_ENV)
      .withTransport(fake.factory)
      .withLogger(createMockLogger())
      .withTimeouts({ requestTimeoutMs: 60_000 })
      .build();

    expect(fake.settings?.host).toBe(TEST_HOST);
    expect(fake.settings?.timeouts).toEqual({ requestTimeoutMs: 60_000, connectTimeoutMs: 10_000 });
  });

  it("can turn validation off", () => {
    const client = new ClientBuilder()
      .apiKey(TEST_API_KEY)
      .withEnv(EMPTY_ENV)
      .withTransport(createFakeTransport().factory)
      .withLogger(createMockLogger())
      .disableValidation()
      .build();

    if (!(client instanceof ResilientClient)) throw new Error("expected a resilient client");
    expect(client.validatesResponses).toBe(false);
  });

  it("switches between modes", () => {
    const builder = new ClientBuilder()
      .apiKey(TEST_API_KEY)
      .withEnv(EMPTY_ENV)
      .withTransport(createFakeTransport().factory)
      .withLogger(createMockLogger());

    expect(builder.basic().build()).toBeInstanceOf(BasicClient);
    expect(builder.resilient().build()).toBeInstanceOf(ResilientClient);
  });

  it("fails with CONFIG when no key is set", () => {
    expect(catchError(() => new ClientBuilder().withEnv(EMPTY_ENV).build())).toMatchObject({
      code: SecretAIErrorCode.CONFIG,
    });
  });
});
