/**
 * Test 02: ResilientClient against a live worker
 *
 * Needs SECRET_AI_API_KEY. The worker comes from SECRET_AI_HOST, or from the
 * registry when unset.
 */
import { ClientEvent, ClientBuilder, WorkerRegistry } from "../../src/index.js";
import { c, configuredHost, configuredModel, pass, prettyLogger, runTest, step, timer } from "./utils.js";

async function test() {
  const model = configuredModel();

  step("Resolve worker host");
  const host = configuredHost() ?? (await new WorkerRegistry({ logger: prettyLogger }).resolveHost(model));
  pass(`Using ${c.info(host)} for ${c.accent(model)}`);

  const client = new ClientBuilder().host(host).withLogger(prettyLogger).withRetry({ maxRetries: 2 }).build();
  client.events.on(ClientEvent.RETRYING, ({ attempt, delayMs, error }) => {
    console.log(`    ${c.warn("retrying")} attempt ${attempt + 1} in ${delayMs}ms: ${error.message}`);
  });

  // ── 1. Chat ───────────────────────────────────────────────────
  step("chat()");
  {
    const t = timer();
    const response = await client.chat({
      model,
      messages: [{ role: "user", content: "Reply with a single word: ready" }],
    });
    if (!response.message.content) throw new Error("Empty chat response");
    pass(`Got ${c.info(JSON.stringify(response.message.content.trim()))} in ${t()}ms`);
  }

  // ── 2. Generate ───────────────────────────────────────────────
  step("generate()");
  {
    const t = timer();
    const response = await client.generate({ model, prompt: "2 + 2 =" });
    if (!response.response) throw new Error("Empty generate response");
    pass(`Got ${c.info(JSON.stringify(response.response.trim().slice(0, 40)))} in ${t()}ms`);
  }
}

export const run = () => runTest("02 — ResilientClient chat + generate", test);

const isMain = process.argv[1]?.includes("02-chat");
if (isMain) void run();
