/**
 * Test 03: WorkerRegistry against the public testnet contract
 *
 * Read-only queries; no key needed.
 */
import { WorkerRegistry } from "../../src/index.js";
import { c, pass, prettyLogger, runTest, step, timer } from "./utils.js";

async function test() {
  const registry = new WorkerRegistry({ logger: prettyLogger });
  console.log(`    ${c.dim(`${registry.config.chainId} @ ${registry.config.nodeUrl}`)}`);

  step("getModels()");
  const t = timer();
  const models = await registry.getModels();
  pass(`${models.length} models in ${t()}ms: ${c.info(models.join(", "))}`);

  const [first] = models;
  if (!first) return;

  step(`getUrls("${first}")`);
  const urls = await registry.getUrls(first);
  pass(`${urls.length} workers: ${c.info(urls.join(", "))}`);
}

export const run = () => runTest("03 — WorkerRegistry", test);

const isMain = process.argv[1]?.includes("03-registry");
if (isMain) void run();
