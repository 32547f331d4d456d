/**
 * Run all playground tests sequentially.
 *
 * Usage: npm run playground
 *
 * Tests 01 and 03 need no key (pure logic + public contract reads).
 * Test 02 requires SECRET_AI_API_KEY (see .env.example).
 */
import { c, hasApiKey, section } from "./utils.js";

interface TestEntry {
  name: string;
  needsApiKey: boolean;
  load: () => Promise<{ run: () => Promise<boolean> }>;
}

const allTests: TestEntry[] = [
  { name: "01 — withRetry + Error Classifier", needsApiKey: false, load: () => import("./01-retry.js") },
  { name: "02 — ResilientClient chat + generate", needsApiKey: true, load: () => import("./02-chat.js") },
  { name: "03 — WorkerRegistry", needsApiKey: false, load: () => import("./03-registry.js") },
];

async function main() {
  console.log(`\n${c.bold("  secret-ai-kit — Real-World Integration Tests")}`);
  console.log(c.dim("  ════════════════════════════════════════════\n"));

  const apiKey = hasApiKey();
  if (!apiKey) {
    console.log(c.warn("  No SECRET_AI_API_KEY found — test 02 will be skipped."));
    console.log(c.dim("  See .env.example for instructions.\n"));
  }

  const results: Array<{ name: string; status: "pass" | "fail" | "skip"; timeMs: number }> = [];

  for (const test of allTests) {
    if (test.needsApiKey && !apiKey) {
      console.log(`\n  ${c.warn("SKIP")}  ${test.name} ${c.dim("(no API key)")}`);
      results.push({ name: test.name, status: "skip", timeMs: 0 });
      continue;
    }

    const start = performance.now();
    try {
      const mod = await test.load();
      const ok = await mod.run();
      results.push({
        name: test.name,
        status: ok ? "pass" : "fail",
        timeMs: Math.round(performance.now() - start),
      });
    } catch (err) {
      results.push({ name: test.name, status: "fail", timeMs: Math.round(performance.now() - start) });
      console.error(`\n  ${c.fail("FATAL:")} ${test.name}`, err);
    }
  }

  // ── Summary ───────────────────────────────────────────────────
  section("Summary");
  const passed = results.filter((r) => r.status === "pass").length;
  const failed = results.filter((r) => r.status === "fail").length;
  const skipped = results.filter((r) => r.status === "skip").length;
  const totalTime = results.reduce((sum, r) => sum + r.timeMs, 0);

  for (const r of results) {
    const icon = r.status === "pass" ? c.ok("PASS") : r.status === "fail" ? c.fail("FAIL") : c.warn("SKIP");
    console.log(`  ${icon}  ${r.name}  ${c.dim(`(${r.timeMs}ms)`)}`);
  }

  const parts = [`${c.bold(`${passed} passed`)}`];
  if (failed > 0) parts.push(c.fail(`${failed} failed`));
  if (skipped > 0) parts.push(c.warn(`${skipped} skipped`));
  console.log(`\n  ${parts.join(", ")} — ${c.dim(`${totalTime}ms total`)}\n`);

  if (failed > 0) process.exitCode = 1;
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
