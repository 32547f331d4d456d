/**
 * Test 01: withRetry / withRetrySync: backoff, classification, cancellation
 *
 * No network needed; pure logic with real timings.
 */
import {
  SecretAIErrorCode,
  classifyError,
  delayFor,
  isSecretAIError,
  withRetry,
  withRetrySync,
} from "../../src/index.js";
import { c, pass, prettyLogger, runTest, step, timer } from "./utils.js";

const FAST = { maxRetries: 3, initialDelayMs: 20, backoffMultiplier: 2, maxDelayMs: 200 };

async function test() {
  // ── 1. Successful first-try call ──────────────────────────────
  step("First-try success");
  {
    let called = 0;
    const result = await withRetry(
      async () => {
        called++;
        return 42;
      },
      { config: FAST },
    );

    if (result !== 42) throw new Error(`Expected 42, got ${result}`);
    if (called !== 1) throw new Error(`Expected 1 call, got ${called}`);
    pass("Returns value on first success, called once");
  }

  // ── 2. Retry on a transient error ─────────────────────────────
  step("Retry on 503 (service unavailable)");
  {
    let attempt = 0;
    const t = timer();
    const result = await withRetry(
      async () => {
        attempt++;
        if (attempt < 3) throw new Error("HTTP 503 Service Unavailable");
        return "ok";
      },
      { config: FAST, logger: prettyLogger, label: "playground" },
    );

    const elapsed = t();
    if (result !== "ok") throw new Error(`Expected "ok", got ${result}`);
    if (attempt !== 3) throw new Error(`Expected 3 attempts, got ${attempt}`);
    pass(`Recovered after 2 retries in ${c.info(`${elapsed}ms`)}`);
  }

  // ── 3. Non-retryable error throws immediately ─────────────────
  step("Non-retryable error (invalid model name)");
  {
    let attempt = 0;
    const original = new Error("invalid model name");
    try {
      await withRetry(
        async () => {
          attempt++;
          throw original;
        },
        { config: FAST },
      );
      throw new Error("Should have thrown");
    } catch (err) {
      if (err !== original) throw new Error(`Expected the original error, got ${err}`);
      if (attempt !== 1) throw new Error(`Expected 1 attempt (no retry), got ${attempt}`);
      pass("Rethrew the original error after one attempt");
    }
  }

  // ── 4. Retries exhausted ──────────────────────────────────────
  step("Retries exhausted after maxRetries");
  {
    let attempt = 0;
    const delays: number[] = [];
    try {
      await withRetry(
        async () => {
          attempt++;
          throw new Error("connection reset");
        },
        { config: FAST, onRetry: (_err, _attempt, delay) => delays.push(delay) },
      );
      throw new Error("Should have thrown");
    } catch (err) {
      if (!isSecretAIError(err, SecretAIErrorCode.RETRY_EXHAUSTED)) {
        throw new Error(`Expected RETRY_EXHAUSTED, got ${err}`);
      }
      if (attempt !== 4) throw new Error(`Expected 4 attempts (1 + 3 retries), got ${attempt}`);
      pass(`Exhausted after ${err.context.attempts} attempts, delays: [${delays.map((d) => `${d}ms`).join(", ")}]`);
    }
  }

  // ── 5. Backoff schedule ───────────────────────────────────────
  step("Backoff schedule");
  {
    const schedule = [0, 1, 2, 3, 4].map((a) => delayFor(a, { ...FAST, initialDelayMs: 1, maxDelayMs: 10 }));
    if (schedule.join(",") !== "1,2,4,8,10") throw new Error(`Unexpected schedule ${schedule.join(",")}`);
    pass(`delayFor: [${schedule.join(", ")}]`);
  }

  // ── 6. Error classifier ───────────────────────────────────────
  step("Error classifier");
  {
    const cases: Array<{ msg: string; retryable: boolean }> = [
      { msg: "Gateway Timeout", retryable: true },
      { msg: "503 Service unavailable", retryable: true },
      { msg: "Connection refused", retryable: true },
      { msg: "model not found", retryable: false },
      { msg: "unauthorized", retryable: false },
    ];

    for (const { msg, retryable } of cases) {
      const result = classifyError(new Error(msg));
      if (result.retryable !== retryable) {
        throw new Error(`"${msg}": expected retryable=${retryable}, got ${result.retryable}`);
      }
    }
    pass(`All ${cases.length} error classifications correct`);
  }

  // ── 7. Cancellation during the wait ───────────────────────────
  step("Abort while waiting between attempts");
  {
    const controller = new AbortController();
    const t = timer();
    setTimeout(() => controller.abort(), 50);
    try {
      await withRetry(
        async () => {
          throw new Error("network unreachable");
        },
        { config: { ...FAST, initialDelayMs: 5_000, maxDelayMs: 5_000 }, signal: controller.signal },
      );
      throw new Error("Should have thrown");
    } catch (err) {
      if (!isSecretAIError(err, SecretAIErrorCode.CANCELLED)) throw new Error(`Expected CANCELLED, got ${err}`);
      pass(`Cancelled after ${c.info(`${t()}ms`)} instead of waiting 5000ms`);
    }
  }

  // ── 8. Blocking adapter ───────────────────────────────────────
  step("withRetrySync blocks between attempts");
  {
    let attempt = 0;
    const t = timer();
    const result = withRetrySync(
      () => {
        attempt++;
        if (attempt < 2) throw new Error("timed out");
        return "sync-ok";
      },
      { config: FAST },
    );
    if (result !== "sync-ok" || attempt !== 2) throw new Error(`Unexpected result ${result} after ${attempt}`);
    pass(`Recovered after one blocking wait of ${c.info(`${t()}ms`)}`);
  }
}

export const run = () => runTest("01 — withRetry + Error Classifier", test);

// Auto-run when executed directly
const isMain = process.argv[1]?.includes("01-retry");
if (isMain) void run();
