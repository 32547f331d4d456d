import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { config } from "dotenv";
import type { Logger, LogLevel } from "../../src/index.js";

config({ path: resolve(fileURLToPath(new URL(".", import.meta.url)), "..", ".env") });

const paint = (code: number) => (s: string) => `\x1b[${code}m${s}\x1b[0m`;

export const c = {
  ok: paint(32),
  fail: paint(31),
  warn: paint(33),
  info: paint(36),
  accent: paint(35),
  dim: paint(2),
  bold: paint(1),
  blue: paint(34),
};

export function section(title: string) {
  const rule = c.blue("─".repeat(60));
  console.log(`\n${rule}\n  ${c.bold(title)}\n${rule}\n`);
}

export const step = (label: string) => console.log(`  ${c.accent("▸")} ${label}`);
export const pass = (label: string) => console.log(`  ${c.ok("✓")} ${label}`);

/** Env-driven settings for the live checks */
export const hasApiKey = () => Boolean(process.env.SECRET_AI_API_KEY?.trim());
export const configuredHost = () => process.env.SECRET_AI_HOST?.trim() || undefined;
export const configuredModel = () => process.env.SECRET_AI_MODEL?.trim() || "llama3.3:70b";

const LEVEL_COLORS: Record<LogLevel, (s: string) => string> = {
  debug: c.dim,
  info: c.info,
  warn: c.warn,
  error: c.fail,
};

function printer(level: LogLevel): Logger[LogLevel] {
  const tag = LEVEL_COLORS[level](`[${level}]`.padEnd(7));
  return (msg, data) => console.log(`    ${tag} ${msg}`, data ? c.dim(JSON.stringify(data)) : "");
}

export const prettyLogger: Logger = {
  debug: printer("debug"),
  info: printer("info"),
  warn: printer("warn"),
  error: printer("error"),
};

/** Milliseconds since the call */
export function timer(): () => number {
  const start = performance.now();
  return () => Math.round(performance.now() - start);
}

/** Run one check under a section header; failures are printed, not thrown */
export async function runTest(name: string, fn: () => Promise<void>): Promise<boolean> {
  section(name);
  try {
    await fn();
    console.log(`\n  ${c.ok("PASSED")}\n`);
    return true;
  } catch (err) {
    console.log(`  ${c.fail("✗")} ${err instanceof Error ? err.message : String(err)}`);
    console.log(`\n  ${c.fail("FAILED")}\n`);
    return false;
  }
}
