import { z } from "zod";
import { DEFAULT_RETRY_CONFIG, DEFAULT_TIMEOUT_CONFIG, ENV } from "../constants.js";
import { configError } from "../errors.js";
import type { Env } from "../types.js";
import type { RetryConfig, TimeoutConfig } from "./types.js";

const retrySchema = z
  .object({
    maxRetries: z.number().int().nonnegative(),
    initialDelayMs: z.number().finite().nonnegative(),
    backoffMultiplier: z.number().finite().min(1),
    maxDelayMs: z.number().finite().nonnegative(),
  })
  .refine((cfg) => cfg.maxDelayMs >= cfg.initialDelayMs, {
    message: "maxDelayMs must be greater than or equal to initialDelayMs",
    path: ["maxDelayMs"],
  });

const timeoutSchema = z.object({
  requestTimeoutMs: z.number().finite().positive(),
  connectTimeoutMs: z.number().finite().positive(),
});

const envNumber = z.coerce.number().finite();

function describeIssues(error: z.ZodError): { message: string; setting: string | undefined } {
  const first = error.issues[0];
  const setting = first?.path.join(".") || undefined;
  const message = error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`).join("; ");
  return { message, setting };
}

/** Read a numeric environment variable; blank values count as unset */
function readEnvNumber(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return undefined;
  const parsed = envNumber.safeParse(raw);
  if (!parsed.success) {
    throw configError(`Environment variable ${name} must be a number, got "${raw}"`, name);
  }
  return parsed.data;
}

/** Read a duration given in seconds and convert it to ms */
function readEnvSeconds(env: Env, name: string): number | undefined {
  const seconds = readEnvNumber(env, name);
  return seconds === undefined ? undefined : Math.round(seconds * 1000);
}

/**
 * Build an immutable RetryConfig. Each field comes from `overrides`, then the
 * environment (durations in seconds), then the built-in defaults. The
 * environment is only read for fields the caller did not supply.
 *
 * @throws {SecretAIError} CONFIG when a value is out of domain
 */
export function loadRetryConfig(overrides?: Partial<RetryConfig>, env: Env = process.env): RetryConfig {
  const merged = {
    maxRetries: overrides?.maxRetries ?? readEnvNumber(env, ENV.MAX_RETRIES) ?? DEFAULT_RETRY_CONFIG.maxRetries,
    initialDelayMs:
      overrides?.initialDelayMs ?? readEnvSeconds(env, ENV.RETRY_DELAY) ?? DEFAULT_RETRY_CONFIG.initialDelayMs,
    backoffMultiplier:
      overrides?.backoffMultiplier ?? readEnvNumber(env, ENV.RETRY_BACKOFF) ?? DEFAULT_RETRY_CONFIG.backoffMultiplier,
    maxDelayMs: overrides?.maxDelayMs ?? readEnvSeconds(env, ENV.MAX_RETRY_DELAY) ?? DEFAULT_RETRY_CONFIG.maxDelayMs,
  };
  const parsed = retrySchema.safeParse(merged);
  if (!parsed.success) {
    const { message, setting } = describeIssues(parsed.error);
    throw configError(`Invalid retry configuration: ${message}`, setting);
  }
  return Object.freeze({ ...parsed.data });
}

/** @throws {SecretAIError} CONFIG when a timeout is not a positive number */
export function loadTimeoutConfig(overrides?: Partial<TimeoutConfig>, env: Env = process.env): TimeoutConfig {
  const merged = {
    requestTimeoutMs:
      overrides?.requestTimeoutMs ??
      readEnvSeconds(env, ENV.REQUEST_TIMEOUT) ??
      DEFAULT_TIMEOUT_CONFIG.requestTimeoutMs,
    connectTimeoutMs:
      overrides?.connectTimeoutMs ??
      readEnvSeconds(env, ENV.CONNECT_TIMEOUT) ??
      DEFAULT_TIMEOUT_CONFIG.connectTimeoutMs,
  };
  const parsed = timeoutSchema.safeParse(merged);
  if (!parsed.success) {
    const { message, setting } = describeIssues(parsed.error);
    throw configError(`Invalid timeout configuration: ${message}`, setting);
  }
  return Object.freeze({ ...parsed.data });
}

/**
 * Resolve the API key: explicit argument first, then `SECRET_AI_API_KEY`.
 *
 * @throws {SecretAIError} CONFIG when neither yields a non-empty value
 */
export function resolveApiKey(explicit?: string, env: Env = process.env): string {
  const key = explicit ?? env[ENV.API_KEY];
  if (!key || key.trim() === "") {
    throw configError(`Missing API key. Environment variable ${ENV.API_KEY} must be set`, ENV.API_KEY);
  }
  return key;
}
