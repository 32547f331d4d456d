import { z } from "zod";
import type { CallOptions } from "../client/types.js";
import { loadRetryConfig } from "../config/loader.js";
import type { RetryConfig } from "../config/types.js";
import { DEFAULT_REGISTRY_CONFIG, ENV } from "../constants.js";
import { configError, isSecretAIError, networkError, responseError, toError } from "../errors.js";
import { createDefaultLogger, resolveLogLevel } from "../logger.js";
import { withRetry } from "../retry/retry.js";
import type { Env, Logger } from "../types.js";
import type { ContractQueryClient, RegistryConfig, WorkerRegistryOptions } from "./types.js";

const modelsResponseSchema = z.object({ models: z.array(z.string()) });
const urlsResponseSchema = z.object({ urls: z.array(z.string()) });

function readSetting(explicit: string | undefined, env: Env, name: string, fallback: string): string {
  const value = explicit ?? env[name];
  return value && value.trim() !== "" ? value : fallback;
}

/**
 * Lookups against the worker-management contract: which models exist and
 * which worker URLs serve them. Every query runs under the retry engine.
 */
export class WorkerRegistry {
  readonly config: Readonly<RegistryConfig>;
  readonly retryConfig: RetryConfig;
  private readonly logger: Logger;
  private queryClient: ContractQueryClient | undefined;

  constructor(options: WorkerRegistryOptions = {}) {
    const env = options.env ?? process.env;
    this.config = Object.freeze({
      chainId: readSetting(options.chainId, env, ENV.CHAIN_ID, DEFAULT_REGISTRY_CONFIG.chainId),
      nodeUrl: readSetting(options.nodeUrl, env, ENV.NODE_URL, DEFAULT_REGISTRY_CONFIG.nodeUrl),
      contractAddress: readSetting(
        options.contractAddress,
        env,
        ENV.WORKER_CONTRACT,
        DEFAULT_REGISTRY_CONFIG.contractAddress,
      ),
    });
    this.retryConfig = loadRetryConfig({ maxRetries: DEFAULT_REGISTRY_CONFIG.maxRetries, ...options.retry }, env);
    this.logger = options.logger ?? createDefaultLogger(resolveLogLevel(env));
    this.queryClient = options.queryClient;
  }

  /** Models known to the registry contract */
  async getModels(options?: CallOptions): Promise<string[]> {
    const result = await this.query("get_models", { get_models: {} }, modelsResponseSchema, options);
    return result.models;
  }

  /** Worker URLs, optionally only those serving `model` */
  async getUrls(model?: string, options?: CallOptions): Promise<string[]> {
    const query = model ? { get_u_r_ls: { model } } : { get_u_r_ls: {} };
    const result = await this.query("get_urls", query, urlsResponseSchema, options);
    return result.urls;
  }

  /**
   * First worker URL serving `model`.
   *
   * @throws {SecretAIError} CONFIG when no worker serves the model
   */
  async resolveHost(model: string, options?: CallOptions): Promise<string> {
    const [first] = await this.getUrls(model, options);
    if (!first) {
      throw configError(`No worker in the registry serves model "${model}"`, "model");
    }
    return first;
  }

  private async client(): Promise<ContractQueryClient> {
    if (!this.queryClient) {
      // Loaded on demand so callers that inject a client never load secretjs
      const { createSecretQueryClient } = await import("./secret-query-client.js");
      this.queryClient = createSecretQueryClient(this.config);
    }
    return this.queryClient;
  }

  private async query<T>(
    label: string,
    query: Record<string, unknown>,
    schema: z.ZodType<T>,
    options: CallOptions | undefined,
  ): Promise<T> {
    const client = await this.client();

    return withRetry(
      async () => {
        let response: unknown;
        try {
          response = await client.queryContract(this.config.contractAddress, query);
        } catch (err) {
          if (isSecretAIError(err)) throw err;
          const error = toError(err);
          throw networkError(`Failed to query ${label}: ${error.message}`, error);
        }

        const parsed = schema.safeParse(response);
        if (!parsed.success) {
          throw responseError("Invalid response format from smart contract", response);
        }
        return parsed.data;
      },
      { config: this.retryConfig, logger: this.logger, label: `registry.${label}`, signal: options?.signal },
    );
  }
}
