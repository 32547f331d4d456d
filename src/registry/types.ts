import type { RetryConfig } from "../config/types.js";
import type { Env, Logger } from "../types.js";

/** Read-only access to a CosmWasm contract */
export interface ContractQueryClient {
  queryContract(contractAddress: string, query: Record<string, unknown>): Promise<unknown>;
}

export interface RegistryConfig {
  chainId: string;
  /** LCD endpoint of a Secret Network node */
  nodeUrl: string;
  /** Address of the worker-management contract */
  contractAddress: string;
}

export interface WorkerRegistryOptions {
  /** Falls back to SECRET_CHAIN_ID, then "pulsar-3" */
  chainId?: string | undefined;
  /** Falls back to SECRET_NODE_URL, then the public pulsar LCD */
  nodeUrl?: string | undefined;
  /** Falls back to SECRET_WORKER_SMART_CONTRACT, then the published registry contract */
  contractAddress?: string | undefined;
  /** Default: a secretjs SecretNetworkClient for `nodeUrl` / `chainId` */
  queryClient?: ContractQueryClient | undefined;
  /** Retry overrides (default maxRetries: 3) */
  retry?: Partial<RetryConfig> | undefined;
  logger?: Logger | undefined;
  env?: Env | undefined;
}
