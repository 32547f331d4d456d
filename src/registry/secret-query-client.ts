import { SecretNetworkClient } from "secretjs";
import type { ContractQueryClient, RegistryConfig } from "./types.js";

/** ContractQueryClient backed by a secretjs LCD client */
export function createSecretQueryClient(config: Pick<RegistryConfig, "chainId" | "nodeUrl">): ContractQueryClient {
  const client = new SecretNetworkClient({ url: config.nodeUrl, chainId: config.chainId });

  return {
    queryContract(contractAddress, query) {
      return client.query.compute.queryContract<Record<string, unknown>, unknown>({
        contract_address: contractAddress,
        query,
      });
    },
  };
}
