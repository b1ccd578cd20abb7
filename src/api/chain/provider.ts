/**
 * Blockchain data provider selection
 */

import { getBlockchainApiKey, type Env } from "../../../config/env";
import { serviceLoggers } from "../../utils/logger";
import { AlchemyProvider } from "./alchemy";
import { EtherscanProvider } from "./etherscan";
import type { RequestBudget } from "./rate-limiter";
import type { ChainDataProvider } from "./types";

/** Settings read when building a provider */
export type ChainProviderSettings = Pick<
  Env,
  | "BLOCKCHAIN_API_PROVIDER"
  | "ETHERSCAN_API_KEY"
  | "ETHERSCAN_API_URL"
  | "ETHERSCAN_CHAIN_ID"
  | "ALCHEMY_API_KEY"
  | "ALCHEMY_API_URL"
  | "API_TIMEOUT_MS"
  | "API_MAX_RETRIES"
  | "API_RETRY_DELAY_MS"
>;

/**
 * Build the provider named by configuration. Called once at startup; the
 * choice is fixed for the life of the process.
 *
 * @throws ConfigurationError when the selected provider has no API key
 */
export function createChainProvider(
  config: ChainProviderSettings,
  budget: RequestBudget
): ChainDataProvider {
  const apiKey = getBlockchainApiKey(config);
  const http = {
    budget,
    timeout: config.API_TIMEOUT_MS,
    maxRetries: config.API_MAX_RETRIES,
    retryDelay: config.API_RETRY_DELAY_MS,
  };

  const provider = config.BLOCKCHAIN_API_PROVIDER;
  serviceLoggers.chainApi.info("Blockchain data provider selected", { provider });

  switch (provider) {
    case "etherscan":
      return new EtherscanProvider({
        ...http,
        apiKey,
        baseUrl: config.ETHERSCAN_API_URL,
        chainId: config.ETHERSCAN_CHAIN_ID,
      });
    case "alchemy":
      return new AlchemyProvider({
        ...http,
        apiKey,
        baseUrl: config.ALCHEMY_API_URL,
      });
    default: {
      const unreachable: never = provider;
      throw new Error(`Unsupported provider: ${String(unreachable)}`);
    }
  }
}
