/**
 * Ethereum chain data exports
 */

// Types
export type {
  TransactionType,
  Transaction,
  TransactionSummary,
  Token,
  TokenSummary,
  ChainDataProvider,
} from "./types";

export {
  classifyTransaction,
  extractMethodSelector,
  summarizeTransactions,
  rankTokens,
  emptyTokenSummary,
  emptyTransactionSummary,
} from "./types";

// Address and formatting
export { validateAddress, isValidAddress, truncateAddress } from "./address";
export { formatEther, formatTokenBalance, ETHER_DECIMALS } from "./format";

// Request path
export { RequestBudget, type RequestBudgetConfig, type RequestBudgetStats } from "./rate-limiter";
export { ExplorerHttpClient, type ExplorerHttpClientConfig } from "./client";

// Providers
export {
  EtherscanProvider,
  createEtherscanProvider,
  DEFAULT_ETHERSCAN_BASE_URL,
  type EtherscanProviderConfig,
} from "./etherscan";
export {
  AlchemyProvider,
  createAlchemyProvider,
  DEFAULT_ALCHEMY_BASE_URL,
  type AlchemyProviderConfig,
} from "./alchemy";
export { createChainProvider, type ChainProviderSettings } from "./provider";
