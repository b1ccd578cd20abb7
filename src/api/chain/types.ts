/**
 * Types for on-chain wallet data
 *
 * Shared by both blockchain data providers, the scorer and the report builder.
 */

// ============================================================================
// Transactions
// ============================================================================

/**
 * How a transaction relates to the queried address
 */
export type TransactionType = "send" | "receive" | "contract_interaction" | "contract_creation";

/**
 * Normalized transaction record
 */
export interface Transaction {
  /** Transaction hash */
  hash: string;
  /** Sender address (lower-case) */
  from: string;
  /** Recipient address (lower-case); null for contract creation */
  to: string | null;
  /** Value in wei, decimal string */
  value: string;
  /** Value in ETH, trimmed display string */
  valueDisplay: string;
  gasPrice: string;
  gasUsed: string;
  timestamp: Date;
  blockNumber: number;
  /** Whether the transaction reverted */
  isError: boolean;
  type: TransactionType;
  /** First 4 bytes of call data (0x + 8 hex); null for plain transfers */
  methodSelector: string | null;
}

/**
 * Transaction statistics for a wallet
 */
export interface TransactionSummary {
  /** Number of records the provider returned for the query */
  totalTransactions: number;
  /** Most recent transactions, newest first */
  recentTransactions: Transaction[];
  /** Distinct from/to addresses in the window, excluding the wallet itself */
  uniqueCounterparts: number;
  /** Transactions with non-empty call data */
  contractInteractions: number;
  failedTransactions: number;
}

// ============================================================================
// Tokens
// ============================================================================

/**
 * ERC-20 holding
 */
export interface Token {
  contractAddress: string;
  name: string;
  symbol: string;
  decimals: number;
  /** Raw base-unit amount, decimal string */
  balance: string;
  balanceDisplay: string;
}

/**
 * Token holdings for a wallet
 */
export interface TokenSummary {
  /** Up to 10 holdings ranked by raw balance, largest first */
  topTokens: Token[];
  /** Number of distinct tokens seen */
  totalTokensHeld: number;
}

// ============================================================================
// Provider contract
// ============================================================================

/**
 * Source of on-chain data for a wallet
 *
 * Every method validates the address before any network traffic.
 */
export interface ChainDataProvider {
  /** Provider name, used in logs and the health report */
  readonly name: string;
  /** Native balance in wei as a decimal string */
  getBalance(address: string): Promise<string>;
  getTokens(address: string): Promise<TokenSummary>;
  getTransactions(address: string, limit?: number): Promise<TransactionSummary>;
}

/**
 * Empty summaries returned when the provider has no records
 */
export function emptyTransactionSummary(): TransactionSummary {
  return {
    totalTransactions: 0,
    recentTransactions: [],
    uniqueCounterparts: 0,
    contractInteractions: 0,
    failedTransactions: 0,
  };
}

export function emptyTokenSummary(): TokenSummary {
  return { topTokens: [], totalTokensHeld: 0 };
}

// ============================================================================
// Helpers shared by providers
// ============================================================================

/** Plain transfers carry no call data */
export const EMPTY_CALL_DATA = "0x";

/** Maximum tokens kept in a TokenSummary */
export const MAX_TOP_TOKENS = 10;

/**
 * Classify a transaction relative to the queried address
 */
export function classifyTransaction(
  address: string,
  to: string | null,
  input: string
): TransactionType {
  if (to === null) {
    return "contract_creation";
  }
  if (to === address) {
    return "receive";
  }
  if (input === EMPTY_CALL_DATA || input === "") {
    return "send";
  }
  return "contract_interaction";
}

/**
 * Extract the 4-byte function selector from call data
 */
export function extractMethodSelector(input: string): string | null {
  if (input === EMPTY_CALL_DATA || input === "") {
    return null;
  }
  return input.slice(0, 10).toLowerCase();
}

/**
 * Build a summary from a normalized transaction window
 */
export function summarizeTransactions(
  address: string,
  transactions: Transaction[],
  totalTransactions: number
): TransactionSummary {
  const counterparts = new Set<string>();
  let contractInteractions = 0;
  let failedTransactions = 0;

  for (const tx of transactions) {
    counterparts.add(tx.from);
    if (tx.to !== null) {
      counterparts.add(tx.to);
    }
    if (tx.methodSelector !== null) {
      contractInteractions++;
    }
    if (tx.isError) {
      failedTransactions++;
    }
  }
  counterparts.delete(address);

  return {
    totalTransactions,
    recentTransactions: transactions,
    uniqueCounterparts: counterparts.size,
    contractInteractions,
    failedTransactions,
  };
}

/**
 * Rank tokens by raw balance (largest first) and keep the top entries
 */
export function rankTokens(tokens: Token[], limit = MAX_TOP_TOKENS): Token[] {
  return [...tokens]
    .sort((a, b) => {
      const left = toBigIntOrZero(a.balance);
      const right = toBigIntOrZero(b.balance);
      if (left === right) return 0;
      return right > left ? 1 : -1;
    })
    .slice(0, limit);
}

/**
 * Parse a decimal or hex integer string, falling back to zero
 */
export function toBigIntOrZero(value: string): bigint {
  try {
    return BigInt(value);
  } catch {
    return 0n;
  }
}
