/**
 * Etherscan data provider
 *
 * Query-parameter GET requests against the Etherscan V2 multichain API.
 * Responses arrive in a `{ status, message, result }` envelope where any
 * status other than "1" is a provider-level error.
 */

import { RateLimitExceededError, UpstreamError } from "../../utils/errors";
import { serviceLoggers } from "../../utils/logger";
import { validateAddress } from "./address";
import { ExplorerHttpClient, isRecord, readString } from "./client";
import { formatEther, formatTokenBalance, ETHER_DECIMALS } from "./format";
import type { RequestBudget } from "./rate-limiter";
import {
  type ChainDataProvider,
  type Token,
  type TokenSummary,
  type Transaction,
  type TransactionSummary,
  classifyTransaction,
  emptyTokenSummary,
  emptyTransactionSummary,
  extractMethodSelector,
  rankTokens,
  summarizeTransactions,
} from "./types";

// ============================================================================
// Constants
// ============================================================================

/** Default Etherscan API base URL */
export const DEFAULT_ETHERSCAN_BASE_URL = "https://api.etherscan.io/v2/api";

/** Ethereum mainnet */
const DEFAULT_CHAIN_ID = 1;

/** Default transaction window */
const DEFAULT_TRANSACTION_LIMIT = 10;

/** Page size used when collecting token transfers */
const TOKEN_TRANSFER_PAGE_SIZE = 10000;

/** Envelope messages that mean "nothing to return" rather than failure */
const NO_RECORDS_MESSAGES = ["No transactions found", "No records found"];

const PROVIDER_NAME = "etherscan";

// ============================================================================
// Types
// ============================================================================

/**
 * Configuration for the Etherscan provider
 */
export interface EtherscanProviderConfig {
  apiKey: string;
  budget: RequestBudget;
  baseUrl?: string;
  chainId?: number;
  timeout?: number;
  maxRetries?: number;
  retryDelay?: number;
}

// ============================================================================
// EtherscanProvider Class
// ============================================================================

export class EtherscanProvider implements ChainDataProvider {
  readonly name = PROVIDER_NAME;

  private readonly http: ExplorerHttpClient;
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly chainId: number;

  constructor(config: EtherscanProviderConfig) {
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl ?? DEFAULT_ETHERSCAN_BASE_URL;
    this.chainId = config.chainId ?? DEFAULT_CHAIN_ID;
    this.http = new ExplorerHttpClient({
      provider: PROVIDER_NAME,
      budget: config.budget,
      timeout: config.timeout,
      maxRetries: config.maxRetries,
      retryDelay: config.retryDelay,
    });
  }

  /**
   * Native balance in wei
   */
  async getBalance(address: string): Promise<string> {
    const normalized = validateAddress(address);

    const result = await this.query({
      module: "account",
      action: "balance",
      address: normalized,
      tag: "latest",
    });

    if (result === null) {
      return "0";
    }
    if (typeof result !== "string") {
      throw new UpstreamError("Unexpected balance payload from Etherscan", {
        provider: PROVIDER_NAME,
      });
    }
    return result;
  }

  /**
   * Token holdings derived from ERC-20 transfer history.
   *
   * The first transfer seen per contract (newest first) supplies the
   * holding; its transfer value stands in for the balance.
   */
  async getTokens(address: string): Promise<TokenSummary> {
    const normalized = validateAddress(address);

    const result = await this.query({
      module: "account",
      action: "tokentx",
      address: normalized,
      page: "1",
      offset: String(TOKEN_TRANSFER_PAGE_SIZE),
      sort: "desc",
    });

    if (result === null) {
      return emptyTokenSummary();
    }

    const rows = this.expectRows(result, "tokentx");
    const tokens = new Map<string, Token>();

    for (const row of rows) {
      const contractAddress = readString(row, "contractAddress").toLowerCase();
      if (!contractAddress || tokens.has(contractAddress)) {
        continue;
      }

      const parsedDecimals = parseInt(readString(row, "tokenDecimal"), 10);
      const decimals = Number.isNaN(parsedDecimals) ? ETHER_DECIMALS : parsedDecimals;
      const balance = readString(row, "value", "0");

      tokens.set(contractAddress, {
        contractAddress,
        name: readString(row, "tokenName", "Unknown"),
        symbol: readString(row, "tokenSymbol", "UNKNOWN"),
        decimals,
        balance,
        balanceDisplay: formatTokenBalance(balance, decimals),
      });
    }

    return {
      topTokens: rankTokens([...tokens.values()]),
      totalTokensHeld: tokens.size,
    };
  }

  /**
   * Most recent normal transactions, newest first
   */
  async getTransactions(
    address: string,
    limit = DEFAULT_TRANSACTION_LIMIT
  ): Promise<TransactionSummary> {
    const normalized = validateAddress(address);

    const result = await this.query({
      module: "account",
      action: "txlist",
      address: normalized,
      page: "1",
      offset: String(limit),
      sort: "desc",
    });

    if (result === null) {
      return emptyTransactionSummary();
    }

    const rows = this.expectRows(result, "txlist");
    const transactions = rows.slice(0, limit).map((row) => this.parseTransaction(row, normalized));

    return summarizeTransactions(normalized, transactions, rows.length);
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  /**
   * Issue a query and unwrap the envelope.
   * Returns null when the provider reports no records.
   */
  private async query(params: Record<string, string>): Promise<unknown> {
    const data = await this.http.get(this.baseUrl, {
      chainid: String(this.chainId),
      ...params,
      apikey: this.apiKey,
    });

    if (!isRecord(data)) {
      throw new UpstreamError("Malformed response from Etherscan", { provider: PROVIDER_NAME });
    }

    const status = String(data.status);
    const message = readString(data, "message");
    const result = data.result;

    if (status === "1") {
      return result;
    }

    if (
      NO_RECORDS_MESSAGES.includes(message) ||
      (typeof result === "string" && NO_RECORDS_MESSAGES.some((text) => result.includes(text)))
    ) {
      return null;
    }

    if (typeof result === "string" && result.toLowerCase().includes("rate limit")) {
      serviceLoggers.chainApi.warn("Etherscan rate limit reported", { result });
      throw new RateLimitExceededError(result, { provider: PROVIDER_NAME });
    }

    const providerMessage = typeof result === "string" && result !== "" ? result : message;
    throw new UpstreamError(`Etherscan API error: ${providerMessage}`, { provider: PROVIDER_NAME });
  }

  private expectRows(result: unknown, action: string): Record<string, unknown>[] {
    if (!Array.isArray(result)) {
      throw new UpstreamError(`Unexpected ${action} payload from Etherscan`, {
        provider: PROVIDER_NAME,
      });
    }
    return result.filter(isRecord);
  }

  /**
   * Parse raw transaction to normalized format
   */
  private parseTransaction(raw: Record<string, unknown>, address: string): Transaction {
    const rawTo = readString(raw, "to").toLowerCase();
    const to = rawTo === "" ? null : rawTo;
    const input = readString(raw, "input", "0x");
    const value = readString(raw, "value", "0");

    return {
      hash: readString(raw, "hash"),
      from: readString(raw, "from").toLowerCase(),
      to,
      value,
      valueDisplay: formatEther(value),
      gasPrice: readString(raw, "gasPrice", "0"),
      gasUsed: readString(raw, "gasUsed", "0"),
      timestamp: new Date(parseInt(readString(raw, "timeStamp", "0"), 10) * 1000),
      blockNumber: parseInt(readString(raw, "blockNumber", "0"), 10),
      isError: readString(raw, "isError") === "1",
      type: classifyTransaction(address, to, input),
      methodSelector: extractMethodSelector(input),
    };
  }
}

/**
 * Create a new Etherscan provider instance
 */
export function createEtherscanProvider(config: EtherscanProviderConfig): EtherscanProvider {
  return new EtherscanProvider(config);
}
