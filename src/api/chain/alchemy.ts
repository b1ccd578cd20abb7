/**
 * Alchemy data provider
 *
 * A viem public client whose custom transport forwards each EIP-1193 request
 * to `${baseUrl}/${apiKey}` through ExplorerHttpClient, so every RPC call
 * takes one budget unit and shares the retry and 429 handling of the
 * Etherscan provider.
 */

import {
  type Hash,
  BaseError,
  TransactionNotFoundError,
  TransactionReceiptNotFoundError,
  createPublicClient,
  custom,
  hexToBigInt,
  isHex,
  numberToHex,
  rpcSchema,
} from "viem";
import { mainnet } from "viem/chains";

import { UpstreamError, WalletBotError } from "../../utils/errors";
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
  EMPTY_CALL_DATA,
  classifyTransaction,
  extractMethodSelector,
  rankTokens,
  summarizeTransactions,
  toBigIntOrZero,
} from "./types";

// ============================================================================
// Constants
// ============================================================================

/** Default Alchemy mainnet endpoint (API key is appended as a path segment) */
export const DEFAULT_ALCHEMY_BASE_URL = "https://eth-mainnet.g.alchemy.com/v2";

/** Default transaction window */
const DEFAULT_TRANSACTION_LIMIT = 10;

const PROVIDER_NAME = "alchemy";

// ============================================================================
// Types
// ============================================================================

/**
 * Configuration for the Alchemy provider
 */
export interface AlchemyProviderConfig {
  apiKey: string;
  budget: RequestBudget;
  baseUrl?: string;
  timeout?: number;
  maxRetries?: number;
  retryDelay?: number;
}

/**
 * Filter accepted by alchemy_getAssetTransfers, reduced to what we send
 */
interface AssetTransferFilter {
  fromBlock: string;
  toBlock: string;
  fromAddress?: string;
  toAddress?: string;
  category: string[];
  order: "asc" | "desc";
  withMetadata: boolean;
  excludeZeroValue: boolean;
  maxCount: string;
}

/**
 * Alchemy's enhanced methods. Results are validated where they are read.
 */
type AlchemyRpcSchema = [
  {
    Method: "alchemy_getTokenBalances";
    Parameters: [string, "erc20"];
    ReturnType: unknown;
  },
  {
    Method: "alchemy_getTokenMetadata";
    Parameters: [string];
    ReturnType: unknown;
  },
  {
    Method: "alchemy_getAssetTransfers";
    Parameters: [AssetTransferFilter];
    ReturnType: unknown;
  },
];

type RpcRequest = { method: string; params?: unknown };

interface AssetTransfer {
  hash: Hash;
  from: string;
  to: string | null;
  blockNumber: number;
  timestamp: Date;
}

interface TransactionDetail {
  from: string;
  to: string | null;
  input: string;
  value: bigint;
  gasPrice: bigint | undefined;
}

interface ReceiptDetail {
  reverted: boolean;
  gasUsed: bigint | null;
  effectiveGasPrice: bigint | null;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Decode a hex quantity into a decimal string ("0" when absent or malformed)
 */
function hexToDecimal(value: unknown): string {
  if (typeof value !== "string" || !isHex(value) || value.length <= 2) {
    return "0";
  }
  return hexToBigInt(value).toString();
}

function lowerOrNull(value: unknown): string | null {
  return typeof value === "string" && value !== "" ? value.toLowerCase() : null;
}

/**
 * Find an application error viem wrapped on its way out of the transport
 */
function findApplicationError(error: unknown): WalletBotError | null {
  let current: unknown = error;
  while (current instanceof Error) {
    if (current instanceof WalletBotError) {
      return current;
    }
    current = current.cause;
  }
  return null;
}

/**
 * Map anything a client call throws onto the provider's error types
 */
function toProviderError(method: string, error: unknown): WalletBotError {
  const applicationError = findApplicationError(error);
  if (applicationError) {
    return applicationError;
  }
  if (error instanceof BaseError) {
    return new UpstreamError(`Alchemy API error: ${error.shortMessage}`, {
      provider: PROVIDER_NAME,
      cause: error,
    });
  }
  return new UpstreamError(`Malformed ${method} response from Alchemy`, {
    provider: PROVIDER_NAME,
    cause: error instanceof Error ? error : undefined,
  });
}

/**
 * Mainnet public client over a caller-supplied EIP-1193 request function.
 * Retries live in ExplorerHttpClient, so viem must not repeat them.
 */
function createAlchemyClient(send: (args: RpcRequest) => Promise<unknown>) {
  return createPublicClient({
    chain: mainnet,
    rpcSchema: rpcSchema<AlchemyRpcSchema>(),
    transport: custom({ request: send }, { retryCount: 0 }),
  });
}

type AlchemyClient = ReturnType<typeof createAlchemyClient>;

// ============================================================================
// AlchemyProvider Class
// ============================================================================

export class AlchemyProvider implements ChainDataProvider {
  readonly name = PROVIDER_NAME;

  private readonly http: ExplorerHttpClient;
  private readonly endpoint: string;
  private readonly client: AlchemyClient;
  private requestId = 0;

  constructor(config: AlchemyProviderConfig) {
    const baseUrl = (config.baseUrl ?? DEFAULT_ALCHEMY_BASE_URL).replace(/\/+$/, "");
    this.endpoint = `${baseUrl}/${config.apiKey}`;
    this.http = new ExplorerHttpClient({
      provider: PROVIDER_NAME,
      budget: config.budget,
      timeout: config.timeout,
      maxRetries: config.maxRetries,
      retryDelay: config.retryDelay,
    });
    this.client = createAlchemyClient((args) => this.send(args));
  }

  /**
   * Native balance in wei
   */
  async getBalance(address: string): Promise<string> {
    const normalized = validateAddress(address);
    const balance = await this.request("eth_getBalance", () =>
      this.client.getBalance({ address: normalized })
    );
    return balance.toString();
  }

  /**
   * Non-zero ERC-20 balances, largest first, enriched with token metadata
   */
  async getTokens(address: string): Promise<TokenSummary> {
    const normalized = validateAddress(address);
    const result = await this.request("alchemy_getTokenBalances", () =>
      this.client.request({ method: "alchemy_getTokenBalances", params: [normalized, "erc20"] })
    );

    if (!isRecord(result) || !Array.isArray(result.tokenBalances)) {
      throw new UpstreamError("Unexpected alchemy_getTokenBalances result", {
        provider: PROVIDER_NAME,
      });
    }

    const held: Token[] = [];
    for (const entry of result.tokenBalances.filter(isRecord)) {
      const contractAddress = lowerOrNull(entry.contractAddress);
      const balance = hexToDecimal(entry.tokenBalance);
      if (contractAddress === null || toBigIntOrZero(balance) === 0n) {
        continue;
      }
      held.push({
        contractAddress,
        name: "Unknown",
        symbol: "UNKNOWN",
        decimals: ETHER_DECIMALS,
        balance,
        balanceDisplay: formatTokenBalance(balance, ETHER_DECIMALS),
      });
    }

    const top = rankTokens(held);
    const topTokens = await Promise.all(top.map((token) => this.withMetadata(token)));

    return { topTokens, totalTokensHeld: held.length };
  }

  /**
   * Most recent external transfers in either direction, newest first
   */
  async getTransactions(
    address: string,
    limit = DEFAULT_TRANSACTION_LIMIT
  ): Promise<TransactionSummary> {
    const normalized = validateAddress(address);

    const outgoing = await this.getAssetTransfers({ fromAddress: normalized }, limit);
    const incoming = await this.getAssetTransfers({ toAddress: normalized }, limit);

    const merged = new Map<string, AssetTransfer>();
    for (const transfer of [...outgoing, ...incoming]) {
      if (!merged.has(transfer.hash)) {
        merged.set(transfer.hash, transfer);
      }
    }

    const recent = [...merged.values()]
      .sort((a, b) => b.blockNumber - a.blockNumber)
      .slice(0, limit);

    const transactions = await Promise.all(
      recent.map(async (transfer) => {
        const [detail, receipt] = await Promise.all([
          this.findTransaction(transfer.hash),
          this.findReceipt(transfer.hash),
        ]);
        return this.buildTransaction(normalized, transfer, detail, receipt);
      })
    );

    return summarizeTransactions(normalized, transactions, merged.size);
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  /**
   * EIP-1193 entry point for the viem transport
   */
  private async send({ method, params }: RpcRequest): Promise<unknown> {
    this.requestId += 1;
    const data = await this.http.post(this.endpoint, {
      jsonrpc: "2.0",
      id: this.requestId,
      method,
      params: params ?? [],
    });

    if (!isRecord(data)) {
      throw new UpstreamError(`Malformed ${method} response from Alchemy`, {
        provider: PROVIDER_NAME,
      });
    }
    if (data.error !== undefined && data.error !== null) {
      const message = isRecord(data.error)
        ? readString(data.error, "message", "Unknown error")
        : String(data.error);
      throw new UpstreamError(`Alchemy API error: ${message}`, { provider: PROVIDER_NAME });
    }
    return data.result;
  }

  private async request<T>(method: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      throw toProviderError(method, error);
    }
  }

  /**
   * Replace placeholder name, symbol and decimals with alchemy_getTokenMetadata
   */
  private async withMetadata(token: Token): Promise<Token> {
    const meta = await this.request("alchemy_getTokenMetadata", () =>
      this.client.request({ method: "alchemy_getTokenMetadata", params: [token.contractAddress] })
    );
    if (!isRecord(meta)) {
      serviceLoggers.chainApi.warn("Token metadata missing", {
        contractAddress: token.contractAddress,
      });
      return token;
    }

    const decimals = typeof meta.decimals === "number" ? meta.decimals : ETHER_DECIMALS;
    return {
      ...token,
      name: readString(meta, "name", token.name) || token.name,
      symbol: readString(meta, "symbol", token.symbol) || token.symbol,
      decimals,
      balanceDisplay: formatTokenBalance(token.balance, decimals),
    };
  }

  private async getAssetTransfers(
    direction: { fromAddress: string } | { toAddress: string },
    limit: number
  ): Promise<AssetTransfer[]> {
    const filter: AssetTransferFilter = {
      fromBlock: "0x0",
      toBlock: "latest",
      ...direction,
      category: ["external"],
      order: "desc",
      withMetadata: true,
      excludeZeroValue: false,
      maxCount: numberToHex(limit),
    };
    const result = await this.request("alchemy_getAssetTransfers", () =>
      this.client.request({ method: "alchemy_getAssetTransfers", params: [filter] })
    );

    if (!isRecord(result) || !Array.isArray(result.transfers)) {
      throw new UpstreamError("Unexpected alchemy_getAssetTransfers result", {
        provider: PROVIDER_NAME,
      });
    }

    const transfers: AssetTransfer[] = [];
    for (const raw of result.transfers.filter(isRecord)) {
      const hash = raw.hash;
      if (typeof hash !== "string" || !isHex(hash)) {
        continue;
      }
      const metadata: Record<string, unknown> = isRecord(raw.metadata) ? raw.metadata : {};
      const blockTimestamp = readString(metadata, "blockTimestamp");
      transfers.push({
        hash,
        from: readString(raw, "from").toLowerCase(),
        to: lowerOrNull(raw.to),
        blockNumber: Number(hexToDecimal(raw.blockNum)),
        timestamp: blockTimestamp ? new Date(blockTimestamp) : new Date(0),
      });
    }
    return transfers;
  }

  /**
   * eth_getTransactionByHash; null when the node no longer knows the hash
   */
  private async findTransaction(hash: Hash): Promise<TransactionDetail | null> {
    try {
      const tx = await this.client.getTransaction({ hash });
      return {
        from: tx.from,
        to: tx.to,
        input: tx.input,
        value: tx.value,
        gasPrice: tx.gasPrice,
      };
    } catch (error) {
      if (error instanceof TransactionNotFoundError) {
        return null;
      }
      throw toProviderError("eth_getTransactionByHash", error);
    }
  }

  /**
   * eth_getTransactionReceipt; null while the transaction is pending
   */
  private async findReceipt(hash: Hash): Promise<ReceiptDetail | null> {
    try {
      const receipt = await this.client.getTransactionReceipt({ hash });
      return {
        reverted: receipt.status === "reverted",
        gasUsed: receipt.gasUsed,
        effectiveGasPrice: receipt.effectiveGasPrice,
      };
    } catch (error) {
      if (error instanceof TransactionReceiptNotFoundError) {
        return null;
      }
      throw toProviderError("eth_getTransactionReceipt", error);
    }
  }

  /**
   * Combine a transfer with its transaction and receipt lookups
   */
  private buildTransaction(
    address: string,
    transfer: AssetTransfer,
    detail: TransactionDetail | null,
    receipt: ReceiptDetail | null
  ): Transaction {
    const to = detail ? lowerOrNull(detail.to) : transfer.to;
    const input = detail?.input || EMPTY_CALL_DATA;
    const value = (detail?.value ?? 0n).toString();
    const gasPrice = receipt?.effectiveGasPrice ?? detail?.gasPrice ?? 0n;

    return {
      hash: transfer.hash,
      from: lowerOrNull(detail?.from) ?? transfer.from,
      to,
      value,
      valueDisplay: formatEther(value),
      gasPrice: gasPrice.toString(),
      gasUsed: (receipt?.gasUsed ?? 0n).toString(),
      timestamp: transfer.timestamp,
      blockNumber: transfer.blockNumber,
      isError: receipt?.reverted ?? false,
      type: classifyTransaction(address, to, input),
      methodSelector: extractMethodSelector(input),
    };
  }
}

/**
 * Create a new Alchemy provider instance
 */
export function createAlchemyProvider(config: AlchemyProviderConfig): AlchemyProvider {
  return new AlchemyProvider(config);
}
