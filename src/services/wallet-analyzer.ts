/**
 * Wallet Analyzer
 *
 * Runs one analysis request: validate the address, serve a cached report when
 * one is live, otherwise fetch balance, tokens and transactions from the
 * provider, score them and cache the finished report.
 *
 * A failure anywhere on the miss path propagates and nothing is cached.
 */

import { validateAddress } from "../api/chain/address";
import { formatEther } from "../api/chain/format";
import type { ChainDataProvider, TokenSummary, TransactionSummary } from "../api/chain/types";
import { serviceLoggers } from "../utils/logger";
import { analysisCacheKey, type ResultCache } from "./result-cache";
import {
  analyzeWalletBehavior,
  calculateDaysActive,
  DEFAULT_DEFI_CONTRACT_THRESHOLD,
  type WalletBehavior,
} from "./wallet-scorer";

// ============================================================================
// Types
// ============================================================================

/**
 * Finished report for one wallet; never mutated once built
 */
export interface WalletAnalysis {
  /** Canonical lower-case address */
  readonly address: string;
  /** Native balance in wei */
  readonly balance: string;
  readonly balanceDisplay: string;
  readonly tokenSummary: Readonly<TokenSummary>;
  readonly transactionSummary: Readonly<TransactionSummary>;
  readonly behavior: Readonly<WalletBehavior>;
  readonly analyzedAt: Date;
  readonly firstTransactionDate?: Date;
  readonly daysActive?: number;
}

export interface AnalysisResult {
  analysis: WalletAnalysis;
  /** Whether the report came from the cache */
  cached: boolean;
}

export interface WalletAnalyzerConfig {
  provider: ChainDataProvider;
  cache: ResultCache<WalletAnalysis>;

  /**
   * Transactions fetched per analysis
   * @default 10
   */
  transactionSampleSize?: number;

  /**
   * Minimum contract calls for the DeFi label
   * @default 5
   */
  defiContractThreshold?: number;

  /** Clock, replaceable in tests */
  now?: () => Date;
}

const DEFAULT_SAMPLE_SIZE = 10;

// ============================================================================
// WalletAnalyzer Class
// ============================================================================

export class WalletAnalyzer {
  private readonly provider: ChainDataProvider;
  private readonly cache: ResultCache<WalletAnalysis>;
  private readonly sampleSize: number;
  private readonly defiContractThreshold: number;
  private readonly now: () => Date;

  constructor(config: WalletAnalyzerConfig) {
    this.provider = config.provider;
    this.cache = config.cache;
    this.sampleSize = config.transactionSampleSize ?? DEFAULT_SAMPLE_SIZE;
    this.defiContractThreshold = config.defiContractThreshold ?? DEFAULT_DEFI_CONTRACT_THRESHOLD;
    this.now = config.now ?? (() => new Date());
  }

  /**
   * Analyze a wallet, serving from cache when possible
   *
   * @throws InvalidAddressError before any cache or provider access
   * @throws UpstreamError / RateLimitExceededError from the provider
   */
  async analyze(rawAddress: string): Promise<AnalysisResult> {
    const address = validateAddress(rawAddress);
    const key = analysisCacheKey(address);
    const log = serviceLoggers.analyzer;

    const cached = this.cache.get(key);
    if (cached) {
      log.info("Returning cached analysis", { walletAddress: address });
      return { analysis: cached, cached: true };
    }

    log.debug("Fetching blockchain data", { walletAddress: address, provider: this.provider.name });

    const balance = await this.provider.getBalance(address);
    const tokenSummary = await this.provider.getTokens(address);
    const transactionSummary = await this.provider.getTransactions(address, this.sampleSize);

    const behavior = analyzeWalletBehavior(transactionSummary, {
      defiContractThreshold: this.defiContractThreshold,
    });

    const analyzedAt = this.now();
    const { daysActive, firstTransactionDate } = calculateDaysActive(
      transactionSummary.recentTransactions,
      analyzedAt
    );

    const analysis: WalletAnalysis = Object.freeze({
      address,
      balance,
      balanceDisplay: formatEther(balance),
      tokenSummary,
      transactionSummary,
      behavior,
      analyzedAt,
      firstTransactionDate,
      daysActive,
    });

    this.cache.set(key, analysis);

    log.info("Wallet analysis complete", {
      walletAddress: address,
      activityLevel: behavior.activityLevel,
      walletScore: behavior.walletScore,
    });

    return { analysis, cached: false };
  }

  /**
   * Name of the provider in use
   */
  get providerName(): string {
    return this.provider.name;
  }
}

/**
 * Create a new analyzer instance
 */
export function createWalletAnalyzer(config: WalletAnalyzerConfig): WalletAnalyzer {
  return new WalletAnalyzer(config);
}
