/**
 * Wallet behavior scoring
 *
 * Heuristic labels and a 0-100 score computed from the recent transaction
 * window. Only the fetched window is considered, so labels and days active
 * describe that window rather than the wallet's full history.
 */

import type { Transaction, TransactionSummary } from "../api/chain/types";
import { serviceLoggers } from "../utils/logger";

// ============================================================================
// Types
// ============================================================================

export type ActivityLevel = "dormant" | "low" | "moderate" | "active" | "highly_active";

export interface WalletBehavior {
  activityLevel: ActivityLevel;
  defiUser: boolean;
  nftTrader: boolean;
  contractDeployer: boolean;
  /** Integer between 0 and 100 */
  walletScore: number;
}

export interface BehaviorFlags {
  defiUser: boolean;
  nftTrader: boolean;
  contractDeployer: boolean;
}

export interface ScoringOptions {
  /**
   * Minimum contract calls before a wallet counts as a DeFi user
   * @default 5
   */
  defiContractThreshold?: number;
}

export interface DaysActive {
  daysActive: number;
  firstTransactionDate: Date;
}

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_DEFI_CONTRACT_THRESHOLD = 5;

/** Share of the window that must be contract calls for the DeFi label */
const DEFI_RATIO = 0.2;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/** Points per activity level */
export const ACTIVITY_SCORES: Record<ActivityLevel, number> = {
  dormant: 0,
  low: 10,
  moderate: 20,
  active: 30,
  highly_active: 40,
};

const MAX_DIVERSITY_SCORE = 15;
const POINTS_PER_FLAG = 5;
const MAX_ADVANCED_SCORE = 15;
const MAX_SCORE = 100;

// ============================================================================
// Detectors
// ============================================================================

/**
 * Classify by window size: <5 dormant, <20 low, <100 moderate, <1000 active
 */
export function detectActivityLevel(transactions: Transaction[]): ActivityLevel {
  const count = transactions.length;

  if (count >= 1000) return "highly_active";
  if (count >= 100) return "active";
  if (count >= 20) return "moderate";
  if (count >= 5) return "low";
  return "dormant";
}

/**
 * True when contract calls reach both 20% of the window and the floor
 */
export function detectDefiUsage(
  transactions: Transaction[],
  floor: number = DEFAULT_DEFI_CONTRACT_THRESHOLD
): boolean {
  if (transactions.length === 0) {
    return false;
  }

  const contractCalls = transactions.filter(
    (tx) => tx.methodSelector !== null && tx.methodSelector !== "" && tx.methodSelector !== "0x"
  ).length;

  return contractCalls >= Math.max(transactions.length * DEFI_RATIO, floor);
}

/**
 * Placeholder: looks for "nft" in the method selector
 */
export function detectNftTrader(transactions: Transaction[]): boolean {
  return transactions.some((tx) => (tx.methodSelector ?? "").toLowerCase().includes("nft"));
}

export function detectContractDeployer(transactions: Transaction[]): boolean {
  return transactions.some((tx) => tx.to === null);
}

// ============================================================================
// Score
// ============================================================================

function interactionRatioScore(summary: TransactionSummary): number {
  const ratio = summary.contractInteractions / Math.max(summary.totalTransactions, 1);

  if (ratio >= 0.5) return 30;
  if (ratio >= 0.3) return 20;
  if (ratio >= 0.1) return 10;
  return 5;
}

/**
 * Additive score capped at 100:
 * activity (0-40) + interaction ratio (5-30) + counterpart diversity (0-15)
 * + 5 per flag (0-15)
 */
export function calculateWalletScore(
  activityLevel: ActivityLevel,
  summary: TransactionSummary,
  flags: BehaviorFlags
): number {
  const activity = ACTIVITY_SCORES[activityLevel];
  const ratio = interactionRatioScore(summary);
  const diversity = Math.min(
    Math.floor(Math.max(summary.uniqueCounterparts, 0) / 10),
    MAX_DIVERSITY_SCORE
  );
  const flagCount = [flags.defiUser, flags.nftTrader, flags.contractDeployer].filter(Boolean).length;
  const advanced = Math.min(flagCount * POINTS_PER_FLAG, MAX_ADVANCED_SCORE);

  return Math.min(activity + ratio + diversity + advanced, MAX_SCORE);
}

/**
 * Derive every behavior label and the score from a transaction summary
 */
export function analyzeWalletBehavior(
  summary: TransactionSummary,
  options: ScoringOptions = {}
): WalletBehavior {
  const transactions = summary.recentTransactions;
  const floor = options.defiContractThreshold ?? DEFAULT_DEFI_CONTRACT_THRESHOLD;

  const activityLevel = detectActivityLevel(transactions);
  const flags: BehaviorFlags = {
    defiUser: detectDefiUsage(transactions, floor),
    nftTrader: detectNftTrader(transactions),
    contractDeployer: detectContractDeployer(transactions),
  };
  const walletScore = calculateWalletScore(activityLevel, summary, flags);

  serviceLoggers.analyzer.debug("Wallet behavior scored", {
    transactions: transactions.length,
    activityLevel,
    walletScore,
  });

  return { activityLevel, ...flags, walletScore };
}

/**
 * Whole days between `now` and the earliest transaction in the window.
 * An empty window gives 0 days and `now` as the first date.
 */
export function calculateDaysActive(transactions: Transaction[], now: Date = new Date()): DaysActive {
  if (transactions.length === 0) {
    return { daysActive: 0, firstTransactionDate: now };
  }

  let earliest = transactions[0]?.timestamp ?? now;
  for (const tx of transactions) {
    if (tx.timestamp.getTime() < earliest.getTime()) {
      earliest = tx.timestamp;
    }
  }

  return {
    daysActive: Math.floor((now.getTime() - earliest.getTime()) / MS_PER_DAY),
    firstTransactionDate: earliest,
  };
}
