/**
 * Services exports
 */

export {
  ResultCache,
  analysisCacheKey,
  isExpired,
  type CacheEntry,
  type ResultCacheConfig,
  type ResultCacheStats,
} from "./result-cache";

export {
  ACTIVITY_SCORES,
  DEFAULT_DEFI_CONTRACT_THRESHOLD,
  analyzeWalletBehavior,
  calculateDaysActive,
  calculateWalletScore,
  detectActivityLevel,
  detectContractDeployer,
  detectDefiUsage,
  detectNftTrader,
  type ActivityLevel,
  type BehaviorFlags,
  type DaysActive,
  type ScoringOptions,
  type WalletBehavior,
} from "./wallet-scorer";

export {
  WalletAnalyzer,
  createWalletAnalyzer,
  type AnalysisResult,
  type WalletAnalysis,
  type WalletAnalyzerConfig,
} from "./wallet-analyzer";
