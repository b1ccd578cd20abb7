/**
 * Application wiring
 *
 * Builds the long-lived objects (request budget, provider, cache, analyzer,
 * sessions, bot) from configuration and owns their lifecycle.
 */

import { type Env, type EnvSource, initializeEnv, loadEnv } from "../config/env";
import { type ChainDataProvider, RequestBudget, createChainProvider } from "./api/chain";
import { ResultCache, WalletAnalyzer, type WalletAnalysis } from "./services";
import {
  SessionStore,
  TelegramBotClient,
  type BotInitResult,
  type CommandDependencies,
  type HealthInfo,
} from "./telegram";
import { logger } from "./utils/logger";

export const APP_NAME = "Wallet Insight Bot";
export const VERSION = "1.0.0";

/**
 * Parse and validate configuration from `source`
 *
 * @throws ConfigurationError on a malformed or missing setting
 */
export function loadConfig(source: EnvSource = process.env): Env {
  const config = loadEnv(source);
  initializeEnv(config);
  return config;
}

export interface Application {
  readonly budget: RequestBudget;
  readonly provider: ChainDataProvider;
  readonly cache: ResultCache<WalletAnalysis>;
  readonly analyzer: WalletAnalyzer;
  readonly sessions: SessionStore;
  readonly bot: TelegramBotClient;
  getHealthInfo(): HealthInfo;
  /** Connect to Telegram, register handlers and begin polling */
  start(): Promise<BotInitResult>;
  stop(): Promise<void>;
}

/**
 * Build the application from validated configuration
 *
 * @throws ConfigurationError when the selected provider has no API key
 */
export function createApplication(config: Env, bot?: TelegramBotClient): Application {
  const budget = new RequestBudget({ requestsPerMinute: config.RATE_LIMIT_REQUESTS_PER_MINUTE });
  const provider = createChainProvider(config, budget);
  const cache = new ResultCache<WalletAnalysis>({
    enabled: config.CACHE_ENABLED,
    ttlSeconds: config.CACHE_TTL_SECONDS,
    maxSize: config.CACHE_MAX_SIZE,
  });
  const analyzer = new WalletAnalyzer({
    provider,
    cache,
    transactionSampleSize: config.TRANSACTION_SAMPLE_SIZE,
    defiContractThreshold: config.DEFI_CONTRACT_THRESHOLD,
  });
  const sessions = new SessionStore();
  const botClient = bot ?? new TelegramBotClient(config.TELEGRAM_BOT_TOKEN);

  const getHealthInfo = (): HealthInfo => ({
    environment: config.NODE_ENV,
    provider: provider.name,
    apiTimeoutMs: config.API_TIMEOUT_MS,
    cache: cache.getStats(),
    bot: botClient.getHealthInfo(),
  });

  const deps: CommandDependencies = {
    analyzer,
    sessions,
    getHealthInfo,
    maxMessageLength: config.TELEGRAM_MAX_MESSAGE_LENGTH,
  };

  return {
    budget,
    provider,
    cache,
    analyzer,
    sessions,
    bot: botClient,
    getHealthInfo,

    async start(): Promise<BotInitResult> {
      const result = await botClient.initialize();
      if (!result.success) {
        return result;
      }
      botClient.registerCommands(deps);
      await botClient.start();
      logger.info(`${APP_NAME} started`, {
        version: VERSION,
        username: result.botInfo?.username,
        provider: provider.name,
      });
      return result;
    },

    async stop(): Promise<void> {
      await botClient.stop();
      cache.clear();
    },
  };
}
