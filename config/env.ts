import dotenv from "dotenv";

import { ConfigurationError } from "../src/utils/errors";

// Load environment variables from .env file
dotenv.config();

/**
 * Environment variable configuration with type safety and validation
 */

/** Source of raw environment values */
export type EnvSource = Record<string, string | undefined>;

/** Supported blockchain data providers */
export type BlockchainProviderName = "etherscan" | "alchemy";

export const BLOCKCHAIN_PROVIDERS: readonly BlockchainProviderName[] = ["etherscan", "alchemy"];

/**
 * Validates that a URL string is properly formatted
 */
function isValidUrl(url: string): boolean {
  try {
    new URL(url);
    return true;
  } catch {
    return false;
  }
}

/**
 * Get a required environment variable
 */
function getEnvVar(source: EnvSource, key: string, defaultValue?: string): string {
  const value = source[key] ?? defaultValue;
  if (value === undefined) {
    throw new ConfigurationError(`Missing required environment variable: ${key}`);
  }
  return value;
}

/**
 * Get an optional environment variable (empty strings count as unset)
 */
function getEnvVarOptional(source: EnvSource, key: string): string | undefined {
  const value = source[key];
  return value === undefined || value === "" ? undefined : value;
}

/**
 * Get a required URL environment variable with validation
 */
function getEnvVarUrl(source: EnvSource, key: string, defaultValue?: string): string {
  const value = getEnvVar(source, key, defaultValue);
  if (!isValidUrl(value)) {
    throw new ConfigurationError(`Environment variable ${key} must be a valid URL, got: ${value}`);
  }
  return value;
}

/**
 * Get an environment variable as a number
 */
function getEnvVarAsNumber(source: EnvSource, key: string, defaultValue?: number): number {
  const value = source[key];
  if (value === undefined || value === "") {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new ConfigurationError(`Missing required environment variable: ${key}`);
  }
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new ConfigurationError(`Environment variable ${key} must be a number, got: ${value}`);
  }
  return parsed;
}

/**
 * Get an environment variable as a boolean
 */
function getEnvVarAsBoolean(source: EnvSource, key: string, defaultValue?: boolean): boolean {
  const value = source[key];
  if (value === undefined || value === "") {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new ConfigurationError(`Missing required environment variable: ${key}`);
  }
  return value.toLowerCase() === "true" || value === "1";
}

/**
 * Parse the provider selection
 */
function getEnvVarAsProvider(source: EnvSource, key: string): BlockchainProviderName {
  const value = getEnvVar(source, key, "etherscan").toLowerCase();
  const provider = BLOCKCHAIN_PROVIDERS.find((name) => name === value);
  if (!provider) {
    throw new ConfigurationError(
      `Environment variable ${key} must be one of ${BLOCKCHAIN_PROVIDERS.join(", ")}, got: ${value}`
    );
  }
  return provider;
}

/**
 * Validate Telegram bot token format
 * Token format: <bot_id>:<secret>
 */
function validateTelegramBotToken(token: string | undefined): string | undefined {
  if (token === undefined || token === "") {
    return undefined;
  }
  const tokenRegex = /^\d+:[A-Za-z0-9_-]+$/;
  if (!tokenRegex.test(token)) {
    throw new ConfigurationError(
      "Invalid TELEGRAM_BOT_TOKEN format. Expected format: <bot_id>:<secret>"
    );
  }
  return token;
}

/**
 * Redact sensitive values for logging
 */
function redactSecret(value: string | undefined): string {
  if (value === undefined || value === "") {
    return "(not set)";
  }
  if (value.length <= 8) {
    return "****";
  }
  return `${value.substring(0, 4)}****${value.substring(value.length - 4)}`;
}

/**
 * Build the typed configuration from a set of raw values
 */
export function loadEnv(source: EnvSource = process.env) {
  const nodeEnv = getEnvVar(source, "NODE_ENV", "development");

  return {
    // Application
    NODE_ENV: nodeEnv,
    isDevelopment: nodeEnv === "development",
    isProduction: nodeEnv === "production",
    isTest: nodeEnv === "test",

    // Telegram
    TELEGRAM_BOT_TOKEN: validateTelegramBotToken(getEnvVarOptional(source, "TELEGRAM_BOT_TOKEN")),
    TELEGRAM_MAX_MESSAGE_LENGTH: getEnvVarAsNumber(source, "TELEGRAM_MAX_MESSAGE_LENGTH", 4096),

    // Blockchain data provider
    BLOCKCHAIN_API_PROVIDER: getEnvVarAsProvider(source, "BLOCKCHAIN_API_PROVIDER"),
    ETHERSCAN_API_KEY: getEnvVarOptional(source, "ETHERSCAN_API_KEY"),
    ETHERSCAN_API_URL: getEnvVarUrl(source, "ETHERSCAN_API_URL", "https://api.etherscan.io/v2/api"),
    ETHERSCAN_CHAIN_ID: getEnvVarAsNumber(source, "ETHERSCAN_CHAIN_ID", 1),
    ALCHEMY_API_KEY: getEnvVarOptional(source, "ALCHEMY_API_KEY"),
    ALCHEMY_API_URL: getEnvVarUrl(source, "ALCHEMY_API_URL", "https://eth-mainnet.g.alchemy.com/v2"),

    // HTTP client
    API_TIMEOUT_MS: getEnvVarAsNumber(source, "API_TIMEOUT_MS", 30000),
    API_MAX_RETRIES: getEnvVarAsNumber(source, "API_MAX_RETRIES", 3),
    API_RETRY_DELAY_MS: getEnvVarAsNumber(source, "API_RETRY_DELAY_MS", 1000),
    RATE_LIMIT_REQUESTS_PER_MINUTE: getEnvVarAsNumber(source, "RATE_LIMIT_REQUESTS_PER_MINUTE", 60),

    // Result cache
    CACHE_ENABLED: getEnvVarAsBoolean(source, "CACHE_ENABLED", true),
    CACHE_TTL_SECONDS: getEnvVarAsNumber(source, "CACHE_TTL_SECONDS", 300),
    CACHE_MAX_SIZE: getEnvVarAsNumber(source, "CACHE_MAX_SIZE", 1000),

    // Analysis
    TRANSACTION_SAMPLE_SIZE: getEnvVarAsNumber(source, "TRANSACTION_SAMPLE_SIZE", 10),
    DEFI_CONTRACT_THRESHOLD: getEnvVarAsNumber(source, "DEFI_CONTRACT_THRESHOLD", 5),
  } as const;
}

export type Env = ReturnType<typeof loadEnv>;

/**
 * Get the API key for the configured provider
 */
export function getBlockchainApiKey(
  config: Pick<Env, "BLOCKCHAIN_API_PROVIDER" | "ALCHEMY_API_KEY" | "ETHERSCAN_API_KEY">
): string {
  const key =
    config.BLOCKCHAIN_API_PROVIDER === "alchemy" ? config.ALCHEMY_API_KEY : config.ETHERSCAN_API_KEY;
  if (!key) {
    const variable =
      config.BLOCKCHAIN_API_PROVIDER === "alchemy" ? "ALCHEMY_API_KEY" : "ETHERSCAN_API_KEY";
    throw new ConfigurationError(`${variable} not configured`);
  }
  return key;
}

/**
 * Log the current configuration (with sensitive values redacted)
 */
export function logConfig(config: Env): void {
  const redacted = {
    NODE_ENV: config.NODE_ENV,
    TELEGRAM_BOT_TOKEN: redactSecret(config.TELEGRAM_BOT_TOKEN),
    BLOCKCHAIN_API_PROVIDER: config.BLOCKCHAIN_API_PROVIDER,
    ETHERSCAN_API_KEY: redactSecret(config.ETHERSCAN_API_KEY),
    ETHERSCAN_API_URL: config.ETHERSCAN_API_URL,
    ALCHEMY_API_KEY: redactSecret(config.ALCHEMY_API_KEY),
    ALCHEMY_API_URL: config.ALCHEMY_API_URL,
    API_TIMEOUT_MS: config.API_TIMEOUT_MS,
    API_MAX_RETRIES: config.API_MAX_RETRIES,
    RATE_LIMIT_REQUESTS_PER_MINUTE: config.RATE_LIMIT_REQUESTS_PER_MINUTE,
    CACHE_ENABLED: config.CACHE_ENABLED,
    CACHE_TTL_SECONDS: config.CACHE_TTL_SECONDS,
    CACHE_MAX_SIZE: config.CACHE_MAX_SIZE,
  };

  console.log("=".repeat(60));
  console.log("Environment Configuration (secrets redacted):");
  console.log("=".repeat(60));
  for (const [key, value] of Object.entries(redacted)) {
    console.log(`  ${key}: ${value}`);
  }
  console.log("=".repeat(60));
}

/**
 * Validate that the environment is properly configured
 */
export function validateEnv(config: Env): {
  valid: boolean;
  errors: string[];
  warnings: string[];
} {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!config.TELEGRAM_BOT_TOKEN) {
    errors.push("TELEGRAM_BOT_TOKEN environment variable is required");
  }

  if (config.BLOCKCHAIN_API_PROVIDER === "etherscan" && !config.ETHERSCAN_API_KEY) {
    errors.push("ETHERSCAN_API_KEY environment variable is required for Etherscan provider");
  }

  if (config.BLOCKCHAIN_API_PROVIDER === "alchemy" && !config.ALCHEMY_API_KEY) {
    errors.push("ALCHEMY_API_KEY environment variable is required for Alchemy provider");
  }

  if (config.API_MAX_RETRIES < 1) {
    errors.push(`API_MAX_RETRIES must be at least 1, got: ${config.API_MAX_RETRIES}`);
  }

  if (config.RATE_LIMIT_REQUESTS_PER_MINUTE < 1) {
    errors.push(
      `RATE_LIMIT_REQUESTS_PER_MINUTE must be at least 1, got: ${config.RATE_LIMIT_REQUESTS_PER_MINUTE}`
    );
  }

  if (config.CACHE_MAX_SIZE < 1) {
    errors.push(`CACHE_MAX_SIZE must be at least 1, got: ${config.CACHE_MAX_SIZE}`);
  }

  if (!config.CACHE_ENABLED) {
    warnings.push("CACHE_ENABLED is false - every request will hit the provider");
  }

  if (config.TRANSACTION_SAMPLE_SIZE > 100) {
    warnings.push("TRANSACTION_SAMPLE_SIZE above 100 makes each analysis noticeably slower");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * Initialize and validate environment configuration
 * Logs config and throws if critical errors are found
 */
export function initializeEnv(config: Env): void {
  if (!config.isTest) {
    logConfig(config);
  }

  const validation = validateEnv(config);

  if (validation.warnings.length > 0 && !config.isTest) {
    console.log("\nConfiguration Warnings:");
    for (const warning of validation.warnings) {
      console.log(`  ⚠️  ${warning}`);
    }
  }

  if (validation.errors.length > 0) {
    console.error("\nConfiguration Errors:");
    for (const error of validation.errors) {
      console.error(`  ❌  ${error}`);
    }
    throw new ConfigurationError(
      `Environment validation failed with ${validation.errors.length} error(s): ${validation.errors.join("; ")}`
    );
  }

  if (!config.isTest) {
    console.log("\n✅ Environment configuration validated successfully\n");
  }
}

// Export utility functions for testing
export const envUtils = {
  isValidUrl,
  validateTelegramBotToken,
  redactSecret,
};
