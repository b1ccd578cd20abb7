/**
 * Application Error Types
 *
 * Every error the bot raises on purpose extends WalletBotError and carries a
 * stable code, so the request boundary can map it to a user-facing message.
 */

/**
 * Error codes
 */
export type WalletBotErrorCode =
  | "INVALID_ADDRESS"
  | "UPSTREAM_ERROR"
  | "RATE_LIMIT_EXCEEDED"
  | "CONFIGURATION_ERROR";

/**
 * Base class for application errors
 */
export class WalletBotError extends Error {
  readonly code: WalletBotErrorCode;

  constructor(message: string, code: WalletBotErrorCode, options?: { cause?: Error }) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = "WalletBotError";
    this.code = code;

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Raised when user input is not a well-formed Ethereum address
 */
export class InvalidAddressError extends WalletBotError {
  /** The rejected input, as received */
  readonly input: unknown;

  constructor(input: unknown, message?: string) {
    super(
      message ??
        `Invalid wallet address format: ${String(input)}. Must be a valid 42-character Ethereum address (0x...)`,
      "INVALID_ADDRESS"
    );
    this.name = "InvalidAddressError";
    this.input = input;
  }
}

/**
 * Raised when the blockchain data provider fails or returns an unusable payload
 */
export class UpstreamError extends WalletBotError {
  readonly statusCode?: number;
  readonly provider?: string;

  constructor(
    message: string,
    options?: { statusCode?: number; provider?: string; cause?: Error }
  ) {
    super(message, "UPSTREAM_ERROR", { cause: options?.cause });
    this.name = "UpstreamError";
    this.statusCode = options?.statusCode;
    this.provider = options?.provider;
  }
}

/**
 * Raised when the provider signals throttling (HTTP 429 or a rate-limit payload)
 */
export class RateLimitExceededError extends WalletBotError {
  readonly provider?: string;

  constructor(message = "API rate limit exceeded", options?: { provider?: string }) {
    super(message, "RATE_LIMIT_EXCEEDED");
    this.name = "RateLimitExceededError";
    this.provider = options?.provider;
  }
}

/**
 * Raised at startup when a required setting is missing or malformed
 */
export class ConfigurationError extends WalletBotError {
  constructor(message: string) {
    super(message, "CONFIGURATION_ERROR");
    this.name = "ConfigurationError";
  }
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
