/**
 * Retrying HTTP client for blockchain data providers
 *
 * Every call takes one unit from the shared request budget, then issues the
 * request with a per-attempt timeout and exponential backoff between attempts.
 */

import { RateLimitExceededError, UpstreamError, toError } from "../../utils/errors";
import { serviceLoggers } from "../../utils/logger";
import type { RequestBudget } from "./rate-limiter";

// ============================================================================
// Constants
// ============================================================================

/** Default request timeout in ms */
const DEFAULT_TIMEOUT = 30000;

/** Default number of attempts per call */
const DEFAULT_MAX_RETRIES = 3;

/** Default base retry delay in ms */
const DEFAULT_RETRY_DELAY = 1000;

// ============================================================================
// Types
// ============================================================================

/**
 * Configuration for the HTTP client
 */
export interface ExplorerHttpClientConfig {
  /** Provider name, carried on errors and log entries */
  provider: string;

  /** Shared request budget */
  budget: RequestBudget;

  /** Per-attempt timeout in milliseconds */
  timeout?: number;

  /** Total attempts per call */
  maxRetries?: number;

  /** Base delay in milliseconds; attempt n waits retryDelay * 2^n */
  retryDelay?: number;
}

/**
 * Narrow an unknown JSON value to a plain object
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Read a string field, falling back when absent or of another type
 */
export function readString(record: Record<string, unknown>, key: string, fallback = ""): string {
  const value = record[key];
  return typeof value === "string" ? value : fallback;
}

// ============================================================================
// ExplorerHttpClient Class
// ============================================================================

/**
 * JSON-over-HTTP client with budget, timeout and retry
 */
export class ExplorerHttpClient {
  private readonly config: Required<ExplorerHttpClientConfig>;

  constructor(config: ExplorerHttpClientConfig) {
    this.config = {
      provider: config.provider,
      budget: config.budget,
      timeout: config.timeout ?? DEFAULT_TIMEOUT,
      maxRetries: Math.max(config.maxRetries ?? DEFAULT_MAX_RETRIES, 1),
      retryDelay: config.retryDelay ?? DEFAULT_RETRY_DELAY,
    };
  }

  /**
   * GET a URL with query parameters and return the parsed JSON body
   */
  async get(baseUrl: string, params: Record<string, string>): Promise<unknown> {
    const url = `${baseUrl}?${new URLSearchParams(params).toString()}`;
    return this.request(url, { method: "GET" });
  }

  /**
   * POST a JSON body and return the parsed JSON response
   */
  async post(url: string, body: unknown): Promise<unknown> {
    return this.request(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });
  }

  /**
   * Get client configuration (without the budget)
   */
  getConfig(): { provider: string; timeout: number; maxRetries: number; retryDelay: number } {
    return {
      provider: this.config.provider,
      timeout: this.config.timeout,
      maxRetries: this.config.maxRetries,
      retryDelay: this.config.retryDelay,
    };
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  /**
   * Execute a request with retry logic
   */
  private async request(url: string, init: RequestInit): Promise<unknown> {
    const { provider, maxRetries, retryDelay } = this.config;
    const log = serviceLoggers.chainApi;

    await this.config.budget.acquire();

    let lastError: Error | undefined;

    for (let attempt = 0; attempt < maxRetries; attempt++) {
      let response: Response;
      try {
        response = await this.fetchWithTimeout(url, init);
      } catch (error) {
        lastError = toError(error);
        log.warn("Request failed", {
          provider,
          attempt: attempt + 1,
          error: lastError.message,
        });
        await this.backoff(attempt);
        continue;
      }

      if (response.status === 429) {
        log.warn("Provider rate limit hit", { provider });
        throw new RateLimitExceededError("API rate limit exceeded", { provider });
      }

      if (!response.ok) {
        lastError = new UpstreamError(`HTTP error: ${response.status} ${response.statusText}`, {
          statusCode: response.status,
          provider,
        });
        log.warn("Request returned error status", {
          provider,
          attempt: attempt + 1,
          status: response.status,
        });
        await this.backoff(attempt);
        continue;
      }

      return this.parseBody(response);
    }

    log.error("Request failed after all attempts", {
      provider,
      attempts: maxRetries,
      retryDelay,
      error: lastError?.message,
    });
    throw new UpstreamError(`Failed to fetch blockchain data after ${maxRetries} attempts`, {
      provider,
      cause: lastError,
    });
  }

  /**
   * Parse a JSON body; a malformed body is not retried
   */
  private async parseBody(response: Response): Promise<unknown> {
    try {
      const data: unknown = await response.json();
      return data;
    } catch (error) {
      throw new UpstreamError(`Invalid JSON response from ${this.config.provider}`, {
        statusCode: response.status,
        provider: this.config.provider,
        cause: toError(error),
      });
    }
  }

  /**
   * Wait before the next attempt, if one remains
   */
  private async backoff(attempt: number): Promise<void> {
    if (attempt < this.config.maxRetries - 1) {
      await this.sleep(this.config.retryDelay * Math.pow(2, attempt));
    }
  }

  /**
   * Fetch with timeout
   */
  private async fetchWithTimeout(url: string, init: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeout);

    try {
      return await fetch(url, { ...init, signal: controller.signal });
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Sleep for specified milliseconds
   */
  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
