/**
 * Request budget for blockchain API calls
 *
 * Fixed one-minute window of request units shared by every HTTP call the
 * process makes to the provider. When the window is spent, callers wait for it
 * to close instead of failing.
 */

import { serviceLoggers } from "../../utils/logger";

/**
 * Configuration options for the request budget
 */
export interface RequestBudgetConfig {
  /**
   * Units available per window
   * @default 60
   */
  requestsPerMinute?: number;

  /**
   * Window length in milliseconds
   * @default 60000 (1 minute)
   */
  windowMs?: number;
}

/**
 * Statistics about budget usage
 */
export interface RequestBudgetStats {
  /** Units left in the current window */
  remaining: number;

  /** Units per window */
  limit: number;

  /** When the current window opened */
  windowStartedAt: Date;

  /** Number of acquisitions that had to wait for a new window */
  throttledRequests: number;
}

const DEFAULT_CONFIG: Required<RequestBudgetConfig> = {
  requestsPerMinute: 60,
  windowMs: 60_000,
};

/**
 * Fixed-window request budget
 *
 * @example
 * ```typescript
 * const budget = new RequestBudget({ requestsPerMinute: 5 });
 * await budget.acquire();
 * const response = await fetch(url);
 * ```
 */
export class RequestBudget {
  private readonly config: Required<RequestBudgetConfig>;
  private used = 0;
  private windowStart: number;
  private throttledRequests = 0;

  constructor(config: RequestBudgetConfig = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    if (this.config.requestsPerMinute < 1) {
      throw new RangeError(
        `requestsPerMinute must be at least 1, got: ${this.config.requestsPerMinute}`
      );
    }
    this.windowStart = Date.now();
  }

  /**
   * Take one unit from the budget, waiting for the next window when spent.
   * Never rejects.
   */
  async acquire(): Promise<void> {
    // Loop because concurrent waiters share the fresh window
    for (;;) {
      const now = Date.now();
      const elapsed = now - this.windowStart;

      if (elapsed > this.config.windowMs) {
        this.resetWindow(now);
      }

      if (this.used < this.config.requestsPerMinute) {
        this.used++;
        return;
      }

      const waitMs = Math.max(this.config.windowMs - elapsed, 0);
      this.throttledRequests++;
      serviceLoggers.chainApi.warn("Request budget exhausted, waiting for next window", {
        waitMs,
        limit: this.config.requestsPerMinute,
      });

      await this.sleep(waitMs);

      // The spent window is over once the wait ends
      if (Date.now() - this.windowStart >= this.config.windowMs) {
        this.resetWindow(Date.now());
      }
    }
  }

  /**
   * Units left in the current window (without consuming any)
   */
  getRemaining(): number {
    if (Date.now() - this.windowStart > this.config.windowMs) {
      return this.config.requestsPerMinute;
    }
    return Math.max(this.config.requestsPerMinute - this.used, 0);
  }

  /**
   * Get current budget statistics
   */
  getStats(): RequestBudgetStats {
    return {
      remaining: this.getRemaining(),
      limit: this.config.requestsPerMinute,
      windowStartedAt: new Date(this.windowStart),
      throttledRequests: this.throttledRequests,
    };
  }

  /**
   * Restore the full budget and open a new window
   */
  reset(): void {
    this.resetWindow(Date.now());
    this.throttledRequests = 0;
  }

  private resetWindow(now: number): void {
    this.used = 0;
    this.windowStart = now;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
