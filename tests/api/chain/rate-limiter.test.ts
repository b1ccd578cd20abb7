/**
 * Tests for the request budget
 */
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

import { RequestBudget } from "../../../src/api/chain/rate-limiter";

describe("RequestBudget", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2024-01-01T00:00:00Z"));
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it("should start with the full budget", () => {
    const budget = new RequestBudget({ requestsPerMinute: 5 });

    expect(budget.getStats()).toEqual({
      remaining: 5,
      limit: 5,
      windowStartedAt: new Date("2024-01-01T00:00:00Z"),
      throttledRequests: 0,
    });
  });

  it("should consume one unit per acquire", async () => {
    const budget = new RequestBudget({ requestsPerMinute: 5 });

    await budget.acquire();
    await budget.acquire();

    expect(budget.getRemaining()).toBe(3);
  });

  it("should default to 60 requests per minute", () => {
    expect(new RequestBudget().getStats().limit).toBe(60);
  });

  it("should wait for the window to close when exhausted", async () => {
    const budget = new RequestBudget({ requestsPerMinute: 2 });
    await budget.acquire();
    await budget.acquire();

    let acquired = false;
    const pending = budget.acquire().then(() => {
      acquired = true;
    });

    await vi.advanceTimersByTimeAsync(59_000);
    expect(acquired).toBe(false);

    await vi.advanceTimersByTimeAsync(1_000);
    await pending;

    expect(acquired).toBe(true);
    const stats = budget.getStats();
    expect(stats.throttledRequests).toBe(1);
    expect(stats.remaining).toBe(1);
    expect(stats.windowStartedAt).toEqual(new Date("2024-01-01T00:01:00Z"));
  });

  it("should release concurrent waiters one window at a time", async () => {
    const budget = new RequestBudget({ requestsPerMinute: 1 });
    const start = Date.now();
    await budget.acquire();

    const resolvedAt: number[] = [];
    const waiters = [budget.acquire(), budget.acquire(), budget.acquire()].map((waiter) =>
      waiter.then(() => {
        resolvedAt.push(Date.now() - start);
      })
    );

    await vi.advanceTimersByTimeAsync(59_999);
    expect(resolvedAt).toEqual([]);

    await vi.advanceTimersByTimeAsync(1);
    expect(resolvedAt).toEqual([60_000]);

    await vi.advanceTimersByTimeAsync(60_000);
    expect(resolvedAt).toEqual([60_000, 120_000]);

    await vi.advanceTimersByTimeAsync(60_000);
    await Promise.all(waiters);

    expect(resolvedAt).toEqual([60_000, 120_000, 180_000]);
    expect(budget.getRemaining()).toBe(0);
    expect(budget.getStats().throttledRequests).toBe(6);
  });

  it("should open a fresh window once more than a minute has passed", async () => {
    const budget = new RequestBudget({ requestsPerMinute: 2 });
    await budget.acquire();
    await budget.acquire();

    vi.advanceTimersByTime(60_001);
    await budget.acquire();

    expect(budget.getRemaining()).toBe(1);
    expect(budget.getStats().throttledRequests).toBe(0);
  });

  it("should restore the budget on reset", async () => {
    const budget = new RequestBudget({ requestsPerMinute: 1 });
    await budget.acquire();

    budget.reset();

    expect(budget.getRemaining()).toBe(1);
  });

  it("should reject a non-positive limit", () => {
    expect(() => new RequestBudget({ requestsPerMinute: 0 })).toThrow(RangeError);
  });
});
