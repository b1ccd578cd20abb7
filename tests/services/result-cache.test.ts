/**
 * Tests for the TTL result cache
 */
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

import {
  ResultCache,
  analysisCacheKey,
  isExpired,
} from "../../src/services/result-cache";

describe("ResultCache", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2024-01-01T00:00:00.000Z"));
    vi.spyOn(console, "debug").mockImplementation(() => undefined);
    vi.spyOn(console, "info").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  describe("constructor", () => {
    it("should apply defaults", () => {
      const cache = new ResultCache<string>();
      expect(cache.getStats()).toEqual({
        enabled: true,
        size: 0,
        maxSize: 1000,
        ttl: 300,
        utilization: 0,
      });
    });

    it("should reject a capacity below one", () => {
      expect(() => new ResultCache<string>({ maxSize: 0 })).toThrow(RangeError);
    });
  });

  describe("get and set", () => {
    it("should return a stored value", () => {
      const cache = new ResultCache<{ score: number }>();
      const value = { score: 42 };

      cache.set("wallet", value);

      expect(cache.get("wallet")).toBe(value);
    });

    it("should miss on an unknown key", () => {
      expect(new ResultCache<string>().get("missing")).toBeUndefined();
    });

    it("should keep an entry until strictly more than its TTL has passed", () => {
      const cache = new ResultCache<string>({ ttlSeconds: 60 });
      cache.set("wallet", "report");

      vi.advanceTimersByTime(60_000);
      expect(cache.get("wallet")).toBe("report");

      vi.advanceTimersByTime(1);
      expect(cache.get("wallet")).toBeUndefined();
      expect(cache.size).toBe(0);
    });

    it("should honour a per-entry TTL", () => {
      const cache = new ResultCache<string>({ ttlSeconds: 300 });
      cache.set("short", "report", 1);

      vi.advanceTimersByTime(1001);

      expect(cache.get("short")).toBeUndefined();
    });

    it("should restart the TTL when a key is overwritten", () => {
      const cache = new ResultCache<string>({ ttlSeconds: 10 });
      cache.set("wallet", "first");
      vi.advanceTimersByTime(8000);
      cache.set("wallet", "second");
      vi.advanceTimersByTime(8000);

      expect(cache.get("wallet")).toBe("second");
    });
  });

  describe("eviction", () => {
    it("should evict the entry created first when full", () => {
      const cache = new ResultCache<string>({ maxSize: 2 });
      cache.set("a", "1");
      vi.advanceTimersByTime(10);
      cache.set("b", "2");
      vi.advanceTimersByTime(10);

      // Reading "a" does not protect it
      cache.get("a");
      cache.set("c", "3");

      expect(cache.get("a")).toBeUndefined();
      expect(cache.get("b")).toBe("2");
      expect(cache.get("c")).toBe("3");
      expect(cache.size).toBe(2);
    });

    it("should not evict when overwriting an existing key at capacity", () => {
      const cache = new ResultCache<string>({ maxSize: 2 });
      cache.set("a", "1");
      vi.advanceTimersByTime(10);
      cache.set("b", "2");

      cache.set("b", "updated");

      expect(cache.get("a")).toBe("1");
      expect(cache.get("b")).toBe("updated");
    });
  });

  describe("disabled cache", () => {
    it("should never store or return values", () => {
      const cache = new ResultCache<string>({ enabled: false });
      cache.set("wallet", "report");

      expect(cache.get("wallet")).toBeUndefined();
      expect(cache.size).toBe(0);
      expect(cache.getStats().enabled).toBe(false);
    });
  });

  describe("delete and clear", () => {
    it("should report whether a deleted key existed", () => {
      const cache = new ResultCache<string>();
      cache.set("wallet", "report");

      expect(cache.delete("wallet")).toBe(true);
      expect(cache.delete("wallet")).toBe(false);
    });

    it("should empty the cache", () => {
      const cache = new ResultCache<string>();
      cache.set("a", "1");
      cache.set("b", "2");

      cache.clear();

      expect(cache.size).toBe(0);
    });
  });

  describe("cleanupExpired", () => {
    it("should remove only expired entries", () => {
      const cache = new ResultCache<string>({ ttlSeconds: 60 });
      cache.set("old", "1");
      vi.advanceTimersByTime(30_000);
      cache.set("new", "2");
      vi.advanceTimersByTime(31_000);

      expect(cache.cleanupExpired()).toBe(1);
      expect(cache.get("new")).toBe("2");
    });
  });

  describe("getStats", () => {
    it("should report utilization as a fraction", () => {
      const cache = new ResultCache<string>({ maxSize: 4, ttlSeconds: 120 });
      cache.set("a", "1");

      expect(cache.getStats()).toEqual({
        enabled: true,
        size: 1,
        maxSize: 4,
        ttl: 120,
        utilization: 0.25,
      });
    });

    it("should not count expired entries", () => {
      const cache = new ResultCache<string>({ maxSize: 4, ttlSeconds: 1 });
      cache.set("a", "1");
      vi.advanceTimersByTime(2000);

      expect(cache.getStats().size).toBe(0);
    });
  });

  describe("helpers", () => {
    it("should build analysis keys", () => {
      expect(analysisCacheKey("0xabc")).toBe("analysis:0xabc");
    });

    it("should compare age against the TTL in seconds", () => {
      const entry = { value: "x", createdAt: 1000, ttl: 5 };
      expect(isExpired(entry, 6000)).toBe(false);
      expect(isExpired(entry, 6001)).toBe(true);
    });
  });
});
