/**
 * Tests for the Alchemy data provider
 */
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

import { AlchemyProvider, createAlchemyProvider } from "../../../src/api/chain/alchemy";
import { isRecord } from "../../../src/api/chain/client";
import { RequestBudget } from "../../../src/api/chain/rate-limiter";
import {
  InvalidAddressError,
  RateLimitExceededError,
  UpstreamError,
} from "../../../src/utils/errors";
import { createMockResponse } from "./helpers";

const WALLET = `0x${"a".repeat(40)}`;
const PEER = `0x${"b".repeat(40)}`;
const CONTRACT = `0x${"c".repeat(40)}`;
const USDC = `0x${"1".repeat(40)}`;
const DAI = `0x${"2".repeat(40)}`;
const DUST = `0x${"3".repeat(40)}`;

type RpcHandler = (params: unknown[]) => unknown;

const mockFetch = vi.fn();

/**
 * Answer JSON-RPC calls from per-method handlers
 */
function serveRpc(handlers: Record<string, RpcHandler>): void {
  const answer = (call: unknown): unknown => {
    if (!isRecord(call) || typeof call.method !== "string") {
      throw new Error("Unexpected RPC payload");
    }
    const handler = handlers[call.method];
    if (!handler) {
      throw new Error(`No handler for ${call.method}`);
    }
    const params = Array.isArray(call.params) ? call.params : [];
    return { jsonrpc: "2.0", id: call.id, result: handler(params) };
  };

  mockFetch.mockImplementation((_url: unknown, init?: RequestInit) => {
    const body: unknown = JSON.parse(String(init?.body));
    return Promise.resolve(createMockResponse(answer(body)));
  });
}

function sentMethods(): unknown[] {
  return sentBodies().map((body) => (isRecord(body) ? body.method : null));
}

function sentBodies(): unknown[] {
  return mockFetch.mock.calls.map((call) => {
    const init: unknown = call[1];
    return isRecord(init) ? JSON.parse(String(init.body)) : null;
  });
}

describe("AlchemyProvider", () => {
  let provider: AlchemyProvider;
  let budget: RequestBudget;

  beforeEach(() => {
    vi.stubGlobal("fetch", mockFetch);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    budget = new RequestBudget({ requestsPerMinute: 100 });
    provider = createAlchemyProvider({
      apiKey: "test-alchemy-key",
      budget,
      baseUrl: "https://alchemy.test/v2/",
      retryDelay: 1,
    });
  });

  afterEach(() => {
    mockFetch.mockReset();
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it("should report its name", () => {
    expect(provider.name).toBe("alchemy");
  });

  describe("getBalance", () => {
    it("should decode the hex balance", async () => {
      serveRpc({ eth_getBalance: () => "0xde0b6b3a7640000" });

      await expect(provider.getBalance(WALLET)).resolves.toBe("1000000000000000000");

      expect(mockFetch.mock.calls[0]?.[0]).toBe("https://alchemy.test/v2/test-alchemy-key");
      expect(sentBodies()[0]).toEqual({
        jsonrpc: "2.0",
        id: 1,
        method: "eth_getBalance",
        params: [WALLET, "latest"],
      });
    });

    it("should validate the address before any request", async () => {
      await expect(provider.getBalance("not-an-address")).rejects.toBeInstanceOf(
        InvalidAddressError
      );
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it("should surface a JSON-RPC error member", async () => {
      mockFetch.mockResolvedValueOnce(
        createMockResponse({
          jsonrpc: "2.0",
          id: 1,
          error: { code: -32602, message: "invalid 1st argument" },
        })
      );

      const error = await provider.getBalance(WALLET).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UpstreamError);
      expect(error instanceof Error && error.message).toBe(
        "Alchemy API error: invalid 1st argument"
      );
    });

    it("should reject a result that is not a quantity", async () => {
      serveRpc({ eth_getBalance: () => "lots" });

      const error = await provider.getBalance(WALLET).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UpstreamError);
      expect(error instanceof Error && error.message).toBe(
        "Malformed eth_getBalance response from Alchemy"
      );
    });

    it("should pass a provider rate limit through without retrying", async () => {
      mockFetch.mockResolvedValue(createMockResponse(null, false, 429));

      await expect(provider.getBalance(WALLET)).rejects.toBeInstanceOf(RateLimitExceededError);
      expect(mockFetch).toHaveBeenCalledTimes(1);
    });

    it("should retry server errors in the HTTP client only", async () => {
      mockFetch.mockResolvedValueOnce(createMockResponse(null, false, 503));
      mockFetch.mockResolvedValueOnce(
        createMockResponse({ jsonrpc: "2.0", id: 1, result: "0x2a" })
      );

      await expect(provider.getBalance(WALLET)).resolves.toBe("42");
      expect(mockFetch).toHaveBeenCalledTimes(2);
      expect(budget.getRemaining()).toBe(99);
    });
  });

  describe("getTokens", () => {
    beforeEach(() => {
      serveRpc({
        alchemy_getTokenBalances: () => ({
          address: WALLET,
          tokenBalances: [
            { contractAddress: USDC, tokenBalance: "0x2625a0" },
            { contractAddress: DAI.toUpperCase().replace("0X", "0x"), tokenBalance: "0x29a2241af62c0000" },
            { contractAddress: DUST, tokenBalance: `0x${"0".repeat(64)}` },
          ],
        }),
        alchemy_getTokenMetadata: (params) =>
          params[0] === USDC
            ? { name: "USD Coin", symbol: "USDC", decimals: 6, logo: null }
            : { name: "Dai Stablecoin", symbol: "DAI", decimals: 18, logo: null },
      });
    });

    it("should drop zero balances and rank the rest", async () => {
      const summary = await provider.getTokens(WALLET);

      expect(summary.totalTokensHeld).toBe(2);
      expect(summary.topTokens.map((token) => token.contractAddress)).toEqual([DAI, USDC]);
    });

    it("should apply metadata in request order", async () => {
      const { topTokens } = await provider.getTokens(WALLET);

      expect(topTokens).toEqual([
        {
          contractAddress: DAI,
          name: "Dai Stablecoin",
          symbol: "DAI",
          decimals: 18,
          balance: "3000000000000000000",
          balanceDisplay: "3",
        },
        {
          contractAddress: USDC,
          name: "USD Coin",
          symbol: "USDC",
          decimals: 6,
          balance: "2500000",
          balanceDisplay: "2.5",
        },
      ]);
    });

    it("should look up metadata for ranked tokens only", async () => {
      await provider.getTokens(WALLET);

      expect(sentMethods()).toEqual([
        "alchemy_getTokenBalances",
        "alchemy_getTokenMetadata",
        "alchemy_getTokenMetadata",
      ]);
      const looked = sentBodies()
        .slice(1)
        .map((body) => (isRecord(body) && Array.isArray(body.params) ? body.params[0] : null));
      expect(looked).toEqual(expect.arrayContaining([DAI, USDC]));
      expect(looked).not.toContain(DUST);
    });

    it("should take one budget unit per RPC call", async () => {
      await provider.getTokens(WALLET);

      expect(budget.getRemaining()).toBe(97);
    });
  });

  describe("getTransactions", () => {
    beforeEach(() => {
      serveRpc({
        alchemy_getAssetTransfers: (params) => {
          const filter = params[0];
          if (isRecord(filter) && filter.fromAddress === WALLET) {
            return {
              transfers: [
                {
                  hash: "0xaa",
                  from: WALLET,
                  to: CONTRACT,
                  blockNum: "0x64",
                  metadata: { blockTimestamp: "2024-01-02T00:00:00.000Z" },
                },
              ],
            };
          }
          return {
            transfers: [
              {
                hash: "0xbb",
                from: PEER,
                to: WALLET,
                blockNum: "0x65",
                metadata: { blockTimestamp: "2024-01-03T00:00:00.000Z" },
              },
              {
                hash: "0xaa",
                from: WALLET,
                to: CONTRACT,
                blockNum: "0x64",
                metadata: { blockTimestamp: "2024-01-02T00:00:00.000Z" },
              },
            ],
          };
        },
        eth_getTransactionByHash: (params) =>
          params[0] === "0xbb"
            ? { hash: "0xbb", from: PEER, to: WALLET, value: "0xde0b6b3a7640000", input: "0x", gasPrice: "0x3b9aca00" }
            : { hash: "0xaa", from: WALLET, to: CONTRACT, value: "0x0", input: "0xa9059cbb00", gasPrice: "0x3b9aca00" },
        eth_getTransactionReceipt: (params) =>
          params[0] === "0xbb"
            ? { status: "0x1", gasUsed: "0x5208", effectiveGasPrice: "0x4a817c800" }
            : { status: "0x0", gasUsed: "0xc350" },
      });
    });

    it("should query both directions with the limit as max count", async () => {
      await provider.getTransactions(WALLET);

      const [outgoing, incoming] = sentBodies();
      expect(outgoing).toMatchObject({
        method: "alchemy_getAssetTransfers",
        params: [
          {
            fromBlock: "0x0",
            toBlock: "latest",
            fromAddress: WALLET,
            category: ["external"],
            order: "desc",
            withMetadata: true,
            maxCount: "0xa",
          },
        ],
      });
      expect(incoming).toMatchObject({
        method: "alchemy_getAssetTransfers",
        params: [{ toAddress: WALLET }],
      });
    });

    it("should merge, sort and classify transfers", async () => {
      const summary = await provider.getTransactions(WALLET);

      expect(summary.totalTransactions).toBe(2);
      expect(summary.recentTransactions.map((tx) => tx.hash)).toEqual(["0xbb", "0xaa"]);
      expect(summary.recentTransactions.map((tx) => tx.type)).toEqual([
        "receive",
        "contract_interaction",
      ]);
      expect(summary.uniqueCounterparts).toBe(2);
      expect(summary.contractInteractions).toBe(1);
      expect(summary.failedTransactions).toBe(1);
    });

    it("should combine transaction and receipt fields", async () => {
      const { recentTransactions } = await provider.getTransactions(WALLET);

      expect(recentTransactions[0]).toEqual({
        hash: "0xbb",
        from: PEER,
        to: WALLET,
        value: "1000000000000000000",
        valueDisplay: "1",
        gasPrice: "20000000000",
        gasUsed: "21000",
        timestamp: new Date("2024-01-03T00:00:00.000Z"),
        blockNumber: 101,
        isError: false,
        type: "receive",
        methodSelector: null,
      });
      expect(recentTransactions[1]?.gasPrice).toBe("1000000000");
      expect(recentTransactions[1]?.gasUsed).toBe("50000");
      expect(recentTransactions[1]?.methodSelector).toBe("0xa9059cbb");
    });

    it("should honour a smaller limit", async () => {
      const summary = await provider.getTransactions(WALLET, 1);

      expect(summary.recentTransactions.map((tx) => tx.hash)).toEqual(["0xbb"]);
      expect(summary.totalTransactions).toBe(2);
    });

    it("should fall back to transfer data when a receipt is not yet available", async () => {
      mockFetch.mockReset();
      serveRpc({
        alchemy_getAssetTransfers: () => ({
          transfers: [
            {
              hash: "0xcc",
              from: WALLET,
              to: PEER,
              blockNum: "0x66",
              metadata: { blockTimestamp: "2024-01-04T00:00:00.000Z" },
            },
          ],
        }),
        eth_getTransactionByHash: () => ({
          hash: "0xcc",
          from: WALLET,
          to: PEER,
          value: "0x6f05b59d3b20000",
          input: "0x",
          gasPrice: "0x3b9aca00",
        }),
        eth_getTransactionReceipt: () => null,
      });

      const { recentTransactions } = await provider.getTransactions(WALLET);

      expect(recentTransactions).toEqual([
        {
          hash: "0xcc",
          from: WALLET,
          to: PEER,
          value: "500000000000000000",
          valueDisplay: "0.5",
          gasPrice: "1000000000",
          gasUsed: "0",
          timestamp: new Date("2024-01-04T00:00:00.000Z"),
          blockNumber: 102,
          isError: false,
          type: "send",
          methodSelector: null,
        },
      ]);
    });

    it("should skip lookups when there are no transfers", async () => {
      mockFetch.mockReset();
      serveRpc({ alchemy_getAssetTransfers: () => ({ transfers: [] }) });

      const summary = await provider.getTransactions(WALLET);

      expect(summary.totalTransactions).toBe(0);
      expect(summary.recentTransactions).toEqual([]);
      expect(mockFetch).toHaveBeenCalledTimes(2);
    });
  });
});
