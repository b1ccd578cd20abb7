/**
 * Tests for the wallet analysis flow
 */
import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from "vitest";

import {
  summarizeTransactions,
  type ChainDataProvider,
  type TokenSummary,
  type Transaction,
  type TransactionSummary,
} from "../../src/api/chain";
import {
  ResultCache,
  WalletAnalyzer,
  createWalletAnalyzer,
  type WalletAnalysis,
} from "../../src/services";
import { InvalidAddressError, UpstreamError } from "../../src/utils/errors";

const WALLET = `0x${"a".repeat(40)}`;
const PEER = `0x${"b".repeat(40)}`;
const NOW = new Date("2024-01-05T12:00:00.000Z");

function makeTx(day: number, overrides: Partial<Transaction> = {}): Transaction {
  return {
    hash: `0x0${day}`,
    from: WALLET,
    to: PEER,
    value: "100000000000000000",
    valueDisplay: "0.1",
    gasPrice: "1000000000",
    gasUsed: "21000",
    timestamp: new Date(`2024-01-0${day}T00:00:00.000Z`),
    blockNumber: 100 + day,
    isError: false,
    type: "send",
    methodSelector: null,
    ...overrides,
  };
}

/** Five transactions, newest first, spread over 2024-01-01..05 */
function fiveDayWindow(): TransactionSummary {
  const transactions = [5, 4, 3, 2, 1].map((day) =>
    day === 3 ? makeTx(day, { from: PEER, to: WALLET, type: "receive" }) : makeTx(day)
  );
  return summarizeTransactions(WALLET, transactions, 5);
}

const TOKENS: TokenSummary = {
  topTokens: [
    {
      contractAddress: `0x${"1".repeat(40)}`,
      name: "USD Coin",
      symbol: "USDC",
      decimals: 6,
      balance: "2500000",
      balanceDisplay: "2.5",
    },
  ],
  totalTokensHeld: 1,
};

interface StubProvider extends ChainDataProvider {
  getBalance: Mock<ChainDataProvider["getBalance"]>;
  getTokens: Mock<ChainDataProvider["getTokens"]>;
  getTransactions: Mock<ChainDataProvider["getTransactions"]>;
}

function createStubProvider(transactions: TransactionSummary = fiveDayWindow()): StubProvider {
  return {
    name: "stub",
    getBalance: vi.fn<ChainDataProvider["getBalance"]>().mockResolvedValue("1500000000000000000"),
    getTokens: vi.fn<ChainDataProvider["getTokens"]>().mockResolvedValue(TOKENS),
    getTransactions: vi.fn<ChainDataProvider["getTransactions"]>().mockResolvedValue(transactions),
  };
}

describe("WalletAnalyzer", () => {
  let provider: StubProvider;
  let cache: ResultCache<WalletAnalysis>;
  let analyzer: WalletAnalyzer;

  beforeEach(() => {
    vi.spyOn(console, "debug").mockImplementation(() => undefined);
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    provider = createStubProvider();
    cache = new ResultCache<WalletAnalysis>();
    analyzer = new WalletAnalyzer({ provider, cache, now: () => NOW });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should build a full report from provider data", async () => {
    const { analysis, cached } = await analyzer.analyze(`  ${WALLET.toUpperCase().replace("0X", "0x")}  `);

    expect(cached).toBe(false);
    expect(analysis.address).toBe(WALLET);
    expect(analysis.balance).toBe("1500000000000000000");
    expect(analysis.balanceDisplay).toBe("1.5");
    expect(analysis.tokenSummary).toEqual(TOKENS);
    expect(analysis.transactionSummary.totalTransactions).toBe(5);
    expect(analysis.transactionSummary.uniqueCounterparts).toBe(1);
    expect(analysis.behavior).toEqual({
      activityLevel: "low",
      defiUser: false,
      nftTrader: false,
      contractDeployer: false,
      walletScore: 15,
    });
    expect(analysis.daysActive).toBe(4);
    expect(analysis.firstTransactionDate).toEqual(new Date("2024-01-01T00:00:00.000Z"));
    expect(analysis.analyzedAt).toBe(NOW);
  });

  it("should call the provider in order with the sample size", async () => {
    const sized = new WalletAnalyzer({ provider, cache, transactionSampleSize: 25, now: () => NOW });

    await sized.analyze(WALLET);

    expect(provider.getBalance).toHaveBeenCalledWith(WALLET);
    expect(provider.getTokens).toHaveBeenCalledWith(WALLET);
    expect(provider.getTransactions).toHaveBeenCalledWith(WALLET, 25);

    const balanceOrder = provider.getBalance.mock.invocationCallOrder[0] ?? 0;
    const tokensOrder = provider.getTokens.mock.invocationCallOrder[0] ?? 0;
    const txOrder = provider.getTransactions.mock.invocationCallOrder[0] ?? 0;
    expect(balanceOrder).toBeLessThan(tokensOrder);
    expect(tokensOrder).toBeLessThan(txOrder);
  });

  it("should serve the second request from cache", async () => {
    const first = await analyzer.analyze(WALLET);
    const second = await analyzer.analyze(WALLET);

    expect(second.cached).toBe(true);
    expect(second.analysis).toBe(first.analysis);
    expect(provider.getBalance).toHaveBeenCalledTimes(1);
    expect(provider.getTokens).toHaveBeenCalledTimes(1);
    expect(provider.getTransactions).toHaveBeenCalledTimes(1);
  });

  it("should freeze the report", async () => {
    const { analysis } = await analyzer.analyze(WALLET);
    expect(Object.isFrozen(analysis)).toBe(true);
  });

  it("should reject an invalid address without touching the provider", async () => {
    await expect(analyzer.analyze("0xnothex")).rejects.toBeInstanceOf(InvalidAddressError);

    expect(provider.getBalance).not.toHaveBeenCalled();
    expect(cache.size).toBe(0);
  });

  it("should not cache a failed analysis", async () => {
    provider.getTokens.mockRejectedValueOnce(
      new UpstreamError("Failed to fetch blockchain data after 3 attempts", { provider: "stub" })
    );

    await expect(analyzer.analyze(WALLET)).rejects.toThrow(UpstreamError);
    expect(provider.getTransactions).not.toHaveBeenCalled();
    expect(cache.size).toBe(0);

    const retry = await analyzer.analyze(WALLET);
    expect(retry.cached).toBe(false);
  });

  it("should label a four-transaction wallet dormant", async () => {
    const four = summarizeTransactions(WALLET, [4, 3, 2, 1].map((day) => makeTx(day)), 4);
    const quiet = new WalletAnalyzer({
      provider: createStubProvider(four),
      cache: new ResultCache<WalletAnalysis>(),
      now: () => NOW,
    });

    const { analysis } = await quiet.analyze(WALLET);

    expect(analysis.behavior.activityLevel).toBe("dormant");
  });

  it("should report zero days for a wallet without transactions", async () => {
    const empty = new WalletAnalyzer({
      provider: createStubProvider(summarizeTransactions(WALLET, [], 0)),
      cache: new ResultCache<WalletAnalysis>(),
      now: () => NOW,
    });

    const { analysis } = await empty.analyze(WALLET);

    expect(analysis.daysActive).toBe(0);
    expect(analysis.firstTransactionDate).toBe(NOW);
    expect(analysis.behavior.walletScore).toBe(5);
  });

  it("should expose the provider name", () => {
    expect(createWalletAnalyzer({ provider, cache }).providerName).toBe("stub");
  });
});
