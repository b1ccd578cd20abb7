/**
 * Telegram message formatting
 *
 * Builds the HTML messages the bot sends: the wallet report, help and health
 * texts, and user-facing error messages. Long messages are split on line
 * boundaries to fit Telegram's length limit.
 */

import type { ResultCacheStats } from "../services/result-cache";
import type { WalletAnalysis } from "../services/wallet-analyzer";
import { InvalidAddressError, RateLimitExceededError, UpstreamError } from "../utils/errors";
import type { BotHealth, BotStatus } from "./bot";

// ============================================================================
// Constants
// ============================================================================

/** Telegram's maximum message length */
export const TELEGRAM_MAX_MESSAGE_LENGTH = 4096;

/** Tokens listed in the report */
const REPORT_TOP_TOKENS = 5;

/** Transactions listed in the report */
const REPORT_LATEST_TRANSACTIONS = 3;

const DIVIDER = "━━━━━━━━━━━━━━━━━━━━━━━━━━━━━";

// ============================================================================
// Helpers
// ============================================================================

/**
 * Escape HTML special characters for Telegram
 */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

/**
 * YYYY-MM-DD in UTC
 */
export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * YYYY-MM-DD HH:MM:SS UTC
 */
export function formatTimestamp(date: Date): string {
  return `${date.toISOString().slice(0, 19).replace("T", " ")} UTC`;
}

function yesNo(value: boolean): string {
  return value ? "Yes" : "No";
}

// ============================================================================
// Wallet report
// ============================================================================

/**
 * Format a wallet analysis as a Telegram HTML report
 */
export function formatWalletAnalysis(analysis: WalletAnalysis): string {
  const { tokenSummary, transactionSummary, behavior } = analysis;
  const lines: string[] = [
    "💼 <b>Wallet Analysis Report</b>",
    DIVIDER,
    "",
    "<b>Address:</b>",
    `<code>${analysis.address}</code>`,
    "",
    "<b>💰 ETH Balance</b>",
    `Balance: <code>${analysis.balanceDisplay} ETH</code>`,
    "",
    "<b>🪙 Token Holdings</b>",
    `Total Tokens: <code>${tokenSummary.totalTokensHeld}</code>`,
  ];

  if (tokenSummary.topTokens.length > 0) {
    lines.push("Top Tokens:");
    for (const token of tokenSummary.topTokens.slice(0, REPORT_TOP_TOKENS)) {
      lines.push(`  • ${escapeHtml(token.symbol)}: <code>${token.balanceDisplay}</code>`);
    }
  }

  lines.push(
    "",
    "<b>📊 Transaction History</b>",
    `Total Transactions: <code>${transactionSummary.totalTransactions}</code>`,
    `Unique Addresses: <code>${transactionSummary.uniqueCounterparts}</code>`,
    `Contract Interactions: <code>${transactionSummary.contractInteractions}</code>`,
    `Failed Transactions: <code>${transactionSummary.failedTransactions}</code>`
  );

  if (transactionSummary.recentTransactions.length > 0) {
    lines.push("", "<b>📝 Latest Transactions</b>");
    for (const tx of transactionSummary.recentTransactions.slice(0, REPORT_LATEST_TRANSACTIONS)) {
      const direction = tx.to !== null && tx.to === analysis.address ? "↓" : "↑";
      lines.push(
        `${direction} ${tx.valueDisplay} ETH - <code>${escapeHtml(tx.hash.slice(0, 10))}...</code> (${formatDate(tx.timestamp)})`
      );
    }
  }

  lines.push(
    "",
    "<b>🎯 Behavioral Analysis</b>",
    `Activity Level: <code>${behavior.activityLevel.toUpperCase()}</code>`,
    `DeFi User: <code>${yesNo(behavior.defiUser)}</code>`,
    `NFT Trader: <code>${yesNo(behavior.nftTrader)}</code>`,
    `Contract Deployer: <code>${yesNo(behavior.contractDeployer)}</code>`,
    `Wallet Score: <code>${behavior.walletScore}/100</code>`
  );

  if (analysis.daysActive !== undefined && analysis.firstTransactionDate !== undefined) {
    lines.push(
      "",
      "<b>📅 Account History</b>",
      `Active Days: <code>${analysis.daysActive}</code>`,
      `First Transaction: <code>${formatDate(analysis.firstTransactionDate)}</code>`
    );
  }

  lines.push("", DIVIDER, `Generated: ${formatTimestamp(analysis.analyzedAt)}`);

  return lines.join("\n");
}

/**
 * Split a message into chunks of at most `maxLength` characters, breaking
 * only between lines. A text that already fits is returned unchanged.
 */
export function splitMessage(text: string, maxLength: number = TELEGRAM_MAX_MESSAGE_LENGTH): string[] {
  if (text.length <= maxLength) {
    return [text];
  }

  const chunks: string[] = [];
  let current = "";

  for (const line of text.split("\n")) {
    if (current.length + line.length + 1 > maxLength) {
      if (current) {
        chunks.push(current);
      }
      current = `${line}\n`;
    } else {
      current += `${line}\n`;
    }
  }

  if (current) {
    chunks.push(current);
  }

  return chunks;
}

// ============================================================================
// Bot texts
// ============================================================================

export function getWelcomeMessage(): string {
  return `👋 <b>Welcome to Wallet Insight</b>

Ethereum wallet intelligence in your chat

<b>📖 Available Commands:</b>

/analyze [wallet_address]
  Analyze an Ethereum wallet address

/health
  Check bot health status

<b>💡 Example:</b>
/analyze 0x1234567890123456789012345678901234567890

The report includes:
  • ETH balance and token holdings
  • Transaction statistics
  • DeFi and NFT activity detection
  • Behavioral classification
  • Overall wallet score
`;
}

export function getMissingAddressMessage(): string {
  return `❌ <b>Missing wallet address</b>

Usage: /analyze &lt;wallet_address&gt; or press the button below`;
}

export function getAddressPromptMessage(): string {
  return "Please send the <b>wallet address</b> you want to analyze.";
}

export function getFallbackMessage(): string {
  return "Please use the buttons above or commands like /analyze &lt;address&gt;.";
}

/**
 * Map an error to the message shown to the user
 */
export function formatErrorMessage(error: unknown): string {
  if (error instanceof InvalidAddressError) {
    return `❌ <b>Invalid Wallet Address</b>

Error: ${escapeHtml(error.message)}

Please provide a valid Ethereum address (42 characters starting with 0x)`;
  }

  if (error instanceof RateLimitExceededError) {
    return `⏳ <b>Rate Limit Reached</b>

The blockchain data provider is throttling requests. Please wait a minute and try again.`;
  }

  if (error instanceof UpstreamError) {
    return `❌ <b>Blockchain API Error</b>

Failed to fetch blockchain data. Please try again later.

Error: ${escapeHtml(error.message)}`;
  }

  return `❌ <b>Analysis Error</b>

An unexpected error occurred. Please try again later.`;
}

/**
 * Data shown by /health
 */
export interface HealthInfo {
  environment: string;
  provider: string;
  apiTimeoutMs: number;
  cache: ResultCacheStats;
  bot: BotHealth;
}

const BOT_STATUS_LABELS: Record<BotStatus, string> = {
  running: "🟢 Running",
  starting: "🟡 Starting",
  stopping: "🟡 Stopping",
  stopped: "⚪ Stopped",
  error: "🔴 Error",
};

/**
 * Whole seconds as "1h 2m 3s", dropping leading zero units
 */
export function formatUptime(ms: number): string {
  const totalSeconds = Math.max(Math.floor(ms / 1000), 0);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  if (hours > 0) {
    return `${hours}h ${minutes}m ${seconds}s`;
  }
  if (minutes > 0) {
    return `${minutes}m ${seconds}s`;
  }
  return `${seconds}s`;
}

/**
 * Format the /health status report
 */
export function formatHealthMessage(info: HealthInfo, now: Date = new Date()): string {
  const utilization = `${(info.cache.utilization * 100).toFixed(1)}%`;
  const lastError = info.bot.lastError
    ? `\nLast Error: <code>${escapeHtml(info.bot.lastError)}</code>`
    : "";

  return `✅ <b>Wallet Insight Bot Status</b>

<b>System Information</b>
Environment: <code>${escapeHtml(info.environment)}</code>
Blockchain Provider: <code>${escapeHtml(info.provider)}</code>
API Timeout: <code>${info.apiTimeoutMs / 1000}s</code>

<b>Cache Status</b>
Enabled: <code>${yesNo(info.cache.enabled)}</code>
Size: <code>${info.cache.size}/${info.cache.maxSize}</code>
Utilization: <code>${utilization}</code>

<b>Bot Status</b>
Status: <code>${BOT_STATUS_LABELS[info.bot.status]}</code>
Uptime: <code>${formatUptime(info.bot.uptimeMs)}</code>${lastError}
Timestamp: <code>${formatTimestamp(now)}</code>
`;
}
