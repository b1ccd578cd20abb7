/**
 * Telegram Bot Command Handlers
 *
 * /start, /analyze and /health, the inline buttons on the welcome message,
 * and free-text address input after the "analyze" button.
 */

import type { Context } from "grammy";

import { validateAddress } from "../api/chain/address";
import type { WalletAnalyzer } from "../services/wallet-analyzer";
import {
  InvalidAddressError,
  RateLimitExceededError,
  UpstreamError,
  toError,
} from "../utils/errors";
import { type Logger, serviceLoggers } from "../utils/logger";
import {
  TELEGRAM_MAX_MESSAGE_LENGTH,
  formatErrorMessage,
  formatHealthMessage,
  formatWalletAnalysis,
  getAddressPromptMessage,
  getFallbackMessage,
  getMissingAddressMessage,
  getWelcomeMessage,
  splitMessage,
  type HealthInfo,
} from "./report-formatter";

// =============================================================================
// Session state
// =============================================================================

/**
 * Conversation state per user
 */
export type SessionState = "awaiting_address";

/**
 * In-memory per-user conversation state
 */
export class SessionStore {
  private readonly states = new Map<number, SessionState>();

  setAwaitingAddress(userId: number): void {
    this.states.set(userId, "awaiting_address");
  }

  isAwaitingAddress(userId: number): boolean {
    return this.states.get(userId) === "awaiting_address";
  }

  /**
   * Forget a user's state; returns whether there was any
   */
  clear(userId: number): boolean {
    return this.states.delete(userId);
  }

  get size(): number {
    return this.states.size;
  }
}

// =============================================================================
// Keyboard
// =============================================================================

/**
 * Callback data carried by the welcome buttons
 */
export const CALLBACK_DATA = {
  ANALYZE: "analyze",
  HEALTH: "health",
} as const;

/**
 * Inline keyboard type for Telegram
 */
export interface InlineKeyboard {
  inline_keyboard: Array<
    Array<{
      text: string;
      callback_data: string;
    }>
  >;
}

export function getStartKeyboard(): InlineKeyboard {
  return {
    inline_keyboard: [
      [{ text: "🔍 Analyze Wallet", callback_data: CALLBACK_DATA.ANALYZE }],
      [{ text: "📈 Health Check", callback_data: CALLBACK_DATA.HEALTH }],
    ],
  };
}

// =============================================================================
// Dependencies
// =============================================================================

/**
 * What the handlers need from the rest of the application
 */
export interface CommandDependencies {
  analyzer: WalletAnalyzer;
  sessions: SessionStore;
  /** Snapshot for /health */
  getHealthInfo: () => HealthInfo;
  /** Chunk size for long replies */
  maxMessageLength?: number;
  /** Request logger; defaults to the Telegram service logger */
  logger?: Logger;
}

function getUserId(ctx: Context): number | "unknown" {
  return ctx.from?.id ?? "unknown";
}

/**
 * First whitespace-separated word of the command arguments
 */
export function parseCommandArgument(ctx: Context): string {
  const match = typeof ctx.match === "string" ? ctx.match : "";
  return match.trim().split(/\s+/)[0] ?? "";
}

async function replyHtml(ctx: Context, text: string): Promise<void> {
  await ctx.reply(text, { parse_mode: "HTML" });
}

// =============================================================================
// /start
// =============================================================================

/**
 * Handle /start command
 *
 * Sends the welcome text with the analyze and health buttons
 */
export async function handleStartCommand(ctx: Context): Promise<void> {
  serviceLoggers.telegram.info("User started bot", { userId: getUserId(ctx) });
  await ctx.reply(getWelcomeMessage(), {
    parse_mode: "HTML",
    reply_markup: getStartKeyboard(),
  });
}

/**
 * Create the /start command handler
 */
export function createStartCommandHandler(): (ctx: Context) => Promise<void> {
  return (ctx: Context) => handleStartCommand(ctx);
}

// =============================================================================
// Analysis
// =============================================================================

/**
 * Analyze an address and reply with the report.
 *
 * Every failure is logged and answered with an error message; nothing is
 * rethrown to the caller.
 */
export async function performAnalysis(
  ctx: Context,
  rawAddress: string,
  deps: CommandDependencies
): Promise<void> {
  let log = (deps.logger ?? serviceLoggers.telegram).child({ userId: getUserId(ctx) });

  try {
    const address = validateAddress(rawAddress);
    log = log.child({ walletAddress: address });
    log.info("Analysis requested");

    await ctx.replyWithChatAction("typing");

    const { analysis, cached } = await deps.analyzer.analyze(address);
    const report = formatWalletAnalysis(analysis);

    for (const chunk of splitMessage(report, deps.maxMessageLength ?? TELEGRAM_MAX_MESSAGE_LENGTH)) {
      await replyHtml(ctx, chunk);
    }

    log.info("Analysis sent", { cached });
  } catch (error) {
    const err = toError(error);
    if (err instanceof InvalidAddressError) {
      log.warn("Invalid wallet address", { error: err.message });
    } else if (err instanceof RateLimitExceededError) {
      log.error("Provider rate limit exceeded", { error: err.message });
    } else if (err instanceof UpstreamError) {
      log.error("Blockchain service error", { error: err.message });
    } else {
      log.error("Unexpected error during analysis", { error: err.message });
    }
    await replyHtml(ctx, formatErrorMessage(err));
  }
}

/**
 * Handle /analyze <address>
 */
export async function handleAnalyzeCommand(ctx: Context, deps: CommandDependencies): Promise<void> {
  const address = parseCommandArgument(ctx);
  if (!address) {
    await replyHtml(ctx, getMissingAddressMessage());
    return;
  }
  await performAnalysis(ctx, address, deps);
}

/**
 * Create the /analyze command handler
 */
export function createAnalyzeCommandHandler(
  deps: CommandDependencies
): (ctx: Context) => Promise<void> {
  return (ctx: Context) => handleAnalyzeCommand(ctx, deps);
}

// =============================================================================
// /health
// =============================================================================

/**
 * Handle /health command and the health button
 */
export async function handleHealthCommand(ctx: Context, deps: CommandDependencies): Promise<void> {
  serviceLoggers.telegram.info("Health check", { userId: getUserId(ctx) });
  await replyHtml(ctx, formatHealthMessage(deps.getHealthInfo()));
}

/**
 * Create the /health command handler
 */
export function createHealthCommandHandler(
  deps: CommandDependencies
): (ctx: Context) => Promise<void> {
  return (ctx: Context) => handleHealthCommand(ctx, deps);
}

// =============================================================================
// Buttons and free text
// =============================================================================

/**
 * Handle the inline buttons on the welcome message
 */
export async function handleCallbackQuery(ctx: Context, deps: CommandDependencies): Promise<void> {
  const log = serviceLoggers.telegram;

  try {
    await ctx.answerCallbackQuery();
  } catch (error) {
    // Old queries can no longer be answered; the button still works
    log.warn("Could not answer callback query", { error: toError(error).message });
  }

  const data = ctx.callbackQuery?.data;
  const userId = ctx.from?.id;

  switch (data) {
    case CALLBACK_DATA.ANALYZE:
      if (userId !== undefined) {
        deps.sessions.setAwaitingAddress(userId);
      }
      await replyHtml(ctx, getAddressPromptMessage());
      break;
    case CALLBACK_DATA.HEALTH:
      await handleHealthCommand(ctx, deps);
      break;
    default:
      log.debug("Ignoring unknown callback", { data });
  }
}

/**
 * Create the callback query handler
 */
export function createCallbackQueryHandler(
  deps: CommandDependencies
): (ctx: Context) => Promise<void> {
  return (ctx: Context) => handleCallbackQuery(ctx, deps);
}

/**
 * Handle plain text: an address when one was asked for, otherwise a hint
 */
export async function handleTextMessage(ctx: Context, deps: CommandDependencies): Promise<void> {
  const text = ctx.message?.text ?? "";
  const userId = ctx.from?.id;

  if (userId !== undefined && deps.sessions.isAwaitingAddress(userId)) {
    deps.sessions.clear(userId);
    await performAnalysis(ctx, text.trim(), deps);
    return;
  }

  await ctx.reply(getFallbackMessage(), { parse_mode: "HTML" });
}

/**
 * Create the text message handler
 */
export function createTextMessageHandler(
  deps: CommandDependencies
): (ctx: Context) => Promise<void> {
  return (ctx: Context) => handleTextMessage(ctx, deps);
}
