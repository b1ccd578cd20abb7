/**
 * Telegram Bot Client
 *
 * Initializes and manages the Telegram bot using grammy library.
 * Owns the bot lifecycle and wires the wallet commands to it.
 */

import { Bot, Context, GrammyError, HttpError } from "grammy";

import { toError } from "../utils/errors";
import { serviceLoggers } from "../utils/logger";
import {
  createAnalyzeCommandHandler,
  createCallbackQueryHandler,
  createHealthCommandHandler,
  createStartCommandHandler,
  createTextMessageHandler,
  type CommandDependencies,
} from "./commands";

/**
 * Bot status for health checks
 */
export type BotStatus = "stopped" | "starting" | "running" | "stopping" | "error";

/**
 * Bot initialization result
 */
export interface BotInitResult {
  success: boolean;
  botInfo?: {
    id: number;
    username: string;
    firstName: string;
  };
  error?: string;
}

/**
 * Bot lifecycle snapshot shown by /health
 */
export interface BotHealth {
  status: BotStatus;
  uptimeMs: number;
  lastError: string | null;
}

type Handler = (ctx: Context) => void | Promise<void>;

/**
 * Describe a grammy error for logs and init results
 */
function describeError(error: unknown, fallback: string): string {
  if (error instanceof GrammyError) {
    return `Telegram API error: ${error.description}`;
  }
  if (error instanceof HttpError) {
    return `Network error: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return fallback;
}

/**
 * TelegramBotClient class manages the bot lifecycle
 */
export class TelegramBotClient {
  private bot: Bot | null = null;
  private status: BotStatus = "stopped";
  private startedAt: Date | null = null;
  private lastError: Error | null = null;
  private readonly token: string | null;

  constructor(token?: string) {
    this.token = token || null;
  }

  /**
   * Check if the bot token is configured
   */
  public hasToken(): boolean {
    return this.token !== null;
  }

  /**
   * Get the current bot status
   */
  public getStatus(): BotStatus {
    return this.status;
  }

  /**
   * Get the bot instance (throws if not initialized)
   */
  public getBot(): Bot {
    if (!this.bot) {
      throw new Error("Bot is not initialized. Call initialize() first.");
    }
    return this.bot;
  }

  /**
   * Get the last error if any
   */
  public getLastError(): Error | null {
    return this.lastError;
  }

  /**
   * Get uptime in milliseconds
   */
  public getUptime(): number {
    if (!this.startedAt || this.status !== "running") {
      return 0;
    }
    return Date.now() - this.startedAt.getTime();
  }

  /**
   * Initialize the bot (creates instance but doesn't start polling)
   */
  public async initialize(): Promise<BotInitResult> {
    if (!this.token) {
      this.status = "error";
      this.lastError = new Error("TELEGRAM_BOT_TOKEN is not configured");
      return {
        success: false,
        error: "TELEGRAM_BOT_TOKEN is not configured",
      };
    }

    try {
      this.status = "starting";

      this.bot = new Bot(this.token);

      // Get bot info to verify token is valid
      const me = await this.bot.api.getMe();

      return {
        success: true,
        botInfo: {
          id: me.id,
          username: me.username,
          firstName: me.first_name,
        },
      };
    } catch (error) {
      this.status = "error";
      this.lastError = toError(error);
      this.bot = null;

      return {
        success: false,
        error: describeError(error, "Failed to initialize bot"),
      };
    }
  }

  /**
   * Register the wallet commands, buttons and text handler
   */
  public registerCommands(deps: CommandDependencies): void {
    this.onCommand("start", createStartCommandHandler());
    this.onCommand("analyze", createAnalyzeCommandHandler(deps));
    this.onCommand("health", createHealthCommandHandler(deps));
    this.onCallbackQuery(createCallbackQueryHandler(deps));
    this.onText(createTextMessageHandler(deps));
  }

  /**
   * Start the bot (begin polling for updates)
   */
  public async start(): Promise<void> {
    const bot = this.getBot();

    if (this.status === "running") {
      return;
    }

    this.status = "starting";
    const log = serviceLoggers.telegram;

    // Anything a handler did not catch ends up here
    bot.catch((err) => {
      log.error("Error while handling update", {
        updateId: err.ctx.update.update_id,
        error: describeError(err.error, String(err.error)),
      });
      this.lastError = toError(err.error);
    });

    // Polling runs until stop(); failures surface through lastError
    bot
      .start({
        onStart: (botInfo) => {
          this.status = "running";
          this.startedAt = new Date();
          log.info("Bot is now running", { username: botInfo.username });
        },
      })
      .catch((error: unknown) => {
        this.status = "error";
        this.lastError = toError(error);
        log.fatal("Polling stopped unexpectedly", { error: this.lastError.message });
      });
  }

  /**
   * Stop the bot gracefully
   */
  public async stop(): Promise<void> {
    if (!this.bot || this.status === "stopped") {
      return;
    }

    this.status = "stopping";

    try {
      await this.bot.stop();
      this.status = "stopped";
      this.startedAt = null;
      serviceLoggers.telegram.info("Bot stopped gracefully");
    } catch (error) {
      this.status = "error";
      this.lastError = toError(error);
      throw error;
    }
  }

  /**
   * Register a command handler
   */
  public onCommand(command: string, handler: Handler): void {
    this.getBot().command(command, handler);
  }

  /**
   * Register a handler for inline button presses
   */
  public onCallbackQuery(handler: Handler): void {
    this.getBot().on("callback_query:data", handler);
  }

  /**
   * Register a handler for plain text messages
   */
  public onText(handler: Handler): void {
    this.getBot().on("message:text", handler);
  }

  /**
   * Lifecycle snapshot for /health
   */
  public getHealthInfo(): BotHealth {
    return {
      status: this.status,
      uptimeMs: this.getUptime(),
      lastError: this.lastError?.message ?? null,
    };
  }
}

/**
 * Create a new bot client instance
 */
export function createTelegramBot(token?: string): TelegramBotClient {
  return new TelegramBotClient(token);
}

// Export types
export type { Bot, Context };
