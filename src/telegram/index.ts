/**
 * Telegram module exports
 */

export {
  TelegramBotClient,
  createTelegramBot,
  type BotHealth,
  type BotStatus,
  type BotInitResult,
} from "./bot";

export {
  SessionStore,
  CALLBACK_DATA,
  getStartKeyboard,
  parseCommandArgument,
  performAnalysis,
  handleStartCommand,
  handleAnalyzeCommand,
  handleHealthCommand,
  handleCallbackQuery,
  handleTextMessage,
  createStartCommandHandler,
  createAnalyzeCommandHandler,
  createHealthCommandHandler,
  createCallbackQueryHandler,
  createTextMessageHandler,
  type SessionState,
  type InlineKeyboard,
  type CommandDependencies,
} from "./commands";

export {
  TELEGRAM_MAX_MESSAGE_LENGTH,
  escapeHtml,
  formatDate,
  formatTimestamp,
  formatWalletAnalysis,
  splitMessage,
  getWelcomeMessage,
  getMissingAddressMessage,
  getAddressPromptMessage,
  getFallbackMessage,
  formatErrorMessage,
  formatHealthMessage,
  formatUptime,
  type HealthInfo,
} from "./report-formatter";
