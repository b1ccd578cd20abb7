/**
 * Wallet Insight Bot
 * Main entry point
 */

import type { Env } from "../config/env";
import { APP_NAME, VERSION, createApplication, loadConfig } from "./app";
import { ConfigurationError, toError } from "./utils/errors";
import { logger } from "./utils/logger";

async function main(): Promise<void> {
  logger.info(`Starting ${APP_NAME} v${VERSION}`);

  let config: Env;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.fatal("Invalid configuration", { error: error.message });
      process.exit(1);
    }
    throw error;
  }

  const app = createApplication(config);
  const result = await app.start();

  if (!result.success) {
    logger.fatal("Failed to start Telegram bot", { error: result.error });
    process.exit(1);
  }

  const shutdown = async (signal: string): Promise<void> => {
    logger.info(`Received ${signal}, initiating graceful shutdown...`);
    try {
      await app.stop();
      logger.info("Graceful shutdown complete");
      process.exit(0);
    } catch (error) {
      logger.error("Error during shutdown", { error: toError(error).message });
      process.exit(1);
    }
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

main().catch((error: unknown) => {
  logger.fatal("Unhandled startup error", { error: toError(error).message });
  process.exit(1);
});
