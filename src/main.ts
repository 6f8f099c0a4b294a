/**
 * API Entry Point
 */

import "reflect-metadata"; // Must be first import for TSyringe
import "dotenv/config";

// Initialize DI container
import { container } from "./di/Container";
import { TYPES } from "./di/types";
import { IConfig } from "./shared/config/IConfig";
import { ILogger } from "./infrastructure/logging/ILogger";
import { TranslationCatalog } from "./domain/translations/TranslationCatalog";
import { createApp } from "./app";

async function bootstrap() {
  // Get configuration and logger from DI container
  const config = container.resolve<IConfig>(TYPES.Config);
  const logger = container.resolve<ILogger>(TYPES.Logger);

  logger.info("Starting scripture API server...", {
    source: config.bibleSource,
  });

  // Without a document source nothing can be served
  const catalog = container.resolve<TranslationCatalog>(TYPES.TranslationCatalog);
  try {
    await catalog.initialize();
    await catalog.list();
  } catch (error) {
    logger.fatal(
      "Document source unavailable",
      error instanceof Error ? error : new Error(String(error)),
    );
    process.exit(1);
  }

  const app = createApp({
    corsOrigins: config.corsOrigins,
    requestLogging: true,
  });

  // Start server
  app.listen(config.port, () => {
    logger.info("Scripture API server started", {
      port: config.port,
      env: config.nodeEnv,
    });
  });
}

bootstrap().catch((error) => {
  console.error("Failed to start server:", error);
  process.exit(1);
});
