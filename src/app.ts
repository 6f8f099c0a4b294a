import express, { Express } from "express";
import cors from "cors";
import helmet from "helmet";
import morgan from "morgan";

import {
  createBibleDataRouter,
  createReferenceRouter,
  createSearchRouter,
} from "./presentation/http/routes/bible.routes";
import { errorHandler } from "./presentation/http/middleware/ErrorHandler";

export interface AppOptions {
  corsOrigins?: string[] | "*";
  requestLogging?: boolean;
}

/**
 * Build the Express application
 *
 * Dependencies are resolved from the DI container when the routers are
 * created, so register overrides before calling this.
 */
export function createApp(options: AppOptions = {}): Express {
  const app = express();

  // Security middleware
  app.use(helmet());

  // CORS
  app.use(cors({ origin: options.corsOrigins ?? "*" }));

  // Logging
  if (options.requestLogging) {
    app.use(morgan("combined"));
  }

  // Health check
  app.get("/healthz", (_req, res) => {
    res.json({ status: "ok" });
  });

  // API Routes (v1)
  app.use("/v1/data", createBibleDataRouter());
  app.use("/v1/search", createSearchRouter());

  // Index and reference lookups
  app.use("/", createReferenceRouter());

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({ error: "Not Found" });
  });

  // Centralized error handler (must be last)
  app.use(errorHandler);

  return app;
}
