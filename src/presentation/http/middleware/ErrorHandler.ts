import { Request, Response, NextFunction } from "express";
import { AppError } from "../../../shared/errors/AppError";
import { HttpError } from "../../../shared/errors/HttpError";
import { container } from "../../../di/Container";
import { ILogger } from "../../../infrastructure/logging/ILogger";
import { TYPES } from "../../../di/types";

/**
 * Centralized Error Handler Middleware
 *
 * Renders HttpErrors with their status. Controllers translate domain errors
 * before they get here; any other AppError is a 500 with its code.
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction,
): void {
  const logger = container.resolve<ILogger>(TYPES.Logger);
  const exposeStack = process.env.NODE_ENV === "development";

  // Not-found and bad input are routine; only log them at warn
  if (err instanceof HttpError && err.statusCode < 500) {
    logger.warn("Request failed", {
      path: req.path,
      method: req.method,
      status: err.statusCode,
      error: err.message,
    });
  } else {
    logger.error("Error handler caught error", err, {
      path: req.path,
      method: req.method,
    });
  }

  // Handle known error types
  if (err instanceof HttpError) {
    res.status(err.statusCode).json({
      error: err.message,
      code: err.code,
      ...(exposeStack && { stack: err.stack }),
    });
    return;
  }

  if (err instanceof AppError) {
    res.status(500).json({
      error: err.message,
      code: err.code,
    });
    return;
  }

  // Unknown error
  res.status(500).json({
    error:
      process.env.NODE_ENV === "production"
        ? "Internal server error"
        : err.message,
    code: "INTERNAL_ERROR",
    ...(exposeStack && { stack: err.stack }),
  });
}
