import pino from "pino";
import { inject, injectable } from "tsyringe";
import { TYPES } from "../../di/types";
import { IConfig } from "../../shared/config/IConfig";
import { ILogger, LogContext } from "./ILogger";

/**
 * Pino logger implementation
 *
 * Pretty-printed through pino-pretty outside production.
 */
@injectable()
export class PinoLogger implements ILogger {
  private logger: pino.Logger;

  constructor(@inject(TYPES.Config) config: IConfig) {
    this.logger = pino({
      name: "scripture-api",
      level: config.logLevel,
      transport:
        config.nodeEnv !== "production"
          ? {
              target: "pino-pretty",
              options: {
                colorize: true,
                ignore: "pid,hostname",
                translateTime: "SYS:standard",
              },
            }
          : undefined,
    });
  }

  debug(message: string, context?: LogContext): void {
    this.logger.debug(context || {}, message);
  }

  info(message: string, context?: LogContext): void {
    this.logger.info(context || {}, message);
  }

  warn(message: string, context?: LogContext): void {
    this.logger.warn(context || {}, message);
  }

  error(message: string, error?: Error, context?: LogContext): void {
    this.logger.error(
      {
        ...context,
        err: error,
      },
      message,
    );
  }

  fatal(message: string, error?: Error, context?: LogContext): void {
    this.logger.fatal(
      {
        ...context,
        err: error,
      },
      message,
    );
  }
}
