import pino, { type Logger, type LoggerOptions } from "pino";

export type { Logger };

export interface LoggerConfig {
  /** Component name, mixed into every entry */
  service: string;
  level?: string;
  environment?: string;
}

/**
 * Create a pino logger with string level labels and the service name on
 * every entry.
 *
 * @example
 * ```ts
 * const logger = createLogger({ service: "odoo-source" });
 * logger.info({ records: 240 }, "records loaded");
 * ```
 */
export function createLogger(opts: LoggerConfig): Logger {
  const environment = opts.environment ?? process.env.NODE_ENV;
  const isProduction = environment === "production";

  const pinoOpts: LoggerOptions = {
    name: opts.service,
    level: opts.level ?? (isProduction ? "info" : "debug"),
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    mixin() {
      return {
        service: opts.service,
        ...(environment ? { environment } : {}),
      };
    },
  };

  return pino(pinoOpts);
}

/** A logger that drops everything; for tests and embedding callers. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
