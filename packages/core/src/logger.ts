/**
 * Structured logger
 *
 * Thin wrapper over pino that keeps the `logger.info(message, meta)` call
 * shape used across the services. Output goes to stderr so that stdout stays
 * free for the NDJSON event stream.
 */

import pino from "pino";

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  child(component: string): Logger;
}

const base = pino(
  {
    level: (process.env.LOG_LEVEL || "info").toLowerCase(),
    redact: {
      paths: ["apiKey", "*.apiKey", "headers.Authorization"],
      censor: "[REDACTED]",
    },
  },
  pino.destination(2)
);

function wrap(instance: pino.Logger): Logger {
  return {
    debug: (message, meta) => instance.debug(meta ?? {}, message),
    info: (message, meta) => instance.info(meta ?? {}, message),
    warn: (message, meta) => instance.warn(meta ?? {}, message),
    error: (message, meta) => instance.error(meta ?? {}, message),
    child: (component) => wrap(instance.child({ component })),
  };
}

export const logger: Logger = wrap(base);
