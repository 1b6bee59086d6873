/**
 * Structured logging with credential redaction and run context.
 *
 * Redaction policy:
 * - Provider credentials never reach the log stream
 * - All paths listed in `redact.paths` are replaced with "[REDACTED]"
 */
import pino from "pino";
import { getCurrentContext } from "../core/correlation.js";

export function createLogger(name?: string) {
  const logger = pino({
    name: name ?? "ml-upgrader",
    level: process.env.LOG_LEVEL ?? "info",
    serializers: {
      // Pino only serializes Error objects for the `err` key by default.
      error: pino.stdSerializers.err,
    },
    redact: {
      paths: [
        "apiKey",
        "api_key",
        "token",
        "*.apiKey",
        "*.api_key",
        "*.token",
        "providers.*.api_key",
        "llm.providers.*.api_key",
      ],
      censor: "[REDACTED]",
    },
    mixin() {
      const ctx = getCurrentContext();
      if (ctx) {
        return {
          runId: ctx.runId,
          ...(ctx.file ? { file: ctx.file } : {}),
        };
      }
      return {};
    },
    transport:
      process.env.NODE_ENV !== "production"
        ? { target: "pino-pretty", options: { colorize: true, destination: 2 } }
        : undefined,
  });

  return logger;
}

export type Logger = pino.Logger;
