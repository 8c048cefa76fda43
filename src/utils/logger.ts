/**
 * Structured logging with credential redaction and invocation context.
 *
 * Redaction policy:
 * - Tool arguments and launch environments may carry secrets; credential-shaped
 *   keys under `arguments` and `env` are replaced with "[REDACTED]"
 * - server stderr is only logged at DEBUG
 */
import pino from "pino";
import { getCurrentInvocation } from "../core/correlation.js";

export function createLogger(name?: string) {
  const logger = pino({
    name: name ?? "toolpipe",
    level: process.env.LOG_LEVEL ?? "info",
    serializers: {
      // Pino only serializes Error objects for the `err` key by default.
      error: pino.stdSerializers.err,
    },
    redact: {
      paths: [
        "token",
        "apiKey",
        "password",
        "secret",
        "arguments.token",
        "arguments.apiKey",
        "arguments.password",
        "arguments.secret",
        "env.*",
        "descriptor.env.*",
      ],
      censor: "[REDACTED]",
    },
    mixin() {
      const ctx = getCurrentInvocation();
      if (ctx) {
        return {
          invocationId: ctx.invocationId,
          ...(ctx.connectionId ? { connectionId: ctx.connectionId } : {}),
          ...(ctx.tool ? { tool: ctx.tool } : {}),
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
