import type { Logger } from "../../utils/logger.js";
import { ToolClientError } from "../errors.js";
import type { ToolResult } from "../invocation-proxy.js";
import type { Interceptor, MiddlewareContext, Next } from "./types.js";

export interface LoggingInterceptorOptions {
  /** Level for start/success lines. Failures always log at warn. */
  level?: "debug" | "info";
}

export class LoggingInterceptor implements Interceptor {
  readonly name = "logging";
  private readonly logger: Logger;
  private readonly level: "debug" | "info";

  constructor(logger: Logger, options: LoggingInterceptorOptions = {}) {
    this.logger = logger.child({ component: "middleware.logging" });
    this.level = options.level ?? "info";
  }

  async intercept(ctx: MiddlewareContext, next: Next): Promise<ToolResult> {
    const base = { connectionId: ctx.connectionId, tool: ctx.toolName };
    this.logger[this.level]({ ...base, arguments: ctx.arguments }, "Tool invocation started");

    const started = Date.now();
    try {
      const result = await next();
      this.logger[this.level](
        {
          ...base,
          durationMs: Date.now() - started,
          attempts: ctx.attempt,
          cacheHit: ctx.metadata.cacheHit === true,
        },
        "Tool invocation succeeded"
      );
      return result;
    } catch (err) {
      this.logger.warn(
        {
          ...base,
          durationMs: Date.now() - started,
          attempts: ctx.attempt,
          kind: err instanceof ToolClientError ? err.kind : "unknown",
          error: err,
        },
        "Tool invocation failed"
      );
      throw err;
    }
  }
}
