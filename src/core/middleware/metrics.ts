import { ToolClientError } from "../errors.js";
import type { ToolResult } from "../invocation-proxy.js";
import type { Interceptor, MiddlewareContext, Next } from "./types.js";

export interface ToolMetrics {
  calls: number;
  successes: number;
  failures: number;
  failuresByKind: Record<string, number>;
  cacheHits: number;
  totalDurationMs: number;
  averageDurationMs: number;
  lastCalledAt: Date | null;
}

/** Per-tool call statistics, counted once per invocation. */
export class MetricsInterceptor implements Interceptor {
  readonly name = "metrics";
  private stats = new Map<string, ToolMetrics>();

  async intercept(ctx: MiddlewareContext, next: Next): Promise<ToolResult> {
    const m = this.getOrCreate(ctx.toolName);
    m.calls++;
    m.lastCalledAt = new Date();
    const started = Date.now();

    try {
      const result = await next();
      m.successes++;
      if (ctx.metadata.cacheHit === true) m.cacheHits++;
      return result;
    } catch (err) {
      m.failures++;
      const kind = err instanceof ToolClientError ? err.kind : "unknown";
      m.failuresByKind[kind] = (m.failuresByKind[kind] ?? 0) + 1;
      throw err;
    } finally {
      m.totalDurationMs += Date.now() - started;
      m.averageDurationMs = m.totalDurationMs / m.calls;
    }
  }

  snapshot(): Record<string, ToolMetrics> {
    const out: Record<string, ToolMetrics> = {};
    for (const [tool, m] of this.stats) {
      out[tool] = { ...m, failuresByKind: { ...m.failuresByKind } };
    }
    return out;
  }

  reset(): void {
    this.stats = new Map();
  }

  private getOrCreate(toolName: string): ToolMetrics {
    let m = this.stats.get(toolName);
    if (!m) {
      m = {
        calls: 0,
        successes: 0,
        failures: 0,
        failuresByKind: {},
        cacheHits: 0,
        totalDurationMs: 0,
        averageDurationMs: 0,
        lastCalledAt: null,
      };
      this.stats.set(toolName, m);
    }
    return m;
  }
}
