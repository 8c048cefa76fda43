import type { ToolResult } from "../invocation-proxy.js";

/**
 * State shared by every interceptor for one invocation, retries included.
 */
export interface MiddlewareContext {
  readonly connectionId: string;
  readonly toolName: string;
  readonly arguments: Record<string, unknown>;
  /** 1-based; the retry interceptor bumps it before each downstream run. */
  attempt: number;
  /** Time spent in the terminal step, summed over attempts. */
  elapsedMs: number;
  result?: ToolResult;
  bypassCache: boolean;
  metadata: Record<string, unknown>;
}

export type Next = () => Promise<ToolResult>;

export type Terminal = (ctx: MiddlewareContext) => Promise<ToolResult>;

export interface Interceptor {
  readonly name: string;
  /** Call `next()` to continue down the chain; it may be called more than once. */
  intercept(ctx: MiddlewareContext, next: Next): Promise<ToolResult>;
}

export function createMiddlewareContext(
  connectionId: string,
  toolName: string,
  args: Record<string, unknown>,
  options: { bypassCache?: boolean } = {}
): MiddlewareContext {
  return {
    connectionId,
    toolName,
    arguments: args,
    attempt: 1,
    elapsedMs: 0,
    bypassCache: options.bypassCache ?? false,
    metadata: {},
  };
}
