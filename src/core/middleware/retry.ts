import { setTimeout as sleep } from "node:timers/promises";
import type { Logger } from "../../utils/logger.js";
import { RetryExhaustedError, isTransientError, messageOf } from "../errors.js";
import type { ToolResult } from "../invocation-proxy.js";
import type { Interceptor, MiddlewareContext, Next } from "./types.js";

export interface RetryOptions {
  /** Total attempts including the first. */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  factor: number;
  /** Source of jitter in [0, 1). */
  random?: () => number;
  delay?: (ms: number) => Promise<unknown>;
  isRetryable?: (err: unknown) => boolean;
}

/**
 * Re-runs the downstream chain on transient failures with exponential
 * backoff. Tool failures and validation errors propagate on the first attempt.
 */
export class RetryInterceptor implements Interceptor {
  readonly name = "retry";
  private readonly logger: Logger;
  private readonly options: Required<RetryOptions>;

  constructor(logger: Logger, options: RetryOptions) {
    this.logger = logger.child({ component: "middleware.retry" });
    this.options = {
      ...options,
      random: options.random ?? Math.random,
      delay: options.delay ?? ((ms) => sleep(ms)),
      isRetryable: options.isRetryable ?? isTransientError,
    };
  }

  async intercept(ctx: MiddlewareContext, next: Next): Promise<ToolResult> {
    const { maxAttempts } = this.options;
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      ctx.attempt = attempt;
      try {
        return await next();
      } catch (err) {
        if (!this.options.isRetryable(err)) throw err;
        lastError = err;
        if (attempt === maxAttempts) break;

        const delayMs = this.backoff(attempt);
        this.logger.debug(
          { tool: ctx.toolName, attempt, nextAttemptInMs: delayMs, error: messageOf(err) },
          "Retrying after transient error"
        );
        await this.options.delay(delayMs);
      }
    }

    throw new RetryExhaustedError(maxAttempts, lastError);
  }

  /** Delay after the given failed attempt: capped exponential, scaled by jitter in [0.5, 1). */
  backoff(attempt: number): number {
    const { baseDelayMs, factor, maxDelayMs, random } = this.options;
    const exponential = Math.min(baseDelayMs * factor ** (attempt - 1), maxDelayMs);
    return Math.round(exponential * (0.5 + random() * 0.5));
  }
}
