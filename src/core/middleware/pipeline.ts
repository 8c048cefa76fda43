import { ConfigError } from "../errors.js";
import type { ToolResult } from "../invocation-proxy.js";
import type { Interceptor, MiddlewareContext, Terminal } from "./types.js";

/**
 * Ordered chain of interceptors around a terminal call.
 * The first interceptor added is the outermost.
 */
export class MiddlewarePipeline {
  private interceptors: Interceptor[] = [];

  use(interceptor: Interceptor): this {
    if (this.interceptors.some((i) => i.name === interceptor.name)) {
      throw new ConfigError(`Interceptor "${interceptor.name}" is already registered`);
    }
    this.interceptors.push(interceptor);
    return this;
  }

  remove(name: string): boolean {
    const before = this.interceptors.length;
    this.interceptors = this.interceptors.filter((i) => i.name !== name);
    return this.interceptors.length !== before;
  }

  names(): string[] {
    return this.interceptors.map((i) => i.name);
  }

  async execute(ctx: MiddlewareContext, terminal: Terminal): Promise<ToolResult> {
    // use()/remove() during a run do not affect it.
    const chain = [...this.interceptors];

    const runTerminal = async (): Promise<ToolResult> => {
      const started = Date.now();
      try {
        const result = await terminal(ctx);
        ctx.result = result;
        return result;
      } finally {
        ctx.elapsedMs += Date.now() - started;
      }
    };

    const run = (index: number): Promise<ToolResult> => {
      const interceptor = chain[index];
      if (!interceptor) return runTerminal();
      return interceptor.intercept(ctx, () => run(index + 1));
    };

    const result = await run(0);
    ctx.result = result;
    return result;
  }
}
