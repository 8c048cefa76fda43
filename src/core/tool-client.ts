import type { ClientConfig, InterceptorName } from "../utils/config.js";
import type { Logger } from "../utils/logger.js";
import type { Connection } from "./connection.js";
import { ConnectionManager, type CloseAllReport, type ConnectionStatus } from "./connection-manager.js";
import { createInvocationId, withInvocationContext } from "./correlation.js";
import { ConfigError } from "./errors.js";
import { InvocationProxy, type ResourceResult, type ToolResult } from "./invocation-proxy.js";
import { CacheInterceptor, isReadOnlyToolName } from "./middleware/cache.js";
import { LoggingInterceptor } from "./middleware/logging.js";
import { MetricsInterceptor, type ToolMetrics } from "./middleware/metrics.js";
import { MiddlewarePipeline } from "./middleware/pipeline.js";
import { RetryInterceptor } from "./middleware/retry.js";
import { createMiddlewareContext, type Interceptor, type MiddlewareContext } from "./middleware/types.js";
import type { ResourceDescriptor, ToolDescriptor } from "./schema-registry.js";
import type { FramingMode, LaunchDescriptor, TransportFactory } from "./transport/types.js";

export interface ToolClientDeps {
  transportFactory?: TransportFactory;
  /** Replaces the retry interceptor's sleep; tests pass an immediate one. */
  retryDelay?: (ms: number) => Promise<unknown>;
}

export type OpenTarget = string | (LaunchDescriptor & { framing?: FramingMode });

export interface ToolInvokeOptions {
  bypassCache?: boolean;
  timeoutMs?: number;
}

export type BoundTool = (args?: Record<string, unknown>, options?: ToolInvokeOptions) => Promise<ToolResult>;

/**
 * Front door of the library: opens servers by name or descriptor and runs
 * every invocation through the configured middleware.
 */
export class ToolClient {
  readonly manager: ConnectionManager;
  readonly pipeline = new MiddlewarePipeline();
  private readonly proxy: InvocationProxy;
  private readonly cache?: CacheInterceptor;
  private readonly metricsInterceptor?: MetricsInterceptor;
  private readonly logger: Logger;

  constructor(
    private readonly config: ClientConfig,
    logger: Logger,
    deps: ToolClientDeps = {}
  ) {
    this.logger = logger.child({ component: "tool-client" });
    this.manager = new ConnectionManager(logger, {
      clientInfo: config.client,
      handshakeTimeoutMs: config.timeouts.handshake_ms,
      requestTimeoutMs: config.timeouts.request_ms,
      closeGraceMs: config.timeouts.close_grace_ms,
      transportFactory: deps.transportFactory,
    });
    this.proxy = new InvocationProxy(logger, { validation: config.validation });

    const mw = config.middleware;
    if (mw.cache.enabled) {
      this.cache = new CacheInterceptor({
        ttlMs: mw.cache.ttl_ms,
        maxEntries: mw.cache.max_entries,
        shouldCache: mw.cache.read_only_only ? isReadOnlyToolName : undefined,
      });
    }
    if (mw.metrics.enabled) {
      this.metricsInterceptor = new MetricsInterceptor();
    }

    const build: Record<InterceptorName, () => Interceptor | undefined> = {
      metrics: () => this.metricsInterceptor,
      logging: () => (mw.logging.enabled ? new LoggingInterceptor(logger, { level: mw.logging.level }) : undefined),
      retry: () =>
        mw.retry.enabled
          ? new RetryInterceptor(logger, {
              maxAttempts: mw.retry.max_attempts,
              baseDelayMs: mw.retry.base_delay_ms,
              maxDelayMs: mw.retry.max_delay_ms,
              factor: mw.retry.factor,
              delay: deps.retryDelay,
            })
          : undefined,
      cache: () => this.cache,
    };

    for (const name of new Set(mw.order)) {
      const interceptor = build[name]();
      if (interceptor) this.pipeline.use(interceptor);
    }
  }

  /** Open a configured server by name, or any descriptor. Returns the connection handle. */
  open(target: OpenTarget): Promise<string> {
    if (typeof target !== "string") {
      const { framing, ...descriptor } = target;
      return this.manager.open(descriptor, { framing });
    }

    const server = this.config.servers[target];
    if (!server) {
      return Promise.reject(new ConfigError(`Unknown server "${target}"`));
    }
    if (!server.enabled) {
      return Promise.reject(new ConfigError(`Server "${target}" is disabled`));
    }
    return this.manager.open(
      { command: server.command, args: server.args, cwd: server.cwd, env: server.env },
      { framing: server.framing, name: target }
    );
  }

  invoke(
    handle: string,
    toolName: string,
    args: Record<string, unknown> = {},
    options: ToolInvokeOptions = {}
  ): Promise<ToolResult> {
    const ctx = createMiddlewareContext(handle, toolName, args, { bypassCache: options.bypassCache });

    return withInvocationContext(
      { invocationId: createInvocationId(), connectionId: handle, tool: toolName },
      () =>
        this.pipeline.execute(ctx, async (current: MiddlewareContext) => {
          const connection = await this.liveConnection(current.connectionId);
          return this.proxy.invoke(connection, current.toolName, current.arguments, {
            timeoutMs: options.timeoutMs,
          });
        })
    );
  }

  /** A callable bound to one tool on one connection. */
  tool(handle: string, name: string): BoundTool {
    return (args = {}, options = {}) => this.invoke(handle, name, args, options);
  }

  async listTools(handle: string, options: { refresh?: boolean } = {}): Promise<ToolDescriptor[]> {
    const { registry } = await this.liveConnection(handle);
    if (options.refresh || !registry.hasDiscoveredTools()) {
      return registry.discoverTools();
    }
    return registry.listTools();
  }

  async listResources(handle: string, options: { refresh?: boolean } = {}): Promise<ResourceDescriptor[]> {
    const { registry } = await this.liveConnection(handle);
    if (options.refresh || !registry.hasDiscoveredResources()) {
      return registry.discoverResources();
    }
    return registry.listResources();
  }

  async readResource(handle: string, uri: string, options: { timeoutMs?: number } = {}): Promise<ResourceResult> {
    const connection = await this.liveConnection(handle);
    return this.proxy.readResource(connection, uri, options);
  }

  async ping(handle: string): Promise<void> {
    const connection = await this.liveConnection(handle);
    await connection.client.ping();
    connection.touch();
  }

  close(handle: string): Promise<void> {
    this.cache?.invalidate(handle);
    return this.manager.close(handle);
  }

  status(): ConnectionStatus[] {
    return this.manager.list();
  }

  metrics(): Record<string, ToolMetrics> {
    return this.metricsInterceptor?.snapshot() ?? {};
  }

  /** Drop cached results for a connection, one of its tools, or everything. */
  invalidateCache(handle?: string, toolName?: string): number {
    return this.cache?.invalidate(handle, toolName) ?? 0;
  }

  async shutdown(): Promise<CloseAllReport> {
    const report = await this.manager.closeAll();
    this.cache?.clear();
    this.logger.info({ closed: report.closed.length, failures: report.failures.length }, "Tool client shut down");
    return report;
  }

  /** The connection behind `handle`, relaunched first if it was lost and reconnects are on. */
  private async liveConnection(handle: string): Promise<Connection> {
    const connection = this.manager.get(handle);
    if (connection.state === "closed" && this.config.reconnect_on_lost) {
      this.logger.warn({ connectionId: handle }, "Connection was lost, relaunching server");
      return this.manager.reconnect(handle);
    }
    return connection;
  }
}

export function createToolClient(config: ClientConfig, logger: Logger, deps: ToolClientDeps = {}): ToolClient {
  return new ToolClient(config, logger, deps);
}
