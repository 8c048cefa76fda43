export { createToolClient, ToolClient } from "./core/tool-client.js";
export type { BoundTool, OpenTarget, ToolClientDeps, ToolInvokeOptions } from "./core/tool-client.js";
export { ConnectionManager } from "./core/connection-manager.js";
export type {
  CloseAllReport,
  ConnectionManagerOptions,
  ConnectionStatus,
  OpenOptions,
} from "./core/connection-manager.js";
export { Connection } from "./core/connection.js";
export { ProtocolClient } from "./core/protocol/client.js";
export type { CallOptions, ClientInfo, ConnectionState, MethodCaller } from "./core/protocol/client.js";
export { PROTOCOL_VERSION, METHODS } from "./core/protocol/messages.js";
export { SchemaRegistry, parseToolDescriptor, validateArguments } from "./core/schema-registry.js";
export type {
  ParameterSpec,
  ResourceDescriptor,
  ToolDescriptor,
  ValidationMode,
} from "./core/schema-registry.js";
export { InvocationProxy, contentToText, unwrapToolResult } from "./core/invocation-proxy.js";
export type { InvokeOptions, ResourceResult, ToolResult } from "./core/invocation-proxy.js";
export { MiddlewarePipeline } from "./core/middleware/pipeline.js";
export { LoggingInterceptor } from "./core/middleware/logging.js";
export { RetryInterceptor } from "./core/middleware/retry.js";
export type { RetryOptions } from "./core/middleware/retry.js";
export { CacheInterceptor, isReadOnlyToolName } from "./core/middleware/cache.js";
export type { CacheOptions } from "./core/middleware/cache.js";
export { MetricsInterceptor } from "./core/middleware/metrics.js";
export type { ToolMetrics } from "./core/middleware/metrics.js";
export { createMiddlewareContext } from "./core/middleware/types.js";
export type { Interceptor, MiddlewareContext, Next, Terminal } from "./core/middleware/types.js";
export { StdioTransport } from "./core/transport/stdio-transport.js";
export type {
  FramingMode,
  LaunchDescriptor,
  ReceivedFrame,
  Transport,
  TransportFactory,
} from "./core/transport/types.js";
export * from "./core/errors.js";
export { getCurrentInvocation, withInvocationContext } from "./core/correlation.js";
export type { InvocationContext } from "./core/correlation.js";
export { PlainTextFormatter } from "./interfaces/formatter.js";
export type { ResultFormatter } from "./interfaces/formatter.js";
export { loadConfig, parseConfig } from "./utils/config.js";
export type { ClientConfig, ServerConfig } from "./utils/config.js";
export { createLogger } from "./utils/logger.js";
export type { Logger } from "./utils/logger.js";
