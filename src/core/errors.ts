/**
 * Typed error taxonomy for the tool client.
 *
 * Every error carries a `kind` discriminant for formatters and a `transient`
 * flag the retry interceptor uses to decide whether another attempt may help.
 */

export type ErrorKind =
  | "launch"
  | "handshake"
  | "transport_closed"
  | "connection_lost"
  | "connection_closed"
  | "timeout"
  | "framing"
  | "protocol"
  | "discovery"
  | "missing_parameter"
  | "invalid_parameter"
  | "tool_not_found"
  | "tool_execution"
  | "retry_exhausted"
  | "unknown_connection"
  | "config";

export class ToolClientError extends Error {
  readonly kind: ErrorKind;
  readonly transient: boolean;
  readonly details?: Record<string, unknown>;

  constructor(
    kind: ErrorKind,
    message: string,
    options: { transient?: boolean; details?: Record<string, unknown>; cause?: unknown } = {}
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.kind = kind;
    this.transient = options.transient ?? false;
    this.details = options.details;
  }
}

/** The server executable could not be started. */
export class LaunchError extends ToolClientError {
  readonly command: string;
  readonly code?: string;

  constructor(command: string, cause: unknown) {
    const code = errnoCode(cause);
    super("launch", `Failed to launch "${command}": ${messageOf(cause)}`, {
      cause,
      details: code ? { code } : undefined,
    });
    this.command = command;
    this.code = code;
  }
}

export type HandshakeFailure = "timeout" | "malformed" | "rejected" | "connection-lost";

export class HandshakeError extends ToolClientError {
  readonly reason: HandshakeFailure;

  constructor(reason: HandshakeFailure, message: string, cause?: unknown) {
    super("handshake", `Handshake failed (${reason}): ${message}`, { cause, details: { reason } });
    this.reason = reason;
  }
}

/** Write attempted after the process exited or its stdin closed. */
export class TransportClosedError extends ToolClientError {
  constructor(message = "Transport is closed", cause?: unknown) {
    super("transport_closed", message, { transient: true, cause });
  }
}

/** The connection died while requests were outstanding. */
export class ConnectionLostError extends ToolClientError {
  constructor(message = "Connection lost", cause?: unknown) {
    super("connection_lost", message, { transient: true, cause });
  }
}

/** A call was made on a connection that is not (or no longer) ready. */
export class ConnectionClosedError extends ToolClientError {
  readonly state: string;

  constructor(state: string) {
    super("connection_closed", `Connection is not ready (state: ${state})`, { details: { state } });
    this.state = state;
  }
}

export class TimeoutError extends ToolClientError {
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super("timeout", `${operation} timed out after ${timeoutMs}ms`, {
      transient: true,
      details: { timeoutMs },
    });
    this.timeoutMs = timeoutMs;
  }
}

/** The inbound byte stream can no longer be split into messages. */
export class FramingError extends ToolClientError {
  constructor(message: string) {
    super("framing", message);
  }
}

/** JSON-RPC level error returned by the server. */
export class ProtocolError extends ToolClientError {
  readonly method: string;
  readonly code: number;
  readonly serverMessage: string;
  readonly data?: unknown;

  constructor(method: string, code: number, message: string, data?: unknown) {
    super("protocol", `${method} failed (${code}): ${message}`, { details: { code, data } });
    this.method = method;
    this.code = code;
    this.serverMessage = message;
    this.data = data;
  }
}

export class DiscoveryError extends ToolClientError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("discovery", message, { details });
  }
}

export class MissingParameterError extends ToolClientError {
  readonly toolName: string;
  readonly parameter: string;

  constructor(toolName: string, parameter: string) {
    super("missing_parameter", `Tool "${toolName}" requires parameter "${parameter}"`, {
      details: { toolName, parameter },
    });
    this.toolName = toolName;
    this.parameter = parameter;
  }
}

export class InvalidParameterError extends ToolClientError {
  readonly toolName: string;
  readonly problems: string[];

  constructor(toolName: string, problems: string[]) {
    super("invalid_parameter", `Invalid arguments for "${toolName}": ${problems.join("; ")}`, {
      details: { toolName, problems },
    });
    this.toolName = toolName;
    this.problems = problems;
  }
}

export class ToolNotFoundError extends ToolClientError {
  readonly toolName: string;

  constructor(toolName: string, connectionId: string) {
    super("tool_not_found", `Tool "${toolName}" is not exposed by connection ${connectionId}`, {
      details: { toolName, connectionId },
    });
    this.toolName = toolName;
  }
}

/** The server ran the tool and the tool itself failed. Deterministic; never retried. */
export class ToolExecutionError extends ToolClientError {
  readonly toolName: string;
  readonly code?: number | string;
  readonly payload?: unknown;

  constructor(toolName: string, serverMessage: string, code?: number | string, payload?: unknown) {
    super("tool_execution", serverMessage, { details: { toolName, code, payload } });
    this.toolName = toolName;
    this.code = code;
    this.payload = payload;
  }
}

export class RetryExhaustedError extends ToolClientError {
  readonly attempts: number;

  constructor(attempts: number, lastError: unknown) {
    super("retry_exhausted", `Gave up after ${attempts} attempts: ${messageOf(lastError)}`, {
      cause: lastError,
      details: { attempts },
    });
    this.attempts = attempts;
  }
}

export class UnknownConnectionError extends ToolClientError {
  constructor(handle: string) {
    super("unknown_connection", `No connection registered under "${handle}"`, { details: { handle } });
  }
}

export class ConfigError extends ToolClientError {
  constructor(message: string, issues: string[] = []) {
    super("config", issues.length > 0 ? `${message}: ${issues.join("; ")}` : message, {
      details: { issues },
    });
  }
}

export function isTransientError(err: unknown): boolean {
  return err instanceof ToolClientError && err.transient;
}

export function messageOf(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}
