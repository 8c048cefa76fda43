import type { Logger } from "../../utils/logger.js";
import {
  ConnectionClosedError,
  ConnectionLostError,
  HandshakeError,
  ProtocolError,
  TimeoutError,
  ToolClientError,
  TransportClosedError,
  messageOf,
} from "../errors.js";
import type { LaunchDescriptor, ReceivedFrame, Transport } from "../transport/types.js";
import {
  METHODS,
  PROTOCOL_VERSION,
  RPC_ERRORS,
  InitializeResultSchema,
  buildError,
  buildNotification,
  buildRequest,
  buildResult,
  classifyMessage,
  type InitializeResult,
  type RequestId,
} from "./messages.js";

/**
 * Connection lifecycle:
 * disconnected → connecting → handshaking → ready → closing → closed
 * Any state may go straight to closed when the transport dies.
 */
export type ConnectionState =
  | "disconnected"
  | "connecting"
  | "handshaking"
  | "ready"
  | "closing"
  | "closed";

export interface ClientInfo {
  name: string;
  version: string;
}

export interface ProtocolClientOptions {
  clientInfo: ClientInfo;
  handshakeTimeoutMs?: number;
  requestTimeoutMs?: number;
}

export interface CallOptions {
  timeoutMs?: number;
}

export type NotificationHandler = (
  params: Record<string, unknown> | undefined
) => void | Promise<void>;

/** Anything that can issue protocol calls; the schema registry and proxy depend on this. */
export interface MethodCaller {
  callMethod(method: string, params?: Record<string, unknown>, options?: CallOptions): Promise<unknown>;
}

const DEFAULT_HANDSHAKE_TIMEOUT_MS = 10_000;
const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

/**
 * One in-flight request. Exactly one of result, error or cancellation is ever
 * delivered; later attempts to settle are ignored.
 */
class PendingRequest {
  readonly submittedAt = Date.now();
  readonly deadline: number;
  private settled = false;
  private timer?: ReturnType<typeof setTimeout>;

  constructor(
    readonly id: number,
    readonly method: string,
    timeoutMs: number,
    private readonly onResolve: (value: unknown) => void,
    private readonly onReject: (err: Error) => void
  ) {
    this.deadline = this.submittedAt + timeoutMs;
  }

  startTimer(timeoutMs: number, onTimeout: () => void): void {
    this.timer = setTimeout(onTimeout, timeoutMs);
  }

  resolve(value: unknown): boolean {
    if (this.settled) return false;
    this.settled = true;
    if (this.timer) clearTimeout(this.timer);
    this.onResolve(value);
    return true;
  }

  reject(err: Error): boolean {
    if (this.settled) return false;
    this.settled = true;
    if (this.timer) clearTimeout(this.timer);
    this.onReject(err);
    return true;
  }
}

/**
 * Protocol semantics over a single Transport: handshake, request id
 * allocation, response correlation and the background reader loop.
 */
export class ProtocolClient implements MethodCaller {
  private currentState: ConnectionState = "disconnected";
  private lastId = 0;
  private readonly pending = new Map<number, PendingRequest>();
  private readonly notificationHandlers = new Map<string, Set<NotificationHandler>>();
  private readonly closeListeners = new Set<(reason: Error | null) => void>();
  private readerDone: Promise<void> = Promise.resolve();
  private closing: Promise<void> | null = null;
  private initializeResult: InitializeResult | null = null;
  private lostError: ConnectionLostError | null = null;

  private readonly clientInfo: ClientInfo;
  private readonly handshakeTimeoutMs: number;
  private readonly requestTimeoutMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly transport: Transport,
    logger: Logger,
    options: ProtocolClientOptions
  ) {
    this.clientInfo = options.clientInfo;
    this.handshakeTimeoutMs = options.handshakeTimeoutMs ?? DEFAULT_HANDSHAKE_TIMEOUT_MS;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.logger = logger.child({ component: "protocol-client" });
  }

  get state(): ConnectionState {
    return this.currentState;
  }

  get serverInfo(): InitializeResult | null {
    return this.initializeResult;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  /** Start the transport and run the handshake. Leaves the client disconnected on failure. */
  async connect(descriptor: LaunchDescriptor): Promise<InitializeResult> {
    if (this.currentState !== "disconnected") {
      throw new ConnectionClosedError(this.currentState);
    }

    this.setState("connecting");
    try {
      await this.transport.open(descriptor);
    } catch (err) {
      await this.transport.close();
      this.setState("disconnected");
      throw err;
    }

    this.readerDone = this.readLoop();
    return this.handshake();
  }

  /**
   * Send `initialize`, validate the server's answer, send the initialized
   * notification and transition to ready.
   */
  async handshake(): Promise<InitializeResult> {
    if (this.currentState !== "connecting") {
      throw new ConnectionClosedError(this.currentState);
    }
    this.setState("handshaking");

    try {
      let raw: unknown;
      try {
        raw = await this.request(
          METHODS.initialize,
          {
            protocolVersion: PROTOCOL_VERSION,
            clientInfo: this.clientInfo,
            capabilities: { roots: { listChanged: true } },
          },
          this.handshakeTimeoutMs
        );
      } catch (err) {
        throw toHandshakeError(err);
      }

      const parsed = InitializeResultSchema.safeParse(raw);
      if (!parsed.success) {
        throw new HandshakeError(
          "malformed",
          parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")
        );
      }

      if (parsed.data.protocolVersion !== PROTOCOL_VERSION) {
        this.logger.info(
          { requested: PROTOCOL_VERSION, negotiated: parsed.data.protocolVersion },
          "Server negotiated a different protocol version"
        );
      }

      try {
        await this.transport.send(JSON.stringify(buildNotification(METHODS.initialized)));
      } catch (err) {
        throw new HandshakeError("connection-lost", messageOf(err), err);
      }

      if (this.lostError) {
        throw new HandshakeError("connection-lost", this.lostError.message, this.lostError);
      }
      if (this.state !== "handshaking") {
        throw new HandshakeError("connection-lost", `Connection entered ${this.state} during handshake`);
      }

      this.initializeResult = parsed.data;
      this.setState("ready");
      this.logger.info(
        { server: parsed.data.serverInfo.name, version: parsed.data.serverInfo.version },
        "Handshake complete"
      );
      return parsed.data;
    } catch (err) {
      await this.abortHandshake();
      throw err instanceof HandshakeError
        ? err
        : new HandshakeError("connection-lost", messageOf(err), err);
    }
  }

  /**
   * Issue a request and wait for its response. Concurrent calls are fine:
   * responses are matched by id, never by arrival order.
   */
  async callMethod(
    method: string,
    params?: Record<string, unknown>,
    options: CallOptions = {}
  ): Promise<unknown> {
    if (this.currentState !== "ready") {
      throw new ConnectionClosedError(this.currentState);
    }
    return this.request(method, params, options.timeoutMs ?? this.requestTimeoutMs);
  }

  async notify(method: string, params?: Record<string, unknown>): Promise<void> {
    if (this.currentState !== "ready") {
      throw new ConnectionClosedError(this.currentState);
    }
    await this.transport.send(JSON.stringify(buildNotification(method, params)));
  }

  async ping(options: CallOptions = {}): Promise<void> {
    await this.callMethod(METHODS.ping, undefined, options);
  }

  /** Register a handler for an unsolicited server notification. Returns an unsubscribe function. */
  onNotification(method: string, handler: NotificationHandler): () => void {
    let handlers = this.notificationHandlers.get(method);
    if (!handlers) {
      handlers = new Set();
      this.notificationHandlers.set(method, handlers);
    }
    handlers.add(handler);
    return () => {
      handlers?.delete(handler);
    };
  }

  /** Called once when the client reaches `closed`; `reason` is null for a client-initiated close. */
  onClose(listener: (reason: Error | null) => void): () => void {
    this.closeListeners.add(listener);
    return () => {
      this.closeListeners.delete(listener);
    };
  }

  /** Fail every pending request, stop the transport and wait for the reader loop. Idempotent. */
  close(): Promise<void> {
    if (this.currentState === "disconnected" || this.currentState === "closed") {
      return this.transport.close();
    }
    if (!this.closing) {
      this.closing = this.shutdown();
    }
    return this.closing;
  }

  private async shutdown(): Promise<void> {
    this.setState("closing");
    this.failPending(new ConnectionLostError("Connection closed by client"));
    await this.transport.close();
    await this.readerDone;
    this.setState("closed");
  }

  private request(method: string, params: Record<string, unknown> | undefined, timeoutMs: number): Promise<unknown> {
    const id = ++this.lastId;
    const frame = JSON.stringify(buildRequest(id, method, params));

    return new Promise<unknown>((resolve, reject) => {
      const pending = new PendingRequest(id, method, timeoutMs, resolve, reject);
      this.pending.set(id, pending);

      pending.startTimer(timeoutMs, () => {
        this.pending.delete(id);
        pending.reject(new TimeoutError(method, timeoutMs));
      });

      this.transport.send(frame).catch((err: unknown) => {
        this.pending.delete(id);
        pending.reject(
          err instanceof ToolClientError ? err : new TransportClosedError(`Write failed: ${messageOf(err)}`, err)
        );
      });
    });
  }

  private async readLoop(): Promise<void> {
    for (;;) {
      let frame: ReceivedFrame;
      try {
        frame = await this.transport.receive();
      } catch (err) {
        this.handleTransportFailure(new ConnectionLostError(`Inbound stream failed: ${messageOf(err)}`, err));
        return;
      }

      if (frame.type === "eof") {
        this.handleTransportFailure(
          new ConnectionLostError(
            `Server exited (code ${frame.exitCode ?? "none"}, signal ${frame.signal ?? "none"})`
          )
        );
        return;
      }

      try {
        this.dispatch(frame.payload);
      } catch (err) {
        this.logger.error({ error: err }, "Failed to dispatch inbound message");
      }
    }
  }

  private dispatch(payload: string): void {
    let raw: unknown;
    try {
      raw = JSON.parse(payload);
    } catch (err) {
      this.logger.warn({ error: err, bytes: payload.length }, "Dropping undecodable frame");
      return;
    }

    const message = classifyMessage(raw);
    switch (message.kind) {
      case "result": {
        const pending = this.takePending(message.id);
        if (pending) pending.resolve(message.result);
        return;
      }

      case "error": {
        if (message.id === null) {
          this.logger.warn({ error: message.error }, "Server reported an error without a request id");
          return;
        }
        const pending = this.takePending(message.id);
        if (pending) {
          pending.reject(
            new ProtocolError(pending.method, message.error.code, message.error.message, message.error.data)
          );
        }
        return;
      }

      case "notification":
        this.handleNotification(message.method, message.params);
        return;

      case "request":
        this.answerServerRequest(message.id, message.method);
        return;

      case "invalid":
        this.logger.warn({ reason: message.reason }, "Dropping invalid message");
        return;
    }
  }

  private takePending(id: RequestId): PendingRequest | undefined {
    const key = typeof id === "number" ? id : /^\d+$/.test(id) ? Number(id) : NaN;
    const pending = this.pending.get(key);
    if (!pending) {
      // Late reply to a timed-out call, or an id we never issued.
      this.logger.debug({ id }, "Dropping response for unknown request id");
      return undefined;
    }
    this.pending.delete(key);
    return pending;
  }

  private handleNotification(method: string, params: Record<string, unknown> | undefined): void {
    const handlers = this.notificationHandlers.get(method);
    if (!handlers || handlers.size === 0) {
      this.logger.debug({ method }, "Ignoring notification without handler");
      return;
    }

    for (const handler of handlers) {
      try {
        const outcome = handler(params);
        if (outcome instanceof Promise) {
          outcome.catch((err: unknown) => {
            this.logger.error({ method, error: err }, "Notification handler failed");
          });
        }
      } catch (err) {
        this.logger.error({ method, error: err }, "Notification handler failed");
      }
    }
  }

  private answerServerRequest(id: RequestId, method: string): void {
    const reply =
      method === METHODS.ping
        ? buildResult(id, {})
        : buildError(id, RPC_ERRORS.methodNotFound, `Method not supported by client: ${method}`);

    this.transport.send(JSON.stringify(reply)).catch((err: unknown) => {
      this.logger.debug({ method, error: err }, "Could not answer server request");
    });
  }

  private handleTransportFailure(err: ConnectionLostError): void {
    this.lostError ??= err;
    const failed = this.failPending(err);

    if (this.currentState === "ready") {
      this.logger.warn({ error: err, failedRequests: failed }, "Connection lost");
      this.setState("closed", err);
      this.transport.close().catch((closeErr: unknown) => {
        this.logger.error({ error: closeErr }, "Failed to release transport after connection loss");
      });
    }
  }

  private async abortHandshake(): Promise<void> {
    this.failPending(new ConnectionLostError("Handshake aborted"));
    await this.transport.close();
    await this.readerDone;
    if (this.currentState === "connecting" || this.currentState === "handshaking") {
      this.setState("disconnected");
    }
  }

  private failPending(err: Error): number {
    const pending = [...this.pending.values()];
    this.pending.clear();
    for (const request of pending) request.reject(err);
    return pending.length;
  }

  private setState(next: ConnectionState, reason: Error | null = null): void {
    if (this.currentState === next) return;
    this.logger.debug({ from: this.currentState, to: next }, "Connection state change");
    this.currentState = next;

    if (next === "closed") {
      const listeners = [...this.closeListeners];
      this.closeListeners.clear();
      for (const listener of listeners) {
        try {
          listener(reason);
        } catch (err) {
          this.logger.error({ error: err }, "Close listener failed");
        }
      }
    }
  }
}

function toHandshakeError(err: unknown): HandshakeError {
  if (err instanceof TimeoutError) {
    return new HandshakeError("timeout", err.message, err);
  }
  if (err instanceof ProtocolError) {
    return new HandshakeError("rejected", err.message, err);
  }
  if (err instanceof HandshakeError) {
    return err;
  }
  return new HandshakeError("connection-lost", messageOf(err), err);
}
