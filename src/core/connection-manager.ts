import type { Logger } from "../utils/logger.js";
import { generateConnectionId } from "../utils/id.js";
import { Connection } from "./connection.js";
import { ConnectionClosedError, UnknownConnectionError, messageOf } from "./errors.js";
import type { ClientInfo, ConnectionState } from "./protocol/client.js";
import { StdioTransport } from "./transport/stdio-transport.js";
import {
  descriptorKey,
  type FramingMode,
  type LaunchDescriptor,
  type TransportFactory,
} from "./transport/types.js";

export interface ConnectionManagerOptions {
  clientInfo: ClientInfo;
  handshakeTimeoutMs?: number;
  requestTimeoutMs?: number;
  closeGraceMs?: number;
  /** Defaults to a StdioTransport per connection. */
  transportFactory?: TransportFactory;
}

export interface OpenOptions {
  framing?: FramingMode;
  /** Configured server name, shown in status rows. */
  name?: string;
}

export interface ConnectionStatus {
  id: string;
  name: string | null;
  command: string;
  state: ConnectionState;
  serverName: string | null;
  toolCount: number;
  createdAt: Date;
  idleMs: number;
}

export interface CloseAllReport {
  closed: string[];
  failures: Array<{ id: string; error: string }>;
}

interface ManagedConnection {
  connection: Connection;
  options: OpenOptions;
}

/**
 * Owns every live connection: opening, lookup by handle, reconnection and
 * orderly shutdown.
 */
export class ConnectionManager {
  private connections = new Map<string, ManagedConnection>();
  // Tail of the open queue per descriptor; opens for the same server run one at a time.
  private openQueues = new Map<string, Promise<void>>();
  private inflightOpens = new Set<Promise<unknown>>();
  // In-flight reconnects, so concurrent callers that find a lost connection share one.
  private reconnectPromises = new Map<string, Promise<Connection>>();
  private shuttingDown = false;

  private readonly logger: Logger;
  private readonly transportFactory: TransportFactory;

  constructor(
    logger: Logger,
    private readonly options: ConnectionManagerOptions
  ) {
    this.logger = logger.child({ component: "connection-manager" });
    this.transportFactory =
      options.transportFactory ??
      ((framing) => new StdioTransport(logger, { framing, closeGraceMs: options.closeGraceMs }));
  }

  /**
   * Launch a server and complete the handshake. Returns the new handle.
   * Nothing is registered if any step fails.
   */
  open(descriptor: LaunchDescriptor, options: OpenOptions = {}): Promise<string> {
    return this.track(
      this.serialized(descriptorKey(descriptor), async () => {
        const id = generateConnectionId();
        const connection = await this.start(id, descriptor, options);
        this.connections.set(id, { connection, options });
        return id;
      })
    );
  }

  get(handle: string): Connection {
    return this.entry(handle).connection;
  }

  has(handle: string): boolean {
    return this.connections.has(handle);
  }

  get size(): number {
    return this.connections.size;
  }

  list(): ConnectionStatus[] {
    return [...this.connections.keys()].map((id) => this.status(id));
  }

  status(handle: string): ConnectionStatus {
    const { connection, options } = this.entry(handle);
    return {
      id: connection.id,
      name: options.name ?? null,
      command: connection.descriptor.command,
      state: connection.state,
      serverName: connection.serverInfo?.serverInfo.name ?? null,
      toolCount: connection.registry.listTools().length,
      createdAt: new Date(connection.createdAt),
      idleMs: Date.now() - connection.lastUsedAt,
    };
  }

  /**
   * Replace the connection behind `handle` with a freshly launched one.
   * The handle stays valid; the new connection starts with an empty schema registry.
   */
  reconnect(handle: string): Promise<Connection> {
    const inflight = this.reconnectPromises.get(handle);
    if (inflight) return inflight;

    const promise = this.doReconnect(handle).finally(() => {
      this.reconnectPromises.delete(handle);
    });
    this.reconnectPromises.set(handle, promise);
    return promise;
  }

  async close(handle: string): Promise<void> {
    const { connection } = this.entry(handle);
    this.connections.delete(handle);
    await connection.close();
    this.logger.info({ connectionId: handle }, "Connection closed");
  }

  /**
   * Close everything, best-effort. Waits for opens already under way, then
   * refuses new ones. Never throws; failures are reported.
   */
  async closeAll(): Promise<CloseAllReport> {
    this.shuttingDown = true;
    this.logger.info("Shutting down connection manager");

    await Promise.allSettled([...this.inflightOpens, ...this.reconnectPromises.values()]);

    const entries = [...this.connections.entries()];
    this.connections.clear();

    const outcomes = await Promise.allSettled(entries.map(([, { connection }]) => connection.close()));

    const report: CloseAllReport = { closed: [], failures: [] };
    outcomes.forEach((outcome, index) => {
      const entry = entries[index];
      if (!entry) return;
      const [id] = entry;
      if (outcome.status === "fulfilled") {
        report.closed.push(id);
      } else {
        this.logger.error({ connectionId: id, error: outcome.reason }, "Failed to close connection during shutdown");
        report.failures.push({ id, error: messageOf(outcome.reason) });
      }
    });

    return report;
  }

  private async doReconnect(handle: string): Promise<Connection> {
    const current = this.entry(handle);
    const { descriptor } = current.connection;

    return this.track(
      this.serialized(descriptorKey(descriptor), async () => {
        await current.connection.close();
        this.logger.info({ connectionId: handle, command: descriptor.command }, "Reconnecting");

        const connection = await this.start(handle, descriptor, current.options);
        if (this.connections.get(handle) !== current) {
          // Closed by the caller while we were relaunching.
          await connection.close();
          throw new UnknownConnectionError(handle);
        }
        this.connections.set(handle, { connection, options: current.options });
        return connection;
      })
    );
  }

  private async start(id: string, descriptor: LaunchDescriptor, options: OpenOptions): Promise<Connection> {
    const connection = new Connection(id, descriptor, this.transportFactory(options.framing ?? "newline"), this.logger, {
      clientInfo: this.options.clientInfo,
      handshakeTimeoutMs: this.options.handshakeTimeoutMs,
      requestTimeoutMs: this.options.requestTimeoutMs,
    });

    try {
      const init = await connection.open();
      this.logger.info(
        { connectionId: id, command: descriptor.command, server: init.serverInfo.name },
        "Connection ready"
      );
      return connection;
    } catch (err) {
      this.logger.error({ connectionId: id, command: descriptor.command, error: err }, "Failed to open connection");
      try {
        await connection.close();
      } catch (closeErr) {
        this.logger.error({ connectionId: id, error: closeErr }, "Failed to clean up after open failure");
      }
      throw err;
    }
  }

  /** Run `fn` after every earlier task queued under `key` has settled. */
  private async serialized<T>(key: string, fn: () => Promise<T>): Promise<T> {
    if (this.shuttingDown) {
      throw new ConnectionClosedError("shutting-down");
    }

    const previous = this.openQueues.get(key) ?? Promise.resolve();
    const run = previous.then(() => {
      if (this.shuttingDown) throw new ConnectionClosedError("shutting-down");
      return fn();
    });
    // The queue only orders tasks; each task's own outcome goes back through `run`.
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.openQueues.set(key, tail);

    try {
      return await run;
    } finally {
      if (this.openQueues.get(key) === tail) {
        this.openQueues.delete(key);
      }
    }
  }

  private track<T>(promise: Promise<T>): Promise<T> {
    this.inflightOpens.add(promise);
    const untrack = () => {
      this.inflightOpens.delete(promise);
    };
    promise.then(untrack, untrack);
    return promise;
  }

  private entry(handle: string): ManagedConnection {
    const entry = this.connections.get(handle);
    if (!entry) {
      throw new UnknownConnectionError(handle);
    }
    return entry;
  }
}
