import type { Logger } from "../utils/logger.js";
import { ProtocolClient, type ConnectionState, type ProtocolClientOptions } from "./protocol/client.js";
import { METHODS, type InitializeResult } from "./protocol/messages.js";
import { SchemaRegistry } from "./schema-registry.js";
import type { LaunchDescriptor, Transport } from "./transport/types.js";

/**
 * One live link to one tool server: the protocol client driving its
 * transport plus the schema registry populated from it.
 */
export class Connection {
  readonly createdAt = Date.now();
  readonly client: ProtocolClient;
  readonly registry: SchemaRegistry;
  private lastUsed = this.createdAt;
  private readonly logger: Logger;

  constructor(
    readonly id: string,
    readonly descriptor: LaunchDescriptor,
    transport: Transport,
    logger: Logger,
    options: ProtocolClientOptions
  ) {
    this.logger = logger.child({ connectionId: id });
    this.client = new ProtocolClient(transport, this.logger, options);
    this.registry = new SchemaRegistry(this.client, this.logger);

    this.client.onNotification(METHODS.toolsChanged, () => {
      this.logger.info("Server tool list changed, dropping cached descriptors");
      this.registry.invalidate();
    });
    this.client.onNotification(METHODS.resourcesChanged, () => {
      this.registry.invalidate();
    });
  }

  get state(): ConnectionState {
    return this.client.state;
  }

  get serverInfo(): InitializeResult | null {
    return this.client.serverInfo;
  }

  get lastUsedAt(): number {
    return this.lastUsed;
  }

  /** Launch the server process and complete the handshake. */
  async open(): Promise<InitializeResult> {
    const result = await this.client.connect(this.descriptor);
    this.touch();
    return result;
  }

  touch(): void {
    this.lastUsed = Date.now();
  }

  isReady(): boolean {
    return this.client.state === "ready";
  }

  close(): Promise<void> {
    return this.client.close();
  }
}
