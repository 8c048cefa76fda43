import { describe, it, expect, vi, beforeEach } from "vitest";
import { ProtocolClient } from "../../../../src/core/protocol/client.js";
import {
  ConnectionClosedError,
  ConnectionLostError,
  HandshakeError,
  ProtocolError,
  TimeoutError,
} from "../../../../src/core/errors.js";
import { PROTOCOL_VERSION } from "../../../../src/core/protocol/messages.js";
import { FakeTransport, NO_REPLY, RpcFailure, createMockLogger, flush } from "../../../helpers/mocks.js";

const descriptor = { command: "fake-server" };

/** Goes away right after the client sends its initialized notification. */
class EndsAfterInitializedTransport extends FakeTransport {
  override async send(message: string): Promise<void> {
    await super.send(message);
    if (message.includes('"notifications/initialized"')) {
      this.end();
      await flush();
    }
  }
}
const clientInfo = { name: "toolpipe-test", version: "0.0.1" };

function createClient(transport: FakeTransport, options: { handshakeTimeoutMs?: number; requestTimeoutMs?: number } = {}) {
  return new ProtocolClient(transport, createMockLogger(), { clientInfo, ...options });
}

describe("ProtocolClient", () => {
  let transport: FakeTransport;

  beforeEach(() => {
    transport = new FakeTransport({ "tools/call": () => NO_REPLY });
  });

  describe("connect", () => {
    it("runs the handshake and becomes ready", async () => {
      const client = createClient(transport);

      const init = await client.connect(descriptor);

      expect(client.state).toBe("ready");
      expect(init.serverInfo.name).toBe("fake-server");
      expect(transport.opened).toEqual(descriptor);
      expect(transport.sent[0]).toEqual({
        jsonrpc: "2.0",
        id: 1,
        method: "initialize",
        params: {
          protocolVersion: PROTOCOL_VERSION,
          clientInfo,
          capabilities: { roots: { listChanged: true } },
        },
      });
      expect(transport.sent[1]).toEqual({ jsonrpc: "2.0", method: "notifications/initialized" });
    });

    it("accepts a server that negotiates another protocol version", async () => {
      transport.handlers.initialize = () => ({
        protocolVersion: "2025-03-26",
        serverInfo: { name: "newer" },
      });
      const client = createClient(transport);

      const init = await client.connect(descriptor);

      expect(init.protocolVersion).toBe("2025-03-26");
      expect(init.serverInfo.version).toBe("unknown");
      expect(client.state).toBe("ready");
    });

    it("reports a rejected handshake and ends disconnected", async () => {
      transport.handlers.initialize = () => new RpcFailure(-32602, "unsupported version");
      const client = createClient(transport);

      const err = await client.connect(descriptor).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(HandshakeError);
      expect(err).toMatchObject({ reason: "rejected" });
      expect(client.state).toBe("disconnected");
      expect(transport.closeCalls).toBeGreaterThan(0);
    });

    it("reports a malformed initialize result", async () => {
      transport.handlers.initialize = () => ({ hello: "world" });
      const client = createClient(transport);

      await expect(client.connect(descriptor)).rejects.toMatchObject({ reason: "malformed" });
      expect(client.state).toBe("disconnected");
    });

    it("times out a server that never answers initialize", async () => {
      transport.handlers.initialize = () => NO_REPLY;
      const client = createClient(transport, { handshakeTimeoutMs: 20 });

      await expect(client.connect(descriptor)).rejects.toThrow(
        "Handshake failed (timeout): initialize timed out after 20ms"
      );
      expect(client.pendingCount).toBe(0);
    });

    it("fails the handshake when the server goes away before it completes", async () => {
      const dropping = new EndsAfterInitializedTransport();
      const client = createClient(dropping);

      const err = await client.connect(descriptor).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(HandshakeError);
      expect(err).toMatchObject({ reason: "connection-lost" });
      expect(client.state).toBe("disconnected");
      await expect(client.callMethod("tools/list")).rejects.toBeInstanceOf(ConnectionClosedError);
    });

    it("propagates launch failures and stays disconnected", async () => {
      transport.openError = new Error("spawn ENOENT");
      const client = createClient(transport);

      await expect(client.connect(descriptor)).rejects.toThrow("spawn ENOENT");
      expect(client.state).toBe("disconnected");
    });

    it("refuses to connect twice", async () => {
      const client = createClient(transport);
      await client.connect(descriptor);

      await expect(client.connect(descriptor)).rejects.toBeInstanceOf(ConnectionClosedError);
    });
  });

  describe("callMethod", () => {
    it("refuses calls before the handshake", async () => {
      const client = createClient(transport);
      await expect(client.callMethod("tools/list")).rejects.toThrow("Connection is not ready (state: disconnected)");
      expect(transport.sent).toHaveLength(0);
    });

    it("matches responses by id when they arrive out of order", async () => {
      const client = createClient(transport);
      await client.connect(descriptor);

      const first = client.callMethod("tools/call", { name: "a" });
      const second = client.callMethod("tools/call", { name: "b" });
      const third = client.callMethod("tools/call", { name: "c" });

      const ids = transport.requests("tools/call").map((m) => m.id);
      expect(ids).toEqual([2, 3, 4]);

      transport.push({ jsonrpc: "2.0", id: 4, result: "c" });
      transport.push({ jsonrpc: "2.0", id: 2, result: "a" });
      transport.push({ jsonrpc: "2.0", id: 3, result: "b" });

      await expect(Promise.all([first, second, third])).resolves.toEqual(["a", "b", "c"]);
      expect(client.pendingCount).toBe(0);
    });

    it("never reuses a request id", async () => {
      transport.handlers["tools/call"] = () => ({ content: [] });
      const client = createClient(transport);
      await client.connect(descriptor);

      for (let i = 0; i < 5; i++) {
        await client.callMethod("tools/call", {});
      }

      const ids = transport.requests().map((m) => m.id);
      expect(new Set(ids).size).toBe(ids.length);
    });

    it("accepts a numeric string id in the response", async () => {
      const client = createClient(transport);
      await client.connect(descriptor);

      const call = client.callMethod("tools/call", {});
      transport.push({ jsonrpc: "2.0", id: "2", result: "ok" });

      await expect(call).resolves.toBe("ok");
    });

    it("turns an error response into a ProtocolError", async () => {
      transport.handlers["tools/list"] = () => new RpcFailure(-32603, "internal", { hint: 1 });
      const client = createClient(transport);
      await client.connect(descriptor);

      const err = await client.callMethod("tools/list").catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ProtocolError);
      expect(err).toMatchObject({ code: -32603, serverMessage: "internal", data: { hint: 1 } });
    });

    it("times out one call and drops its late reply", async () => {
      const client = createClient(transport);
      await client.connect(descriptor);

      const err = await client.callMethod("tools/call", {}, { timeoutMs: 20 }).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(TimeoutError);
      expect(client.pendingCount).toBe(0);

      transport.push({ jsonrpc: "2.0", id: 2, result: "late" });
      await flush();

      expect(client.state).toBe("ready");
      transport.handlers.ping = () => ({});
      await expect(client.ping()).resolves.toBeUndefined();
    });

    it("skips frames that are not JSON", async () => {
      const logger = createMockLogger();
      const client = new ProtocolClient(transport, logger, { clientInfo });
      await client.connect(descriptor);

      const call = client.callMethod("tools/call", {});
      transport.pushRaw("this is not json");
      transport.push({ jsonrpc: "2.0", id: 2, result: "fine" });

      await expect(call).resolves.toBe("fine");
      expect(logger.warn).toHaveBeenCalledWith(
        expect.objectContaining({ bytes: 16 }),
        "Dropping undecodable frame"
      );
    });
  });

  describe("connection loss and close", () => {
    it("fails every pending request when the client closes", async () => {
      const client = createClient(transport);
      await client.connect(descriptor);

      const calls = [1, 2, 3].map(() => client.callMethod("tools/call", {}).catch((e: unknown) => e));
      await client.close();
      const results = await Promise.all(calls);

      expect(results).toHaveLength(3);
      for (const result of results) {
        expect(result).toBeInstanceOf(ConnectionLostError);
      }
      expect(client.state).toBe("closed");
      expect(client.pendingCount).toBe(0);
    });

    it("is idempotent", async () => {
      const client = createClient(transport);
      await client.connect(descriptor);

      await Promise.all([client.close(), client.close()]);
      await client.close();

      expect(client.state).toBe("closed");
    });

    it("fails pending requests and notifies listeners when the server goes away", async () => {
      const client = createClient(transport);
      await client.connect(descriptor);
      const onClose = vi.fn();
      client.onClose(onClose);

      const call = client.callMethod("tools/call", {}).catch((e: unknown) => e);
      transport.end();

      const err = await call;
      expect(err).toBeInstanceOf(ConnectionLostError);
      expect(client.state).toBe("closed");
      expect(onClose).toHaveBeenCalledTimes(1);
      expect(onClose.mock.calls[0]?.[0]).toBeInstanceOf(ConnectionLostError);
      await expect(client.callMethod("tools/list")).rejects.toBeInstanceOf(ConnectionClosedError);
    });
  });

  describe("server-initiated traffic", () => {
    it("dispatches notifications to subscribers until they unsubscribe", async () => {
      const client = createClient(transport);
      await client.connect(descriptor);
      const handler = vi.fn();
      const unsubscribe = client.onNotification("notifications/tools/list_changed", handler);

      transport.push({ jsonrpc: "2.0", method: "notifications/tools/list_changed", params: { n: 1 } });
      await flush();
      unsubscribe();
      transport.push({ jsonrpc: "2.0", method: "notifications/tools/list_changed" });
      await flush();

      expect(handler).toHaveBeenCalledTimes(1);
      expect(handler).toHaveBeenCalledWith({ n: 1 });
    });

    it("answers server pings and rejects other server requests", async () => {
      const client = createClient(transport);
      await client.connect(descriptor);

      transport.push({ jsonrpc: "2.0", id: "srv-1", method: "ping" });
      transport.push({ jsonrpc: "2.0", id: "srv-2", method: "sampling/createMessage" });
      await flush();

      const replies = transport.sent.filter((m) => m.method === undefined);
      expect(replies).toEqual([
        { jsonrpc: "2.0", id: "srv-1", result: {} },
        {
          jsonrpc: "2.0",
          id: "srv-2",
          error: { code: -32601, message: "Method not supported by client: sampling/createMessage" },
        },
      ]);
    });
  });
});
