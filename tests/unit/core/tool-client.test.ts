import { describe, it, expect, beforeEach } from "vitest";
import { createToolClient, type ToolClient } from "../../../src/core/tool-client.js";
import { getCurrentInvocation, type InvocationContext } from "../../../src/core/correlation.js";
import { ConfigError, ConnectionClosedError, MissingParameterError } from "../../../src/core/errors.js";
import { parseConfig } from "../../../src/utils/config.js";
import {
  FakeTransport,
  NO_REPLY,
  createMockLogger,
  echoServerHandlers,
  echoTools,
} from "../../helpers/mocks.js";

const baseConfig = {
  servers: {
    echo: { command: "node", args: ["echo.js"] },
    off: { command: "node", args: ["off.js"], enabled: false },
  },
};

describe("ToolClient", () => {
  let transports: FakeTransport[];
  let queue: Array<() => FakeTransport>;

  function build(overrides: Record<string, unknown> = {}): ToolClient {
    return createToolClient(parseConfig({ ...baseConfig, ...overrides }), createMockLogger(), {
      transportFactory: () => {
        const transport = queue.shift()?.() ?? new FakeTransport(echoServerHandlers());
        transports.push(transport);
        return transport;
      },
      retryDelay: async () => undefined,
    });
  }

  beforeEach(() => {
    transports = [];
    queue = [];
  });

  describe("open", () => {
    it("opens a configured server by name", async () => {
      const client = build();

      const handle = await client.open("echo");

      expect(transports[0]?.opened).toEqual({ command: "node", args: ["echo.js"], cwd: undefined, env: undefined });
      expect(client.status()).toEqual([expect.objectContaining({ id: handle, name: "echo", state: "ready" })]);
    });

    it("opens an ad-hoc descriptor", async () => {
      const client = build();

      await client.open({ command: "./bin/server", args: ["--stdio"], framing: "content-length" });

      expect(transports[0]?.opened).toEqual({ command: "./bin/server", args: ["--stdio"] });
    });

    it("rejects unknown and disabled servers", async () => {
      const client = build();

      await expect(client.open("missing")).rejects.toThrow(new ConfigError('Unknown server "missing"').message);
      await expect(client.open("off")).rejects.toThrow('Server "off" is disabled');
      expect(transports).toHaveLength(0);
    });
  });

  describe("invoke", () => {
    it("returns the tool result", async () => {
      const client = build();
      const handle = await client.open("echo");

      const result = await client.invoke(handle, "echo", { message: "hi" });

      expect(result.content).toEqual([{ type: "text", text: "hi" }]);
    });

    it("answers a repeated call from cache unless bypassed", async () => {
      const client = build();
      const handle = await client.open("echo");
      const echo = client.tool(handle, "echo");

      await echo({ message: "hi" });
      await echo({ message: "hi" });
      expect(transports[0]?.requests("tools/call")).toHaveLength(1);

      await echo({ message: "hi" }, { bypassCache: true });
      expect(transports[0]?.requests("tools/call")).toHaveLength(2);

      expect(client.metrics().echo).toMatchObject({ calls: 3, successes: 3, cacheHits: 1 });
    });

    it("caches only read-only tools when configured to", async () => {
      queue.push(
        () =>
          new FakeTransport(
            echoServerHandlers({
              "tools/list": () => ({ tools: [...echoTools().tools, { name: "write_note" }] }),
            })
          )
      );
      const client = build({ middleware: { cache: { read_only_only: true } } });
      const handle = await client.open("echo");

      await client.invoke(handle, "read_file", { path: "/a" });
      await client.invoke(handle, "read_file", { path: "/a" });
      await client.invoke(handle, "write_note", { text: "x" });
      await client.invoke(handle, "write_note", { text: "x" });

      expect(transports[0]?.requests("tools/call")).toHaveLength(3);
    });

    it("fails validation before anything is sent", async () => {
      const client = build();
      const handle = await client.open("echo");
      await client.listTools(handle);
      const sent = transports[0]?.sent.length;

      await expect(client.invoke(handle, "read_file", {})).rejects.toBeInstanceOf(MissingParameterError);
      expect(transports[0]?.sent.length).toBe(sent);
    });

    it("runs inside an invocation context", async () => {
      let seen: InvocationContext | undefined;
      queue.push(
        () =>
          new FakeTransport(
            echoServerHandlers({
              "tools/call": () => {
                seen = getCurrentInvocation();
                return { content: [] };
              },
            })
          )
      );
      const client = build();
      const handle = await client.open("echo");

      await client.invoke(handle, "echo", { message: "x" });

      expect(seen).toMatchObject({ connectionId: handle, tool: "echo" });
      expect(seen?.invocationId).toMatch(/^[a-z0-9]+-[a-f0-9]{8}$/);
      expect(getCurrentInvocation()).toBeUndefined();
    });

    it("relaunches a lost server and retries on the new process", async () => {
      const crashing: FakeTransport = new FakeTransport(
        echoServerHandlers({
          "tools/call": () => {
            queueMicrotask(() => crashing.end());
            return NO_REPLY;
          },
        })
      );
      queue.push(() => crashing);
      const client = build();
      const handle = await client.open("echo");

      const result = await client.invoke(handle, "echo", { message: "after crash" });

      expect(result.content).toEqual([{ type: "text", text: "after crash" }]);
      expect(transports).toHaveLength(2);
      expect(client.status()[0]).toMatchObject({ id: handle, state: "ready" });
    });

    it("does not relaunch when reconnects are off", async () => {
      const crashing: FakeTransport = new FakeTransport(
        echoServerHandlers({
          "tools/call": () => {
            queueMicrotask(() => crashing.end());
            return NO_REPLY;
          },
        })
      );
      queue.push(() => crashing);
      const client = build({ reconnect_on_lost: false });
      const handle = await client.open("echo");

      await expect(client.invoke(handle, "echo", { message: "x" })).rejects.toBeInstanceOf(ConnectionClosedError);
      expect(transports).toHaveLength(1);
    });
  });

  describe("discovery and resources", () => {
    it("lists tools from cache and refreshes on request", async () => {
      const client = build();
      const handle = await client.open("echo");

      const first = await client.listTools(handle);
      await client.listTools(handle);
      await client.listTools(handle, { refresh: true });

      expect(first.map((t) => t.name)).toEqual(["echo", "read_file"]);
      expect(transports[0]?.requests("tools/list")).toHaveLength(2);
    });

    it("lists and reads resources", async () => {
      queue.push(
        () =>
          new FakeTransport({
            "resources/list": () => ({ resources: [{ uri: "mem://greeting", name: "greeting" }] }),
            "resources/read": () => ({ contents: [{ uri: "mem://greeting", text: "hello" }] }),
          })
      );
      const client = build();
      const handle = await client.open("echo");

      await expect(client.listResources(handle)).resolves.toEqual([{ uri: "mem://greeting", name: "greeting" }]);
      await expect(client.readResource(handle, "mem://greeting")).resolves.toEqual({
        uri: "mem://greeting",
        contents: [{ uri: "mem://greeting", text: "hello" }],
      });
    });

    it("pings", async () => {
      const client = build();
      const handle = await client.open("echo");

      await client.ping(handle);

      expect(transports[0]?.requests("ping")).toHaveLength(1);
    });
  });

  describe("middleware configuration", () => {
    it("builds the pipeline in the configured order, skipping disabled interceptors", () => {
      const client = build({
        middleware: { order: ["cache", "retry", "logging", "metrics"], logging: { enabled: false } },
      });

      expect(client.pipeline.names()).toEqual(["cache", "retry", "metrics"]);
    });
  });

  it("shuts down every connection", async () => {
    const client = build();
    const h1 = await client.open("echo");
    const h2 = await client.open({ command: "node", args: ["other.js"] });

    const report = await client.shutdown();

    expect(report).toEqual({ closed: [h1, h2], failures: [] });
    expect(client.status()).toEqual([]);
  });
});
