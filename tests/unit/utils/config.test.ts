import { describe, it, expect, afterEach, vi } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadConfig, parseConfig } from "../../../src/utils/config.js";
import { ConfigError } from "../../../src/core/errors.js";

describe("parseConfig", () => {
  it("fills every section with defaults", () => {
    const config = parseConfig({});

    expect(config.validation).toBe("strict");
    expect(config.reconnect_on_lost).toBe(true);
    expect(config.timeouts).toEqual({ handshake_ms: 10_000, request_ms: 30_000, close_grace_ms: 2_000 });
    expect(config.middleware.order).toEqual(["metrics", "logging", "retry", "cache"]);
    expect(config.middleware.retry).toEqual({
      enabled: true,
      max_attempts: 3,
      base_delay_ms: 200,
      max_delay_ms: 5_000,
      factor: 2,
    });
    expect(config.servers).toEqual({});
  });

  it("defaults server fields", () => {
    const config = parseConfig({ servers: { fs: { command: "node", args: ["fs-server.js"] } } });

    expect(config.servers.fs).toEqual({
      command: "node",
      args: ["fs-server.js"],
      framing: "newline",
      enabled: true,
    });
  });

  it("lists every problem", () => {
    const parse = () => parseConfig({ validation: "loose", servers: { fs: { args: [] } } });

    expect(parse).toThrow(ConfigError);
    expect(parse).toThrow("servers.fs.command: Required");
    expect(parse).toThrow("validation: Invalid enum value");
  });
});

describe("loadConfig", () => {
  let dir: string | undefined;

  afterEach(() => {
    vi.unstubAllEnvs();
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  function writeYaml(content: string): string {
    dir = mkdtempSync(join(tmpdir(), "toolpipe-config-"));
    const path = join(dir, "toolpipe.yaml");
    writeFileSync(path, content);
    return path;
  }

  it("reads YAML and applies env overrides on top", () => {
    const path = writeYaml(
      [
        "validation: lenient",
        "timeouts:",
        "  request_ms: 1000",
        "middleware:",
        "  cache:",
        "    ttl_ms: 50",
        "servers:",
        "  echo:",
        "    command: node",
        "    args: [echo.js]",
        "    framing: content-length",
      ].join("\n")
    );
    vi.stubEnv("TOOLPIPE_REQUEST_TIMEOUT_MS", "2500");
    vi.stubEnv("TOOLPIPE_RETRY_MAX_ATTEMPTS", "5");

    const config = loadConfig(path);

    expect(config.validation).toBe("lenient");
    expect(config.timeouts.request_ms).toBe(2_500);
    expect(config.middleware.cache.ttl_ms).toBe(50);
    expect(config.middleware.retry.max_attempts).toBe(5);
    expect(config.servers.echo?.framing).toBe("content-length");
  });

  it("uses defaults when the file does not exist", () => {
    const config = loadConfig(join(tmpdir(), "toolpipe-does-not-exist.yaml"));
    expect(config.validation).toBe("strict");
  });

  it("rejects a file that is not a mapping", () => {
    const path = writeYaml("- just\n- a list\n");
    expect(() => loadConfig(path)).toThrow("must contain a mapping");
  });
});
