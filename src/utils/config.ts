import { readFileSync, existsSync } from "node:fs";
import yaml from "js-yaml";
import { z } from "zod";
import { ConfigError } from "../core/errors.js";

const ServerConfigSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  cwd: z.string().optional(),
  env: z.record(z.string()).optional(),
  framing: z.enum(["newline", "content-length"]).default("newline"),
  enabled: z.boolean().default(true),
  description: z.string().optional(),
});

const InterceptorNameSchema = z.enum(["metrics", "logging", "retry", "cache"]);

const MiddlewareConfigSchema = z.object({
  order: z.array(InterceptorNameSchema).default(["metrics", "logging", "retry", "cache"]),
  logging: z
    .object({
      enabled: z.boolean().default(true),
      level: z.enum(["debug", "info"]).default("info"),
    })
    .default({}),
  retry: z
    .object({
      enabled: z.boolean().default(true),
      max_attempts: z.number().int().min(1).default(3),
      base_delay_ms: z.number().min(0).default(200),
      max_delay_ms: z.number().min(0).default(5_000),
      factor: z.number().min(1).default(2),
    })
    .default({}),
  cache: z
    .object({
      enabled: z.boolean().default(true),
      ttl_ms: z.number().min(0).default(30_000),
      max_entries: z.number().int().min(1).default(500),
      read_only_only: z.boolean().default(false),
    })
    .default({}),
  metrics: z
    .object({
      enabled: z.boolean().default(true),
    })
    .default({}),
});

const ClientConfigSchema = z.object({
  client: z
    .object({
      name: z.string().default("toolpipe"),
      version: z.string().default("0.1.0"),
    })
    .default({}),
  timeouts: z
    .object({
      handshake_ms: z.number().int().positive().default(10_000),
      request_ms: z.number().int().positive().default(30_000),
      close_grace_ms: z.number().int().min(0).default(2_000),
    })
    .default({}),
  validation: z.enum(["strict", "lenient"]).default("strict"),
  reconnect_on_lost: z.boolean().default(true),
  middleware: MiddlewareConfigSchema.default({}),
  servers: z.record(ServerConfigSchema).default({}),
});

export type ClientConfig = z.infer<typeof ClientConfigSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type MiddlewareConfig = z.infer<typeof MiddlewareConfigSchema>;
export type InterceptorName = z.infer<typeof InterceptorNameSchema>;

/**
 * Parse and validate an already-loaded config object, filling defaults.
 */
export function parseConfig(raw: unknown): ClientConfig {
  const result = ClientConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(
      "Invalid configuration",
      result.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
    );
  }
  return result.data;
}

/**
 * Load configuration from YAML file with environment variable overrides.
 * Env vars take precedence over YAML values.
 */
export function loadConfig(configPath?: string): ClientConfig {
  const path = configPath ?? process.env.TOOLPIPE_CONFIG ?? "./config/toolpipe.yaml";

  let rawConfig: Record<string, unknown> = {};

  if (existsSync(path)) {
    const fileContent = readFileSync(path, "utf-8");
    const loaded: unknown = yaml.load(fileContent);
    if (loaded !== undefined && loaded !== null) {
      if (!isRecord(loaded)) {
        throw new ConfigError(`Configuration file ${path} must contain a mapping`);
      }
      rawConfig = loaded;
    }
  }

  applyEnvOverrides(rawConfig);

  return parseConfig(rawConfig);
}

function applyEnvOverrides(config: Record<string, unknown>): void {
  const timeouts = ensureObject(config, "timeouts");
  const middleware = ensureObject(config, "middleware");

  if (process.env.TOOLPIPE_REQUEST_TIMEOUT_MS) {
    timeouts.request_ms = parseInt(process.env.TOOLPIPE_REQUEST_TIMEOUT_MS, 10);
  }
  if (process.env.TOOLPIPE_HANDSHAKE_TIMEOUT_MS) {
    timeouts.handshake_ms = parseInt(process.env.TOOLPIPE_HANDSHAKE_TIMEOUT_MS, 10);
  }
  if (process.env.TOOLPIPE_VALIDATION) {
    config.validation = process.env.TOOLPIPE_VALIDATION;
  }
  if (process.env.TOOLPIPE_CACHE_TTL_MS) {
    const cache = ensureObject(middleware, "cache");
    cache.ttl_ms = parseInt(process.env.TOOLPIPE_CACHE_TTL_MS, 10);
  }
  if (process.env.TOOLPIPE_RETRY_MAX_ATTEMPTS) {
    const retry = ensureObject(middleware, "retry");
    retry.max_attempts = parseInt(process.env.TOOLPIPE_RETRY_MAX_ATTEMPTS, 10);
  }
}

function ensureObject(
  parent: Record<string, unknown>,
  key: string
): Record<string, unknown> {
  const existing = parent[key];
  if (isRecord(existing)) return existing;
  const created: Record<string, unknown> = {};
  parent[key] = created;
  return created;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
