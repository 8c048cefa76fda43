/**
 * JSON-RPC 2.0 wire format for the tool protocol, validated with zod.
 */
import { z } from "zod";

export const PROTOCOL_VERSION = "2024-11-05";

export const METHODS = {
  initialize: "initialize",
  initialized: "notifications/initialized",
  ping: "ping",
  listTools: "tools/list",
  callTool: "tools/call",
  listResources: "resources/list",
  readResource: "resources/read",
  toolsChanged: "notifications/tools/list_changed",
  resourcesChanged: "notifications/resources/list_changed",
} as const;

/** Reserved JSON-RPC error codes. */
export const RPC_ERRORS = {
  parseError: -32700,
  invalidRequest: -32600,
  methodNotFound: -32601,
  invalidParams: -32602,
  internalError: -32603,
} as const;

export type RequestId = number | string;

export interface JsonRpcRequest {
  jsonrpc: "2.0";
  id: RequestId;
  method: string;
  params?: Record<string, unknown>;
}

export interface JsonRpcNotification {
  jsonrpc: "2.0";
  method: string;
  params?: Record<string, unknown>;
}

export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

export type JsonRpcResponse =
  | { jsonrpc: "2.0"; id: RequestId; result: unknown }
  | { jsonrpc: "2.0"; id: RequestId | null; error: JsonRpcErrorObject };

const RequestIdSchema = z.union([z.number(), z.string()]);
const ParamsSchema = z.record(z.unknown());

const ErrorObjectSchema = z.object({
  code: z.number(),
  message: z.string(),
  data: z.unknown().optional(),
});

const EnvelopeSchema = z.object({
  jsonrpc: z.literal("2.0").optional(),
  id: z.union([RequestIdSchema, z.null()]).optional(),
  method: z.string().optional(),
  params: ParamsSchema.optional(),
  result: z.unknown().optional(),
  error: ErrorObjectSchema.optional(),
});

export type InboundMessage =
  | { kind: "result"; id: RequestId; result: unknown }
  | { kind: "error"; id: RequestId | null; error: JsonRpcErrorObject }
  | { kind: "notification"; method: string; params?: Record<string, unknown> }
  | { kind: "request"; id: RequestId; method: string; params?: Record<string, unknown> }
  | { kind: "invalid"; reason: string };

/** Classify one decoded JSON value received from the server. */
export function classifyMessage(raw: unknown): InboundMessage {
  const parsed = EnvelopeSchema.safeParse(raw);
  if (!parsed.success) {
    return { kind: "invalid", reason: parsed.error.issues.map((i) => i.message).join("; ") };
  }

  const msg = parsed.data;
  const id = msg.id ?? null;

  if (msg.method !== undefined) {
    if (id !== null) {
      return { kind: "request", id, method: msg.method, params: msg.params };
    }
    return { kind: "notification", method: msg.method, params: msg.params };
  }

  if (msg.error) {
    return { kind: "error", id, error: msg.error };
  }

  if (id !== null && hasResultMember(raw)) {
    return { kind: "result", id, result: msg.result };
  }

  return { kind: "invalid", reason: "Message is neither a response, a request nor a notification" };
}

function hasResultMember(raw: unknown): boolean {
  return typeof raw === "object" && raw !== null && "result" in raw;
}

export function buildRequest(id: RequestId, method: string, params?: Record<string, unknown>): JsonRpcRequest {
  return { jsonrpc: "2.0", id, method, ...(params !== undefined ? { params } : {}) };
}

export function buildNotification(method: string, params?: Record<string, unknown>): JsonRpcNotification {
  return { jsonrpc: "2.0", method, ...(params !== undefined ? { params } : {}) };
}

export function buildResult(id: RequestId, result: unknown): JsonRpcResponse {
  return { jsonrpc: "2.0", id, result };
}

export function buildError(id: RequestId, code: number, message: string): JsonRpcResponse {
  return { jsonrpc: "2.0", id, error: { code, message } };
}

/** Codes in -32768..-32000 are reserved by JSON-RPC for protocol failures. */
export function isReservedErrorCode(code: number): boolean {
  return code >= -32768 && code <= -32000;
}

// ---- Method payloads ----

export const InitializeResultSchema = z.object({
  protocolVersion: z.string(),
  capabilities: z.record(z.unknown()).default({}),
  serverInfo: z
    .object({
      name: z.string(),
      version: z.string().default("unknown"),
    })
    .passthrough(),
  instructions: z.string().optional(),
});

export type InitializeResult = z.infer<typeof InitializeResultSchema>;

export const ParameterSpecSchema = z
  .object({
    type: z.string().default("any"),
    required: z.boolean().default(false),
    description: z.string().optional(),
  })
  .passthrough();

const JsonSchemaPropertySchema = z
  .object({
    type: z.union([z.string(), z.array(z.string())]).optional(),
    description: z.string().optional(),
  })
  .passthrough();

export const RawToolSchema = z.object({
  name: z.string().min(1, "tool name must not be empty"),
  description: z.string().optional(),
  parameters: z.record(ParameterSpecSchema).optional(),
  inputSchema: z
    .object({
      properties: z.record(JsonSchemaPropertySchema).optional(),
      required: z.array(z.string()).optional(),
    })
    .passthrough()
    .optional(),
});

export type RawTool = z.infer<typeof RawToolSchema>;
export type JsonSchemaProperty = z.infer<typeof JsonSchemaPropertySchema>;

export const RawResourceSchema = z.object({
  uri: z.string().min(1, "resource uri must not be empty"),
  name: z.string().optional(),
  description: z.string().optional(),
  mimeType: z.string().optional(),
});

export const CallToolResultSchema = z
  .object({
    content: z.unknown().optional(),
    isError: z.boolean().optional(),
    error: z
      .object({
        code: z.union([z.number(), z.string()]).optional(),
        message: z.string(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export const ReadResourceResultSchema = z.object({
  contents: z.array(z.unknown()).default([]),
});
