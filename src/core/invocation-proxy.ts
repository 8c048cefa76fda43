import type { Logger } from "../utils/logger.js";
import type { Connection } from "./connection.js";
import { DiscoveryError, ProtocolError, ToolExecutionError, ToolNotFoundError } from "./errors.js";
import {
  CallToolResultSchema,
  METHODS,
  ReadResourceResultSchema,
  isReservedErrorCode,
} from "./protocol/messages.js";
import { validateArguments, type ToolDescriptor, type ValidationMode } from "./schema-registry.js";

export interface ToolResult {
  content: unknown;
  isError: false;
  /** The untouched `tools/call` result. */
  raw: unknown;
}

export interface ResourceResult {
  uri: string;
  contents: unknown[];
}

export interface InvokeOptions {
  timeoutMs?: number;
}

export interface InvocationProxyOptions {
  validation: ValidationMode;
}

/**
 * Turns a tool name plus an argument map into a `tools/call` request and
 * the server's answer into a ToolResult or a typed error.
 */
export class InvocationProxy {
  private readonly logger: Logger;
  private readonly validation: ValidationMode;

  constructor(logger: Logger, options: InvocationProxyOptions) {
    this.logger = logger.child({ component: "invocation-proxy" });
    this.validation = options.validation;
  }

  /** Look a tool up, running discovery first when the connection has none cached. */
  async resolveTool(connection: Connection, toolName: string): Promise<ToolDescriptor> {
    if (!connection.registry.hasDiscoveredTools()) {
      await connection.registry.discoverTools();
    }
    const tool = connection.registry.getTool(toolName);
    if (!tool) {
      throw new ToolNotFoundError(toolName, connection.id);
    }
    return tool;
  }

  async invoke(
    connection: Connection,
    toolName: string,
    args: Record<string, unknown>,
    options: InvokeOptions = {}
  ): Promise<ToolResult> {
    const tool = await this.resolveTool(connection, toolName);
    validateArguments(tool, args, this.validation, this.logger);

    connection.touch();
    let raw: unknown;
    try {
      raw = await connection.client.callMethod(
        METHODS.callTool,
        { name: toolName, arguments: args },
        { timeoutMs: options.timeoutMs }
      );
    } catch (err) {
      if (err instanceof ProtocolError && !isReservedErrorCode(err.code)) {
        throw new ToolExecutionError(toolName, err.serverMessage, err.code, err.data);
      }
      throw err;
    }

    return unwrapToolResult(toolName, raw);
  }

  async readResource(connection: Connection, uri: string, options: InvokeOptions = {}): Promise<ResourceResult> {
    connection.touch();
    const raw = await connection.client.callMethod(
      METHODS.readResource,
      { uri },
      { timeoutMs: options.timeoutMs }
    );

    const parsed = ReadResourceResultSchema.safeParse(raw);
    if (!parsed.success) {
      throw new DiscoveryError(`${METHODS.readResource} returned a malformed result for ${uri}`, {
        uri,
        issues: parsed.error.issues.map((i) => i.message),
      });
    }
    return { uri, contents: parsed.data.contents };
  }
}

/** Map a `tools/call` result envelope onto success or ToolExecutionError. */
export function unwrapToolResult(toolName: string, raw: unknown): ToolResult {
  const parsed = CallToolResultSchema.safeParse(raw);
  if (!parsed.success) {
    // Not an envelope at all; hand the bare value back as content.
    return { content: raw, isError: false, raw };
  }

  const { error, isError, content } = parsed.data;
  if (error) {
    throw new ToolExecutionError(toolName, error.message, error.code, raw);
  }
  if (isError) {
    const text = contentToText(content);
    throw new ToolExecutionError(toolName, text || `Tool "${toolName}" reported an error`, undefined, content);
  }
  // Bare `{code?, message}` failure with no content.
  if (content === undefined && isRecord(raw) && typeof raw.message === "string") {
    const code = typeof raw.code === "number" || typeof raw.code === "string" ? raw.code : undefined;
    throw new ToolExecutionError(toolName, raw.message, code, raw);
  }

  return { content: content ?? [], isError: false, raw };
}

/**
 * Flatten content blocks to a string.
 * Handles text, image (as a placeholder) and embedded resources.
 */
export function contentToText(content: unknown): string {
  if (content === undefined || content === null) return "";
  if (typeof content === "string") return content;
  if (!Array.isArray(content)) return JSON.stringify(content);

  const parts: string[] = [];

  for (const block of content) {
    if (!isRecord(block)) {
      parts.push(String(block));
      continue;
    }
    if (block.type === "text" && typeof block.text === "string") {
      parts.push(block.text);
    } else if (block.type === "image") {
      parts.push(`[Image: ${typeof block.mimeType === "string" ? block.mimeType : "unknown"}]`);
    } else if (block.type === "resource" && isRecord(block.resource)) {
      const resource = block.resource;
      if (typeof resource.text === "string") {
        parts.push(resource.text);
      } else if ("blob" in resource) {
        parts.push(`[Binary resource: ${typeof resource.mimeType === "string" ? resource.mimeType : "unknown"}]`);
      }
    } else {
      parts.push(JSON.stringify(block));
    }
  }

  return parts.join("\n");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
