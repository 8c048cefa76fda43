import type { Logger } from "../utils/logger.js";
import { DiscoveryError, InvalidParameterError, MissingParameterError } from "./errors.js";
import type { MethodCaller } from "./protocol/client.js";
import {
  METHODS,
  RawResourceSchema,
  RawToolSchema,
  type JsonSchemaProperty,
  type RawTool,
} from "./protocol/messages.js";

export interface ParameterSpec {
  readonly type: string;
  readonly required: boolean;
  readonly description?: string;
}

export interface ToolDescriptor {
  readonly name: string;
  readonly description: string;
  readonly parameters: Readonly<Record<string, ParameterSpec>>;
}

export interface ResourceDescriptor {
  readonly uri: string;
  readonly name: string;
  readonly description?: string;
  readonly mimeType?: string;
}

export type ValidationMode = "strict" | "lenient";

const MAX_PAGES = 100;

/**
 * Per-connection cache of tool and resource descriptors.
 * Lookups never touch the wire; only the discover* methods do.
 */
export class SchemaRegistry {
  private tools: ReadonlyMap<string, ToolDescriptor> = new Map();
  private resources: ReadonlyMap<string, ResourceDescriptor> = new Map();
  private toolsDiscovered = false;
  private resourcesDiscovered = false;
  // Concurrent callers that find the cache empty share one discovery round trip.
  private inflightTools: Promise<ToolDescriptor[]> | null = null;
  private readonly logger: Logger;

  constructor(
    private readonly caller: MethodCaller,
    logger: Logger
  ) {
    this.logger = logger.child({ component: "schema-registry" });
  }

  /** Fetch the server's tool list and replace the cache atomically. */
  discoverTools(): Promise<ToolDescriptor[]> {
    if (!this.inflightTools) {
      this.inflightTools = this.fetchTools().finally(() => {
        this.inflightTools = null;
      });
    }
    return this.inflightTools;
  }

  async discoverResources(): Promise<ResourceDescriptor[]> {
    const items = await this.fetchAllPages(METHODS.listResources, "resources");
    const next = new Map<string, ResourceDescriptor>();

    items.forEach((raw, index) => {
      const parsed = RawResourceSchema.safeParse(raw);
      if (!parsed.success) {
        throw new DiscoveryError(
          `Malformed resource descriptor at index ${index}: ${formatIssues(parsed.error.issues)}`,
          { index }
        );
      }
      const { uri, name, description, mimeType } = parsed.data;
      next.set(
        uri,
        Object.freeze({
          uri,
          name: name ?? uri,
          ...(description !== undefined ? { description } : {}),
          ...(mimeType !== undefined ? { mimeType } : {}),
        })
      );
    });

    this.resources = next;
    this.resourcesDiscovered = true;
    this.logger.debug({ resourceCount: next.size }, "Resources discovered");
    return [...next.values()];
  }

  getTool(name: string): ToolDescriptor | undefined {
    return this.tools.get(name);
  }

  getResource(uri: string): ResourceDescriptor | undefined {
    return this.resources.get(uri);
  }

  listTools(): ToolDescriptor[] {
    return [...this.tools.values()];
  }

  listResources(): ResourceDescriptor[] {
    return [...this.resources.values()];
  }

  hasDiscoveredTools(): boolean {
    return this.toolsDiscovered;
  }

  hasDiscoveredResources(): boolean {
    return this.resourcesDiscovered;
  }

  /** Drop cached descriptors; the next invocation rediscovers. */
  invalidate(): void {
    this.tools = new Map();
    this.resources = new Map();
    this.toolsDiscovered = false;
    this.resourcesDiscovered = false;
  }

  private async fetchTools(): Promise<ToolDescriptor[]> {
    const items = await this.fetchAllPages(METHODS.listTools, "tools");
    const next = new Map<string, ToolDescriptor>();

    items.forEach((raw, index) => {
      const descriptor = parseToolDescriptor(raw, index);
      if (next.has(descriptor.name)) {
        throw new DiscoveryError(`Duplicate tool name "${descriptor.name}"`, { index });
      }
      next.set(descriptor.name, descriptor);
    });

    this.tools = next;
    this.toolsDiscovered = true;
    this.logger.debug({ toolCount: next.size }, "Tools discovered");
    return [...next.values()];
  }

  /** Follow `nextCursor` until the server stops returning one. */
  private async fetchAllPages(method: string, key: "tools" | "resources"): Promise<unknown[]> {
    const items: unknown[] = [];
    const seenCursors = new Set<string>();
    let cursor: string | undefined;

    for (let page = 0; page < MAX_PAGES; page++) {
      const result = await this.caller.callMethod(method, cursor !== undefined ? { cursor } : undefined);

      if (Array.isArray(result)) {
        items.push(...result);
        return items;
      }

      const pageItems = isRecord(result) ? result[key] : undefined;
      if (!isRecord(result) || !Array.isArray(pageItems)) {
        throw new DiscoveryError(`${method} returned neither a list nor an object with "${key}"`);
      }
      items.push(...pageItems);

      const nextCursor = result.nextCursor;
      if (typeof nextCursor !== "string" || nextCursor.length === 0) {
        return items;
      }
      if (seenCursors.has(nextCursor)) {
        throw new DiscoveryError(`${method} repeated pagination cursor "${nextCursor}"`);
      }
      seenCursors.add(nextCursor);
      cursor = nextCursor;
    }

    throw new DiscoveryError(`${method} exceeded ${MAX_PAGES} pages`);
  }
}

/**
 * Normalise one wire descriptor. Accepts the flat `parameters` map
 * (`{name: {type, required, description}}`) or a JSON Schema `inputSchema`.
 */
export function parseToolDescriptor(raw: unknown, index = 0): ToolDescriptor {
  const parsed = RawToolSchema.safeParse(raw);
  if (!parsed.success) {
    const name = isRecord(raw) && typeof raw.name === "string" ? ` ("${raw.name}")` : "";
    throw new DiscoveryError(
      `Malformed tool descriptor at index ${index}${name}: ${formatIssues(parsed.error.issues)}`,
      { index }
    );
  }

  const tool = parsed.data;
  return Object.freeze({
    name: tool.name,
    description: tool.description ?? "",
    parameters: Object.freeze(normaliseParameters(tool)),
  });
}

function normaliseParameters(tool: RawTool): Record<string, ParameterSpec> {
  const parameters: Record<string, ParameterSpec> = {};

  if (tool.parameters) {
    for (const [name, spec] of Object.entries(tool.parameters)) {
      parameters[name] = Object.freeze({
        type: spec.type,
        required: spec.required,
        ...(spec.description !== undefined ? { description: spec.description } : {}),
      });
    }
    return parameters;
  }

  const schema = tool.inputSchema;
  if (!schema) return parameters;

  const required = new Set(schema.required ?? []);
  for (const [name, property] of Object.entries(schema.properties ?? {})) {
    parameters[name] = Object.freeze({
      type: jsonSchemaType(property),
      required: required.has(name),
      ...(property.description !== undefined ? { description: property.description } : {}),
    });
  }
  for (const name of required) {
    if (!(name in parameters)) {
      parameters[name] = Object.freeze({ type: "any", required: true });
    }
  }
  return parameters;
}

function jsonSchemaType(property: JsonSchemaProperty): string {
  const type = property.type;
  if (Array.isArray(type)) {
    return type.find((t) => t !== "null") ?? "any";
  }
  return type ?? "any";
}

/**
 * Client-side argument check run before anything is sent.
 * Unknown keys always pass through. In strict mode a missing required
 * parameter or a type mismatch throws; in lenient mode it is logged.
 */
export function validateArguments(
  tool: ToolDescriptor,
  args: Record<string, unknown>,
  mode: ValidationMode,
  logger: Logger
): void {
  const missing: string[] = [];
  const problems: string[] = [];

  for (const [name, spec] of Object.entries(tool.parameters)) {
    const value = args[name];
    if (value === undefined || value === null) {
      if (spec.required) missing.push(name);
      continue;
    }
    if (!matchesType(spec.type, value)) {
      problems.push(`"${name}" must be ${spec.type}, got ${describeType(value)}`);
    }
  }

  if (missing.length === 0 && problems.length === 0) return;

  if (mode === "lenient") {
    logger.warn({ tool: tool.name, missing, problems }, "Arguments do not match tool schema, sending anyway");
    return;
  }

  const firstMissing = missing[0];
  if (firstMissing !== undefined) {
    throw new MissingParameterError(tool.name, firstMissing);
  }
  throw new InvalidParameterError(tool.name, problems);
}

function matchesType(type: string, value: unknown): boolean {
  switch (type) {
    case "string":
      return typeof value === "string";
    case "number":
      return typeof value === "number" && !Number.isNaN(value);
    case "integer":
      return typeof value === "number" && Number.isInteger(value);
    case "boolean":
      return typeof value === "boolean";
    case "array":
      return Array.isArray(value);
    case "object":
      return typeof value === "object" && value !== null && !Array.isArray(value);
    default:
      return true;
  }
}

function describeType(value: unknown): string {
  if (Array.isArray(value)) return "array";
  return typeof value;
}

function formatIssues(issues: Array<{ path: Array<string | number>; message: string }>): string {
  return issues.map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message)).join("; ");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
