import type { ToolResult } from "../invocation-proxy.js";
import type { Interceptor, MiddlewareContext, Next } from "./types.js";

const READ_ONLY_PATTERNS =
  /(?:^|[_\s\-])(list|get|search|read|fetch|describe|show|find|query|status|info|check|echo)(?:$|[_\s\-])/i;
const MUTATING_PATTERNS =
  /(?:^|[_\s\-])(create|update|delete|send|post|put|patch|remove|add|set|modify|write|execute|run|trigger)(?:$|[_\s\-])/i;

export interface CacheOptions {
  ttlMs: number;
  maxEntries: number;
  /** Restrict caching to some tools. Defaults to caching everything. */
  shouldCache?: (toolName: string) => boolean;
}

interface CacheEntry {
  connectionId: string;
  toolName: string;
  result: ToolResult;
  storedAt: number;
}

/**
 * TTL cache of successful results. A hit answers without running the
 * rest of the chain; failures are never stored.
 */
export class CacheInterceptor implements Interceptor {
  readonly name = "cache";
  private readonly entries = new Map<string, CacheEntry>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly shouldCache: (toolName: string) => boolean;

  constructor(options: CacheOptions) {
    this.ttlMs = options.ttlMs;
    this.maxEntries = options.maxEntries;
    this.shouldCache = options.shouldCache ?? (() => true);
  }

  async intercept(ctx: MiddlewareContext, next: Next): Promise<ToolResult> {
    if (ctx.bypassCache || !this.shouldCache(ctx.toolName)) {
      return next();
    }

    const key = cacheKey(ctx.connectionId, ctx.toolName, ctx.arguments);
    const cached = this.lookup(key);
    if (cached) {
      ctx.metadata.cacheHit = true;
      return cached;
    }

    ctx.metadata.cacheHit = false;
    const result = await next();
    this.store(key, {
      connectionId: ctx.connectionId,
      toolName: ctx.toolName,
      result: structuredClone(result),
      storedAt: Date.now(),
    });
    return result;
  }

  /** Drop entries for a connection, a tool on it, or everything. Returns how many went. */
  invalidate(connectionId?: string, toolName?: string): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (connectionId !== undefined && entry.connectionId !== connectionId) continue;
      if (toolName !== undefined && entry.toolName !== toolName) continue;
      this.entries.delete(key);
      removed++;
    }
    return removed;
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  private lookup(key: string): ToolResult | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (Date.now() - entry.storedAt >= this.ttlMs) {
      this.entries.delete(key);
      return undefined;
    }
    // Each hit gets its own copy; callers may mutate what they receive.
    return structuredClone(entry.result);
  }

  private store(key: string, entry: CacheEntry): void {
    // Re-inserting keeps Map order equal to storage order, oldest first.
    this.entries.delete(key);
    if (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) this.entries.delete(oldest.value);
    }
    this.entries.set(key, entry);
  }
}

/** Guess from its name whether a tool only reads. Mutating verbs win over read verbs. */
export function isReadOnlyToolName(toolName: string): boolean {
  if (MUTATING_PATTERNS.test(toolName)) return false;
  return READ_ONLY_PATTERNS.test(toolName);
}

export function cacheKey(connectionId: string, toolName: string, args: Record<string, unknown>): string {
  return JSON.stringify([connectionId, toolName, canonicalize(args)]);
}

/** Recursively sort object keys so equal maps serialize identically. */
export function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(canonicalize);
  if (isRecord(value)) {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = canonicalize(value[key]);
    }
    return sorted;
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
