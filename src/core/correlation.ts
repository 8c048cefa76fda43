/**
 * Invocation correlation context using AsyncLocalStorage.
 * Propagates invocationId, connectionId and tool through every await of a
 * single tool invocation, including its retries.
 */
import { AsyncLocalStorage } from "node:async_hooks";
import { generateId } from "../utils/id.js";

export interface InvocationContext {
  invocationId: string;
  connectionId?: string;
  tool?: string;
}

export const invocationContext = new AsyncLocalStorage<InvocationContext>();

export function withInvocationContext<T>(
  ctx: InvocationContext,
  fn: () => Promise<T>
): Promise<T> {
  return invocationContext.run(ctx, fn);
}

export function getCurrentInvocation(): InvocationContext | undefined {
  return invocationContext.getStore();
}

export function createInvocationId(): string {
  return generateId();
}
