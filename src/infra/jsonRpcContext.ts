import { AsyncLocalStorage } from "node:async_hooks";

/** Correlation details attached to every log entry emitted while a request runs. */
export interface JsonRpcRouteContext {
  /** Identifier of the request, `null` for notifications. */
  readonly requestId: string | number | null;
  /** Method targeted by the request (after `tools/call` unwrapping). */
  readonly method: string;
  /** Transport that delivered the request. */
  readonly transport: "stdio" | "memory";
}

const storage = new AsyncLocalStorage<JsonRpcRouteContext>();

/**
 * Executes the callback while exposing {@link context} to downstream helpers
 * (the logger in particular).
 */
export function runWithJsonRpcContext<T>(context: JsonRpcRouteContext, callback: () => T): T {
  return storage.run(context, callback);
}

/** Retrieves the JSON-RPC context associated with the current async execution. */
export function getJsonRpcContext(): JsonRpcRouteContext | undefined {
  return storage.getStore();
}
