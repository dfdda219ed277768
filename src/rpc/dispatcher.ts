import { SUPPORTED_PROTOCOL_VERSIONS } from "@modelcontextprotocol/sdk/types.js";

import { runWithJsonRpcContext, type JsonRpcRouteContext } from "../infra/jsonRpcContext.js";
import { DIRECT_METHODS, type MethodHandler, type RelayContext } from "../methods/index.js";
import { describeError } from "../nodePrimitives.js";
import { InternalError, MethodNotFoundError, ParseError, toJsonRpc } from "./errors.js";
import { fail, ok, type HandlerResult } from "./result.js";
import { InitializeParamsSchema, ToolsCallParamsSchema } from "./schemas.js";
import { TOOL_CATALOG, type ToolDescriptor } from "./toolCatalog.js";
import type { JsonRpcId, JsonRpcRequest, JsonRpcResponse } from "./types.js";

/** Protocol version answered when the client asks for one the server does not know. */
export const FALLBACK_PROTOCOL_VERSION = "2024-11-05";

export const SERVER_INFO = { name: "session-relay", version: "0.1.0" } as const;

/** Outcome of decoding one input line. */
export type DecodedEnvelope =
  | { readonly kind: "request"; readonly request: JsonRpcRequest }
  | { readonly kind: "invalid"; readonly id: JsonRpcId | null; readonly respond: boolean; readonly detail: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function recoverId(candidate: Record<string, unknown>): JsonRpcId | null {
  const rawId = candidate.id;
  return typeof rawId === "string" || typeof rawId === "number" ? rawId : null;
}

/**
 * Validates the shape of a decoded value. An invalid envelope is answered only
 * when the sender could expect an answer: non-objects, or objects carrying an
 * `id` member.
 */
export function normaliseEnvelope(decoded: unknown): DecodedEnvelope {
  if (!isRecord(decoded)) {
    return { kind: "invalid", id: null, respond: true, detail: "request must be a JSON object" };
  }
  const hasId = Object.prototype.hasOwnProperty.call(decoded, "id");
  const invalid = (detail: string): DecodedEnvelope => ({ kind: "invalid", id: recoverId(decoded), respond: hasId, detail });

  if (decoded.jsonrpc !== "2.0") {
    return invalid("jsonrpc must equal '2.0'");
  }
  const method = typeof decoded.method === "string" ? decoded.method.trim() : "";
  if (!method) {
    return invalid("method must be a non-empty string");
  }
  const rawId = decoded.id;
  if (hasId && rawId !== null && typeof rawId !== "string" && typeof rawId !== "number") {
    return invalid("id must be a string, a number or null");
  }

  const request: JsonRpcRequest = {
    jsonrpc: "2.0",
    method,
    ...(hasId ? { id: recoverId(decoded) } : {}),
    ...(decoded.params !== undefined ? { params: decoded.params } : {}),
  };
  return { kind: "request", request };
}

type HandshakeHandler = (params: Record<string, unknown>) => Promise<HandlerResult<unknown>>;

export interface RelayDispatcherOptions {
  readonly context: RelayContext;
  /** Direct method table; defaults to {@link DIRECT_METHODS}. */
  readonly methods?: ReadonlyMap<string, MethodHandler>;
  readonly tools?: readonly ToolDescriptor[];
  readonly transport?: JsonRpcRouteContext["transport"];
}

/**
 * Parse → Route → Execute → Respond for one line at a time. Nothing thrown by
 * a handler escapes: every request yields at most one response, and
 * notifications never yield one.
 */
export class RelayDispatcher {
  private readonly context: RelayContext;
  private readonly methods: ReadonlyMap<string, MethodHandler>;
  private readonly tools: readonly ToolDescriptor[];
  private readonly transport: JsonRpcRouteContext["transport"];
  private readonly handshake: ReadonlyMap<string, HandshakeHandler>;

  constructor(options: RelayDispatcherOptions) {
    this.context = options.context;
    this.methods = options.methods ?? DIRECT_METHODS;
    this.tools = options.tools ?? TOOL_CATALOG;
    this.transport = options.transport ?? "stdio";
    this.handshake = new Map<string, HandshakeHandler>([
      ["initialize", (params) => this.initialize(params)],
      ["tools/list", async () => ok({ tools: this.tools })],
      ["tools/call", (params) => this.callTool(params)],
    ]);
  }

  /** Handles one raw input line. Returns `null` when nothing must be written. */
  async dispatchLine(line: string): Promise<JsonRpcResponse | null> {
    const trimmed = line.trim();
    if (!trimmed) {
      return null;
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(trimmed);
    } catch (error) {
      this.context.logger.warn("jsonrpc_parse_error", { reason: describeError(error) });
      return toJsonRpc(null, new ParseError(describeError(error)));
    }

    const envelope = normaliseEnvelope(decoded);
    if (envelope.kind === "invalid") {
      this.context.logger.warn("jsonrpc_invalid_envelope", { request_id: envelope.id, reason: envelope.detail });
      return envelope.respond ? toJsonRpc(envelope.id, new ParseError(envelope.detail)) : null;
    }
    return this.dispatch(envelope.request);
  }

  /** Routes and executes a validated request. */
  async dispatch(request: JsonRpcRequest): Promise<JsonRpcResponse | null> {
    const hasId = request.id !== undefined;
    const id = request.id ?? null;
    const route: JsonRpcRouteContext = { requestId: id, method: request.method, transport: this.transport };

    return runWithJsonRpcContext(route, async () => {
      const { logger } = this.context;
      const handler = this.resolve(request.method);
      if (!handler) {
        logger.warn("jsonrpc_method_not_found", { notification: !hasId });
        return hasId ? toJsonRpc(id, new MethodNotFoundError(request.method)) : null;
      }

      const startedAt = Date.now();
      const result = await this.execute(handler, request.params);
      const durationMs = Date.now() - startedAt;
      if (!result.ok) {
        logger.warn("jsonrpc_request_failed", { kind: result.error.kind, reason: result.error.message, duration_ms: durationMs });
        return hasId ? toJsonRpc(id, new InternalError(result.error.message)) : null;
      }
      logger.debug("jsonrpc_request_completed", { duration_ms: durationMs });
      return hasId ? { jsonrpc: "2.0", id, result: result.value } : null;
    });
  }

  private resolve(method: string): HandshakeHandler | null {
    const handshake = this.handshake.get(method);
    if (handshake) {
      return handshake;
    }
    const direct = this.methods.get(method);
    return direct ? (params) => direct(params, this.context) : null;
  }

  private async execute(handler: HandshakeHandler, rawParams: unknown): Promise<HandlerResult<unknown>> {
    let params: Record<string, unknown>;
    if (rawParams === undefined || rawParams === null) {
      params = {};
    } else if (isRecord(rawParams)) {
      params = rawParams;
    } else {
      return fail("validation", "params must be an object");
    }
    try {
      return await handler(params);
    } catch (error) {
      return fail("unexpected", describeError(error));
    }
  }

  private async initialize(params: Record<string, unknown>): Promise<HandlerResult<unknown>> {
    const parsed = InitializeParamsSchema.safeParse(params);
    const requested = parsed.success ? parsed.data.protocolVersion : undefined;
    const protocolVersion =
      requested !== undefined && SUPPORTED_PROTOCOL_VERSIONS.includes(requested) ? requested : FALLBACK_PROTOCOL_VERSION;
    return ok({
      protocolVersion,
      serverInfo: { ...SERVER_INFO },
      capabilities: { tools: {} },
    });
  }

  private async callTool(params: Record<string, unknown>): Promise<HandlerResult<unknown>> {
    const parsed = ToolsCallParamsSchema.safeParse(params);
    if (!parsed.success) {
      return fail("validation", "tools/call requires a tool name");
    }
    const name = parsed.data.name.trim();
    const direct = this.methods.get(name);
    if (!direct) {
      return fail("validation", `Unknown tool: ${name}`);
    }
    const result = await direct(parsed.data.arguments ?? {}, this.context);
    if (!result.ok) {
      return result;
    }
    return ok({ content: [{ type: "text", text: JSON.stringify(result.value) }] });
  }
}
