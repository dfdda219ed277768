import { ErrorCode } from "@modelcontextprotocol/sdk/types.js";

import type { JsonRpcErrorResponse, JsonRpcId } from "./types.js";

/**
 * Canonical taxonomy of the JSON-RPC errors the relay emits. Three codes are
 * enough: undecodable input, unknown method, and every handler failure.
 */
export const JSON_RPC_ERROR_TAXONOMY = {
  PARSE_ERROR: { code: ErrorCode.ParseError, message: "Parse error" },
  METHOD_NOT_FOUND: { code: ErrorCode.MethodNotFound, message: "Method not found" },
  INTERNAL: { code: -32000, message: "Internal error" },
} as const;

export type JsonRpcErrorCategory = keyof typeof JSON_RPC_ERROR_TAXONOMY;

/**
 * Typed JSON-RPC error. The engine builds these from routing outcomes and
 * handler failures; handlers themselves never throw them across the protocol
 * boundary.
 */
export class JsonRpcError extends Error {
  readonly category: JsonRpcErrorCategory;
  readonly code: number;
  readonly data?: unknown;

  constructor(category: JsonRpcErrorCategory, message?: string, data?: unknown) {
    const taxonomy = JSON_RPC_ERROR_TAXONOMY[category];
    super(message ?? taxonomy.message);
    this.category = category;
    this.code = taxonomy.code;
    this.data = data;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Undecodable request line. The data carries the decoder's message. */
export class ParseError extends JsonRpcError {
  constructor(detail: string) {
    super("PARSE_ERROR", undefined, detail);
  }
}

export class MethodNotFoundError extends JsonRpcError {
  readonly method: string;

  constructor(method: string) {
    super("METHOD_NOT_FOUND", `Method not found: ${method}`);
    this.method = method;
  }
}

/** Handler failure: fixed message, the failure's own message as data. */
export class InternalError extends JsonRpcError {
  constructor(detail: string) {
    super("INTERNAL", undefined, detail);
  }
}

/** Formats a {@link JsonRpcError} into a wire response. */
export function toJsonRpc(id: JsonRpcId | null, error: JsonRpcError): JsonRpcErrorResponse {
  return {
    jsonrpc: "2.0",
    id,
    error: {
      code: error.code,
      message: error.message,
      ...(error.data !== undefined ? { data: error.data } : {}),
    },
  };
}
