import process from "node:process";

import { z } from "zod";

import {
  createChildProcessGateway,
  splitCommandLine,
  type ChildProcessGateway,
  type ServerProcess,
} from "../gateways/childProcess.js";
import type { StructuredLogger } from "../logger.js";
import { describeError, type ProcessEnv } from "../nodePrimitives.js";
import type { JsonRpcErrorObject, JsonRpcSuccessResponse } from "../rpc/types.js";

/** Protocol version the client asks for during `initialize`. */
export const CLIENT_PROTOCOL_VERSION = "2024-11-05";

export const CLIENT_INFO = { name: "session-relay-call", version: "0.1.0" } as const;

/** Grace period given to the server to exit after stdin closes. */
const SHUTDOWN_GRACE_MS = 1_000;

/** Base class of every client-side failure. */
export class RelayClientError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RelayClientError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** The server answered with a JSON-RPC error object. */
export class RelayRemoteError extends RelayClientError {
  readonly code: number;
  readonly data?: unknown;

  constructor(error: JsonRpcErrorObject) {
    const detail = error.data !== undefined ? ` - ${typeof error.data === "string" ? error.data : JSON.stringify(error.data)}` : "";
    super(`server error [${error.code}]: ${error.message}${detail}`);
    this.name = "RelayRemoteError";
    this.code = error.code;
    this.data = error.data;
  }
}

export class RelayTimeoutError extends RelayClientError {
  constructor(method: string, timeoutMs: number) {
    super(`no response to ${method} within ${timeoutMs}ms`);
    this.name = "RelayTimeoutError";
  }
}

/** The server could not be started, exited, or its pipes broke. */
export class RelayConnectionError extends RelayClientError {
  constructor(message: string) {
    super(message);
    this.name = "RelayConnectionError";
  }
}

const ResponseSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: z.union([z.string(), z.number(), z.null()]),
  result: z.unknown().optional(),
  error: z
    .object({
      code: z.number(),
      message: z.string(),
      data: z.unknown().optional(),
    })
    .optional(),
});

interface PendingRequest {
  readonly method: string;
  readonly resolve: (response: JsonRpcSuccessResponse) => void;
  readonly reject: (error: RelayClientError) => void;
  readonly timer: NodeJS.Timeout;
}

export interface RelayClientOptions {
  /** Per-request timeout in milliseconds. */
  readonly timeoutMs: number;
  readonly logger?: StructuredLogger;
  readonly gateway?: ChildProcessGateway;
  readonly env?: ProcessEnv;
}

/**
 * Line-oriented JSON-RPC client driving a relay server spawned as a child
 * process. Requests carry monotonically increasing string ids; responses are
 * matched back by id.
 */
export class RelayClient {
  private readonly timeoutMs: number;
  private readonly logger?: StructuredLogger;
  private readonly gateway: ChildProcessGateway;
  private readonly env: ProcessEnv;
  private readonly pending = new Map<string, PendingRequest>();
  private server: ServerProcess | null = null;
  private stdoutBuffer = "";
  private lastId = 0;
  private exited: Promise<void> = Promise.resolve();
  private failure: RelayConnectionError | null = null;

  constructor(options: RelayClientOptions) {
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger;
    this.gateway = options.gateway ?? createChildProcessGateway();
    this.env = options.env ?? process.env;
  }

  /** Spawns {@link serverCommand}, then performs the `initialize` handshake. */
  async connect(serverCommand: string): Promise<unknown> {
    const { command, args } = splitCommandLine(serverCommand);
    let server: ServerProcess;
    try {
      server = this.gateway.spawn({ command, args, env: this.env });
    } catch (error) {
      throw new RelayConnectionError(`cannot start server: ${describeError(error)}`);
    }
    this.server = server;
    this.failure = null;

    // A process that failed to spawn emits `error` and never `exit`.
    this.exited = new Promise((resolve) => {
      server.once("exit", (code, signal) => {
        this.abort(new RelayConnectionError(`server exited (code ${code ?? "null"}, signal ${signal ?? "none"})`));
        resolve();
      });
      server.once("error", (error) => {
        this.abort(new RelayConnectionError(`server process error: ${error.message}`));
        resolve();
      });
    });
    server.stdin.on("error", (error: Error) => {
      this.abort(new RelayConnectionError(`server stdin closed: ${error.message}`));
    });
    server.stdout.setEncoding("utf8");
    server.stdout.on("data", (chunk: string) => this.handleStdout(chunk));
    server.stderr.setEncoding("utf8");
    server.stderr.on("data", (chunk: string) => this.logger?.debug("server_stderr", { chunk: chunk.trimEnd() }));

    const response = await this.request("initialize", {
      protocolVersion: CLIENT_PROTOCOL_VERSION,
      capabilities: {},
      clientInfo: { ...CLIENT_INFO },
    });
    this.notify("notifications/initialized");
    this.logger?.debug("client_connected", { server: serverCommand });
    return response.result;
  }

  /** Sends a request and resolves with the success response. */
  request(method: string, params?: Record<string, unknown>): Promise<JsonRpcSuccessResponse> {
    const server = this.server;
    if (!server) {
      return Promise.reject(new RelayConnectionError("not connected"));
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }

    this.lastId += 1;
    const id = String(this.lastId);
    const message = { jsonrpc: "2.0", id, method, ...(params && Object.keys(params).length > 0 ? { params } : {}) };

    return new Promise<JsonRpcSuccessResponse>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(id);
        reject(new RelayTimeoutError(method, this.timeoutMs));
      }, this.timeoutMs);
      this.pending.set(id, { method, resolve, reject, timer });
      this.logger?.debug("client_request_sent", { id, method });
      server.stdin.write(`${JSON.stringify(message)}\n`);
    });
  }

  /** Fire-and-forget notification: no id, no response expected. */
  notify(method: string, params?: Record<string, unknown>): void {
    if (!this.server || this.failure) {
      throw this.failure ?? new RelayConnectionError("not connected");
    }
    this.server.stdin.write(`${JSON.stringify({ jsonrpc: "2.0", method, ...(params ? { params } : {}) })}\n`);
  }

  /** Closes stdin and waits for the server to exit, killing it after a grace period. */
  async close(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;
    server.stdin.end();
    if (server.exitCode === null) {
      const grace = setTimeout(() => server.kill("SIGTERM"), SHUTDOWN_GRACE_MS);
      await this.exited;
      clearTimeout(grace);
    }
    this.abort(new RelayConnectionError("client closed"));
  }

  private handleStdout(chunk: string): void {
    this.stdoutBuffer += chunk;
    let newlineIndex = this.stdoutBuffer.indexOf("\n");
    while (newlineIndex !== -1) {
      const line = this.stdoutBuffer.slice(0, newlineIndex).trim();
      this.stdoutBuffer = this.stdoutBuffer.slice(newlineIndex + 1);
      if (line.length > 0) {
        this.handleLine(line);
      }
      newlineIndex = this.stdoutBuffer.indexOf("\n");
    }
  }

  private handleLine(line: string): void {
    let decoded: unknown;
    try {
      decoded = JSON.parse(line);
    } catch {
      this.logger?.debug("client_ignored_output", { line });
      return;
    }
    const parsed = ResponseSchema.safeParse(decoded);
    if (!parsed.success || parsed.data.id === null) {
      this.logger?.debug("client_ignored_output", { line });
      return;
    }
    const id = String(parsed.data.id);
    const pending = this.pending.get(id);
    if (!pending) {
      this.logger?.debug("client_unmatched_response", { id });
      return;
    }
    this.pending.delete(id);
    clearTimeout(pending.timer);
    this.logger?.debug("client_response_received", { id, method: pending.method });

    if (parsed.data.error) {
      pending.reject(new RelayRemoteError(parsed.data.error));
      return;
    }
    pending.resolve({ jsonrpc: "2.0", id: parsed.data.id, result: parsed.data.result });
  }

  private abort(error: RelayConnectionError): void {
    if (!this.failure) {
      this.failure = error;
    }
    for (const [id, pending] of this.pending) {
      clearTimeout(pending.timer);
      pending.reject(error);
      this.pending.delete(id);
    }
  }
}
