import type { ZodType, ZodTypeDef } from "zod";

import type { RelayConfig } from "../config/relayConfig.js";
import type { TerminalMultiplexer } from "../gateways/multiplexer.js";
import type { StructuredLogger } from "../logger.js";
import { fail, formatZodIssues, ok, type HandlerResult } from "../rpc/result.js";
import type { Mailbox } from "../store/mailbox.js";
import type { RelationshipRegistry } from "../store/registry.js";

/** Collaborators handed to every method handler. */
export interface RelayContext {
  readonly config: RelayConfig;
  readonly mailbox: Mailbox;
  readonly registry: RelationshipRegistry;
  readonly multiplexer: TerminalMultiplexer;
  readonly logger: StructuredLogger;
  /** Pause between pasting input and submitting it. Tests pass a no-op. */
  readonly sleep: (ms: number) => Promise<void>;
  /** Fallback workdir when the multiplexer cannot report one. */
  readonly cwd: () => string;
}

export type MethodHandler = (params: Record<string, unknown>, context: RelayContext) => Promise<HandlerResult<unknown>>;

/** Validates raw params, folding zod issues into a `validation` failure. */
export function parseParams<T>(schema: ZodType<T, ZodTypeDef, unknown>, params: Record<string, unknown>): HandlerResult<T> {
  const parsed = schema.safeParse(params);
  return parsed.success ? ok(parsed.data) : fail("validation", `invalid params: ${formatZodIssues(parsed.error)}`);
}

/** The caller's own session id, or a failure when the server runs outside a session. */
export function requireSelf(context: RelayContext): HandlerResult<string> {
  return context.config.selfId
    ? ok(context.config.selfId)
    : fail("unavailable", "caller session id is unknown; run inside a tmux pane or set SESSION_RELAY_SELF");
}

/** Current directory of {@link sessionId}, falling back to the process cwd. */
export async function resolveSessionWorkdir(context: RelayContext, sessionId: string): Promise<string> {
  try {
    return await context.multiplexer.currentPath(sessionId);
  } catch (error) {
    context.logger.debug("workdir_fallback_to_cwd", {
      session: sessionId,
      reason: error instanceof Error ? error.message : String(error),
    });
    return context.cwd();
  }
}
