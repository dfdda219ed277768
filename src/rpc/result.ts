import { ZodError } from "zod";

import { describeError } from "../nodePrimitives.js";

/** Where a handler failure originated. Only used for logs; the wire code is shared. */
export type HandlerFailureKind = "validation" | "store" | "gateway" | "unavailable" | "unexpected";

export interface HandlerFailure {
  readonly kind: HandlerFailureKind;
  readonly message: string;
}

/**
 * Explicit outcome returned by every method handler. The dispatch engine maps
 * failures onto the JSON-RPC error shape.
 */
export type HandlerResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: HandlerFailure };

export function ok<T>(value: T): HandlerResult<T> {
  return { ok: true, value };
}

export function fail<T = never>(kind: HandlerFailureKind, message: string): HandlerResult<T> {
  return { ok: false, error: { kind, message } };
}

/**
 * Formats zod issues as `path: message` pairs joined by `; `. Missing fields
 * read as `target_id: Required`.
 */
export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Runs an operation that may reject (store I/O, multiplexer calls) and folds
 * the rejection into a {@link HandlerResult} of the given kind.
 */
export async function attempt<T>(
  kind: HandlerFailureKind,
  operation: () => Promise<T>,
  describe: (message: string) => string = (message) => message,
): Promise<HandlerResult<T>> {
  try {
    return ok(await operation());
  } catch (error) {
    return fail(kind, describe(describeError(error)));
  }
}
