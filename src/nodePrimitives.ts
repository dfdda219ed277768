import process from "node:process";

/** Environment snapshot accepted by the configuration readers. */
export type ProcessEnv = typeof process.env;

/**
 * Lightweight representation of an errno-flavoured error. Only the properties
 * the relay actually inspects are listed.
 */
export interface ErrnoException extends Error {
  code?: string;
  errno?: number;
  path?: string;
  syscall?: string;
}

/**
 * Narrows an unknown failure to an {@link ErrnoException}, optionally checking
 * the errno code (`ENOENT`, `EEXIST`, ...).
 */
export function isErrnoException(error: unknown, code?: string): error is ErrnoException {
  if (!(error instanceof Error) || !("code" in error)) {
    return false;
  }
  return code === undefined || error.code === code;
}

/** Extracts a printable message from any thrown value. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
