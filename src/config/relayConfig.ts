import path from "node:path";

import { LOG_LEVELS, type LogLevel } from "../logger.js";
import type { ProcessEnv } from "../nodePrimitives.js";
import { readInt, readOptionalEnum, readOptionalString, readString } from "./env.js";

/** Directory name appended to `$XDG_RUNTIME_DIR` when no explicit root is set. */
export const RUNTIME_DIRECTORY_NAME = "session-relay";

/** Fallback runtime root used when neither override nor XDG runtime dir exist. */
export const DEFAULT_RUNTIME_ROOT = "/tmp/session-relay";

export const DEFAULT_LOCK_TIMEOUT_MS = 10_000;
export const DEFAULT_LOCK_RETRY_MS = 25;
export const DEFAULT_HISTORY_LINES = 2_000;
export const DEFAULT_AGENT_COMMAND = "claude";
export const DEFAULT_SETTINGS_DIRECTORY = ".claude";

/**
 * Explicit configuration threaded into every store, gateway and handler. The
 * environment is only consulted by {@link resolveRelayConfig}; the rest of the
 * code base receives this record.
 */
export interface RelayConfig {
  /** Absolute directory hosting `inbox/` and `registry.json`. */
  readonly rootDir: string;
  /** Session id of the process hosting the server, when known. */
  readonly selfId: string | null;
  /** Maximum wait for a store lock; `0` waits forever. */
  readonly lockTimeoutMs: number;
  /** Delay between two lock acquisition attempts. */
  readonly lockRetryMs: number;
  /** Command launched inside freshly split panes. */
  readonly agentCommand: string;
  /** Capture depth used when the multiplexer does not report its history limit. */
  readonly historyLines: number;
  /** Directory (relative to an agent workdir) holding the agent settings file. */
  readonly settingsDirectory: string;
  /** Executable name of the server, embedded in hook commands and manifests. */
  readonly serverCommand: string;
  /** Executable name of the client CLI, embedded in hook commands. */
  readonly clientCommand: string;
}

/** Subset of {@link RelayConfig} callers may override programmatically. */
export type RelayConfigOverrides = Partial<RelayConfig>;

/**
 * Resolves the runtime root: `SESSION_RELAY_ROOT` first, then
 * `$XDG_RUNTIME_DIR/session-relay`, then {@link DEFAULT_RUNTIME_ROOT}.
 */
export function resolveRuntimeRoot(env: ProcessEnv): string {
  const explicit = readOptionalString(env, "SESSION_RELAY_ROOT");
  if (explicit) {
    return path.resolve(explicit);
  }
  const xdg = readOptionalString(env, "XDG_RUNTIME_DIR");
  if (xdg) {
    return path.join(path.resolve(xdg), RUNTIME_DIRECTORY_NAME);
  }
  return DEFAULT_RUNTIME_ROOT;
}

/** Builds the {@link RelayConfig} from the environment and optional overrides. */
export function resolveRelayConfig(
  env: ProcessEnv,
  overrides: RelayConfigOverrides = {},
): RelayConfig {
  const resolved: RelayConfig = {
    rootDir: resolveRuntimeRoot(env),
    selfId: readOptionalString(env, "SESSION_RELAY_SELF") ?? readOptionalString(env, "TMUX_PANE") ?? null,
    lockTimeoutMs: readInt(env, "SESSION_RELAY_LOCK_TIMEOUT_MS", DEFAULT_LOCK_TIMEOUT_MS, { min: 0 }),
    lockRetryMs: readInt(env, "SESSION_RELAY_LOCK_RETRY_MS", DEFAULT_LOCK_RETRY_MS, { min: 1 }),
    agentCommand: readString(env, "SESSION_RELAY_AGENT_CMD", DEFAULT_AGENT_COMMAND),
    historyLines: readInt(env, "SESSION_RELAY_HISTORY_LINES", DEFAULT_HISTORY_LINES, { min: 1 }),
    settingsDirectory: readString(env, "SESSION_RELAY_SETTINGS_DIR", DEFAULT_SETTINGS_DIRECTORY),
    serverCommand: "session-relay",
    clientCommand: "session-relay-call",
  };
  return { ...resolved, ...overrides };
}

/** Logger settings read from the environment; CLI flags take precedence. */
export interface LoggingConfig {
  readonly logFile: string | null;
  readonly level: LogLevel;
}

export function resolveLoggingConfig(env: ProcessEnv): LoggingConfig {
  const logFile = readOptionalString(env, "SESSION_RELAY_LOG_FILE");
  return {
    logFile: logFile ? path.resolve(logFile) : null,
    level: readOptionalEnum(env, "SESSION_RELAY_LOG_LEVEL", LOG_LEVELS) ?? "info",
  };
}
