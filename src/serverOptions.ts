import { LOG_LEVELS, type LogLevel } from "./logger.js";

/** Runtime options of the relay server parsed from its command line. */
export interface ServerRuntimeOptions {
  /** Runtime root overriding the environment. */
  rootDir: string | null;
  /** Optional file mirroring the stderr log stream. */
  logFile: string | null;
  /** Minimum log level, `null` to keep the environment's choice. */
  logLevel: LogLevel | null;
  /** Lock wait bound in milliseconds, `null` to keep the environment's choice. */
  lockTimeoutMs: number | null;
}

const FLAG_WITH_VALUE = new Set(["--root", "--log-file", "--log-level", "--lock-timeout-ms"]);

/** Raised on malformed command lines; the entry point prints it and exits. */
export class ServerOptionsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ServerOptionsError";
  }
}

function parseNonNegativeInteger(value: string, flag: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new ServerOptionsError(`${flag} expects a non-negative integer (received ${JSON.stringify(value)}).`);
  }
  return parsed;
}

function parseLogLevel(value: string, flag: string): LogLevel {
  const level = LOG_LEVELS.find((candidate) => candidate === value.trim().toLowerCase());
  if (!level) {
    throw new ServerOptionsError(`${flag} expects one of ${LOG_LEVELS.join(", ")}.`);
  }
  return level;
}

function requireNonEmpty(value: string, flag: string): string {
  const trimmed = value.trim();
  if (!trimmed.length) {
    throw new ServerOptionsError(`${flag} cannot be empty.`);
  }
  return trimmed;
}

/**
 * Parses `process.argv.slice(2)`. Flags accept `--flag value` and
 * `--flag=value`; unknown flags and positional arguments are ignored so MCP
 * hosts can pass extra arguments safely.
 */
export function parseServerRuntimeOptions(argv: readonly string[]): ServerRuntimeOptions {
  const options: ServerRuntimeOptions = { rootDir: null, logFile: null, logLevel: null, lockTimeoutMs: null };

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === undefined || !arg.startsWith("--")) {
      continue;
    }

    const separator = arg.indexOf("=");
    const flag = separator === -1 ? arg : arg.slice(0, separator);
    let value = separator === -1 ? undefined : arg.slice(separator + 1);

    if (FLAG_WITH_VALUE.has(flag) && (value === undefined || value === "")) {
      const next = argv[index + 1];
      if (next === undefined || next.startsWith("--")) {
        throw new ServerOptionsError(`${flag} requires a value.`);
      }
      value = next;
      index += 1;
    }

    switch (flag) {
      case "--root":
        options.rootDir = requireNonEmpty(value ?? "", flag);
        break;
      case "--log-file":
        options.logFile = requireNonEmpty(value ?? "", flag);
        break;
      case "--log-level":
        options.logLevel = parseLogLevel(value ?? "", flag);
        break;
      case "--lock-timeout-ms":
        options.lockTimeoutMs = parseNonNegativeInteger(value ?? "", flag);
        break;
      default:
        break;
    }
  }

  return options;
}
