/**
 * Gateway spawning the relay server on behalf of the client. Keeping the
 * spawn behind a factory lets tests observe the wiring without launching
 * real commands.
 */
import { spawn as nodeSpawn } from "node:child_process";
import process from "node:process";
import type { Readable, Writable } from "node:stream";

import type { ProcessEnv } from "../nodePrimitives.js";

export interface SpawnServerOptions {
  /** Executable name or absolute path. Must not be empty. */
  readonly command: string;
  /** Ordered list of arguments forwarded as-is. */
  readonly args?: readonly string[];
  /** Environment of the child (defaults to {@link process.env}). */
  readonly env?: ProcessEnv;
  readonly cwd?: string;
}

/** Error raised when the requested command name is invalid. */
export class InvalidChildProcessCommandError extends Error {
  constructor(command: string) {
    super(`Child process command must be a non-empty string. Received: "${command}".`);
    this.name = "InvalidChildProcessCommandError";
  }
}

/** Slice of a piped child process the client relies on. */
export interface ServerProcess {
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable;
  readonly exitCode: number | null;
  once(event: "exit", listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  once(event: "error", listener: (error: Error) => void): unknown;
  kill(signal?: NodeJS.Signals): boolean;
}

export interface ChildProcessGateway {
  /** Spawns a child process with stdin, stdout and stderr piped. */
  spawn(options: SpawnServerOptions): ServerProcess;
}

/** Spawn signature the gateway relies on. Node's default stdio is fully piped. */
export type SpawnImplementation = (
  command: string,
  args: readonly string[],
  options: { env: ProcessEnv; cwd?: string; shell: false },
) => ServerProcess;

interface ChildProcessGatewayDeps {
  /** Concrete spawn implementation (defaults to Node.js `spawn`). */
  readonly spawnImpl?: SpawnImplementation;
}

const defaultSpawn: SpawnImplementation = (command, args, options) => nodeSpawn(command, [...args], options);

export function createChildProcessGateway({ spawnImpl = defaultSpawn }: ChildProcessGatewayDeps = {}): ChildProcessGateway {
  return {
    spawn(options) {
      const command = options.command.trim();
      if (command.length === 0) {
        throw new InvalidChildProcessCommandError(options.command);
      }
      return spawnImpl(command, [...(options.args ?? [])], {
        env: options.env ?? process.env,
        ...(options.cwd !== undefined ? { cwd: options.cwd } : {}),
        shell: false,
      });
    },
  };
}

/**
 * Splits a server command line such as `session-relay --root /tmp/x` on
 * whitespace. Quoting is not interpreted.
 */
export function splitCommandLine(commandLine: string): { command: string; args: string[] } {
  const [command = "", ...args] = commandLine.trim().split(/\s+/);
  return { command, args };
}
