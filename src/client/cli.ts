#!/usr/bin/env node
import { readFile } from "node:fs/promises";
import { realpathSync } from "node:fs";
import process from "node:process";
import { setTimeout as delay } from "node:timers/promises";
import { pathToFileURL } from "node:url";

import { z } from "zod";

import { StructuredLogger } from "../logger.js";
import { describeError, type ProcessEnv } from "../nodePrimitives.js";
import type { JsonRpcSuccessResponse } from "../rpc/types.js";
import { RelayClient, RelayClientError, type RelayClientOptions } from "./rpcClient.js";

export const OUTPUT_MODES = ["json", "text", "result"] as const;
export type OutputMode = (typeof OUTPUT_MODES)[number];

/** Options of `session-relay-call`. */
export interface CliOptions {
  server: string;
  method: string;
  params: string;
  output: OutputMode;
  timeoutSeconds: number;
  verbose: boolean;
  retry: number;
  forwardTo: string | null;
  forwardPrefix: string;
}

/** Malformed command line or params; never retried. */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export const USAGE = [
  "usage: session-relay-call --server <command> --method <name> [--params <json|@file>]",
  "                          [--output json|text|result] [--timeout <seconds>] [--retry <n>] [--verbose]",
  "                          [--forward-to <session> [--forward-prefix <text>]]",
].join("\n");

const FLAG_WITH_VALUE = new Set([
  "--server",
  "--method",
  "--params",
  "--output",
  "--timeout",
  "--retry",
  "--forward-to",
  "--forward-prefix",
]);

function parsePositiveInteger(value: string, flag: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new CliUsageError(`${flag} expects a positive integer (received ${JSON.stringify(value)}).`);
  }
  return parsed;
}

export function parseCliArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = {
    server: "",
    method: "",
    params: "{}",
    output: "json",
    timeoutSeconds: 30,
    verbose: false,
    retry: 1,
    forwardTo: null,
    forwardPrefix: "",
  };

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === undefined) {
      continue;
    }
    if (arg === "-v") {
      options.verbose = true;
      continue;
    }
    if (!arg.startsWith("--")) {
      throw new CliUsageError(`unexpected argument: ${arg}`);
    }

    const separator = arg.indexOf("=");
    const flag = separator === -1 ? arg : arg.slice(0, separator);
    let value = separator === -1 ? undefined : arg.slice(separator + 1);
    if (FLAG_WITH_VALUE.has(flag) && value === undefined) {
      const next = argv[index + 1];
      if (next === undefined) {
        throw new CliUsageError(`${flag} requires a value.`);
      }
      value = next;
      index += 1;
    }

    switch (flag) {
      case "--server":
        options.server = value ?? "";
        break;
      case "--method":
        options.method = value ?? "";
        break;
      case "--params":
        options.params = value ?? "";
        break;
      case "--output": {
        const mode = OUTPUT_MODES.find((candidate) => candidate === value);
        if (!mode) {
          throw new CliUsageError(`--output expects one of ${OUTPUT_MODES.join(", ")}.`);
        }
        options.output = mode;
        break;
      }
      case "--timeout":
        options.timeoutSeconds = parsePositiveInteger(value ?? "", flag);
        break;
      case "--retry":
        options.retry = parsePositiveInteger(value ?? "", flag);
        break;
      case "--verbose":
        options.verbose = true;
        break;
      case "--forward-to":
        options.forwardTo = value ?? null;
        break;
      case "--forward-prefix":
        options.forwardPrefix = value ?? "";
        break;
      default:
        throw new CliUsageError(`unknown flag: ${flag}`);
    }
  }

  if (!options.server.trim()) {
    throw new CliUsageError("--server is required.");
  }
  if (!options.method.trim()) {
    throw new CliUsageError("--method is required.");
  }
  return options;
}

/** Replaces `${VAR}` and `${VAR:default}` with values from {@link env}; unset without default reads as empty. */
export function expandEnvVars(text: string, env: ProcessEnv): string {
  return text.replace(/\$\{([^}:]+)(?::([^}]*))?\}/g, (_match, name: string, fallback: string | undefined) => {
    return env[name] ?? fallback ?? "";
  });
}

const ParamsSchema = z.record(z.unknown());

/** Loads `--params`: inline JSON or `@path`, expanded, decoded, and required to be an object. */
export async function loadParams(
  raw: string,
  env: ProcessEnv,
  read: (filePath: string) => Promise<string> = (filePath) => readFile(filePath, "utf8"),
): Promise<Record<string, unknown>> {
  if (!raw.trim()) {
    return {};
  }
  let source = raw;
  if (raw.startsWith("@")) {
    const filePath = raw.slice(1);
    try {
      source = (await read(filePath)).trim();
    } catch (error) {
      throw new CliUsageError(`cannot read params file ${filePath}: ${describeError(error)}`);
    }
  }

  const expanded = expandEnvVars(source, env);
  let decoded: unknown;
  try {
    decoded = JSON.parse(expanded);
  } catch (error) {
    throw new CliUsageError(`params are not valid JSON: ${describeError(error)} (params: ${expanded})`);
  }
  const parsed = ParamsSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new CliUsageError("params must be a JSON object.");
  }
  return parsed.data;
}

function renderValue(value: unknown): string {
  return typeof value === "object" && value !== null ? JSON.stringify(value, null, 2) : String(value);
}

/** Renders a success response according to {@link mode}. */
export function formatResponse(response: JsonRpcSuccessResponse, mode: OutputMode): string {
  switch (mode) {
    case "json":
      return JSON.stringify(response, null, 2);
    case "result":
      return renderValue(response.result);
    case "text":
      return `ok: ${typeof response.result === "object" && response.result !== null ? JSON.stringify(response.result) : String(response.result)}`;
  }
}

/** Body forwarded by `--forward-to`: the `text` of the result, or the whole result. */
export function forwardedBody(result: unknown): string {
  if (typeof result === "object" && result !== null && "text" in result && typeof result.text === "string") {
    return result.text;
  }
  return typeof result === "string" ? result : JSON.stringify(result);
}

export interface CliIo {
  readonly stdout: { write(chunk: string): unknown };
  readonly stderr: { write(chunk: string): unknown };
  readonly env: ProcessEnv;
  readonly readParamsFile?: (filePath: string) => Promise<string>;
  /** Client factory; tests inject one bound to an in-process server. */
  readonly createClient?: (options: RelayClientOptions) => RelayClient;
  readonly retryDelayMs?: number;
}

async function callOnce(client: RelayClient, options: CliOptions, params: Record<string, unknown>, env: ProcessEnv) {
  await client.connect(options.server);
  const response = await client.request(options.method, params);
  if (!options.forwardTo) {
    return response;
  }
  const target = expandEnvVars(options.forwardTo, env);
  const prefix = expandEnvVars(options.forwardPrefix, env);
  return client.request("inject_input_to", { target_id: target, text: `${prefix}${forwardedBody(response.result)}` });
}

/** Runs one CLI invocation and returns the process exit code. */
export async function runCli(argv: readonly string[], io: CliIo): Promise<number> {
  let options: CliOptions;
  let params: Record<string, unknown>;
  try {
    options = parseCliArgs(argv);
    params = await loadParams(options.params, io.env, io.readParamsFile);
  } catch (error) {
    io.stderr.write(`${describeError(error)}\n${USAGE}\n`);
    return 1;
  }

  const logger = new StructuredLogger({ level: options.verbose ? "debug" : "warn", sink: io.stderr });
  const createClient = io.createClient ?? ((clientOptions: RelayClientOptions) => new RelayClient(clientOptions));

  for (let attemptIndex = 0; attemptIndex < options.retry; attemptIndex += 1) {
    if (attemptIndex > 0) {
      logger.info("call_retry", { attempt: attemptIndex + 1, of: options.retry });
    }
    const client = createClient({ timeoutMs: options.timeoutSeconds * 1000, logger, env: io.env });
    try {
      const response = await callOnce(client, options, params, io.env);
      io.stdout.write(`${formatResponse(response, options.output)}\n`);
      return 0;
    } catch (error) {
      if (!(error instanceof RelayClientError)) {
        io.stderr.write(`unexpected error: ${describeError(error)}\n`);
        return 1;
      }
      logger.warn("call_attempt_failed", { attempt: attemptIndex + 1, message: error.message });
      if (attemptIndex === options.retry - 1) {
        io.stderr.write(`call failed: ${error.message}\n`);
        return 1;
      }
      await delay(io.retryDelayMs ?? 1_000);
    } finally {
      await client.close();
    }
  }
  return 1;
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  try {
    return pathToFileURL(realpathSync(entry)).href === import.meta.url;
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  void runCli(process.argv.slice(2), { stdout: process.stdout, stderr: process.stderr, env: process.env }).then((code) => {
    process.exitCode = code;
  });
}
