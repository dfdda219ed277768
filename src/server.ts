#!/usr/bin/env node
import { mkdir } from "node:fs/promises";
import { realpathSync } from "node:fs";
import process from "node:process";
import { pathToFileURL } from "node:url";

import { resolveLoggingConfig, resolveRelayConfig, type RelayConfigOverrides } from "./config/relayConfig.js";
import { StructuredLogger } from "./logger.js";
import { describeError } from "./nodePrimitives.js";
import { createRelayRuntime } from "./relayRuntime.js";
import { runStdioEngine } from "./rpc/stdioEngine.js";
import { parseServerRuntimeOptions } from "./serverOptions.js";

/**
 * Bootstraps the relay when executed directly: resolves configuration (flags
 * over environment), then serves JSON-RPC over stdio until stdin closes.
 * stdout carries the protocol only; logs go to stderr.
 */
async function main(): Promise<void> {
  const bootLogger = new StructuredLogger();
  let options;
  try {
    options = parseServerRuntimeOptions(process.argv.slice(2));
  } catch (error) {
    bootLogger.error("cli_options_invalid", { message: describeError(error) });
    process.exit(1);
  }

  const logging = resolveLoggingConfig(process.env);
  const logger = new StructuredLogger({
    logFile: options.logFile ?? logging.logFile,
    level: options.logLevel ?? logging.level,
  });

  const overrides: RelayConfigOverrides = {
    ...(options.rootDir !== null ? { rootDir: options.rootDir } : {}),
    ...(options.lockTimeoutMs !== null ? { lockTimeoutMs: options.lockTimeoutMs } : {}),
  };
  const config = resolveRelayConfig(process.env, overrides);

  try {
    await mkdir(config.rootDir, { recursive: true });
  } catch (error) {
    logger.error("runtime_root_unavailable", { root: config.rootDir, message: describeError(error) });
    await logger.flush();
    process.exit(1);
  }

  const { dispatcher } = createRelayRuntime(config, logger);
  logger.info("relay_started", { root: config.rootDir, self: config.selfId, pid: process.pid });

  try {
    await runStdioEngine({ input: process.stdin, output: process.stdout, dispatcher, logger });
  } catch (error) {
    logger.error("stdio_engine_failed", { message: describeError(error) });
    await logger.flush();
    process.exit(1);
  }
  await logger.flush();
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
  void main();
}
