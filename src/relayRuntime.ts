import process from "node:process";
import { setTimeout as delay } from "node:timers/promises";

import type { RelayConfig } from "./config/relayConfig.js";
import { createTmuxMultiplexer, type TerminalMultiplexer } from "./gateways/multiplexer.js";
import type { StructuredLogger } from "./logger.js";
import type { RelayContext } from "./methods/index.js";
import { RuntimeLayout } from "./paths.js";
import { RelayDispatcher } from "./rpc/dispatcher.js";
import type { FileLockOptions } from "./store/fileLock.js";
import { Mailbox } from "./store/mailbox.js";
import { RelationshipRegistry } from "./store/registry.js";

export interface RelayRuntime {
  readonly context: RelayContext;
  readonly dispatcher: RelayDispatcher;
}

export interface RelayRuntimeOverrides {
  readonly multiplexer?: TerminalMultiplexer;
  readonly sleep?: (ms: number) => Promise<void>;
  readonly cwd?: () => string;
  readonly transport?: "stdio" | "memory";
}

/** Wires stores, gateway and dispatcher from one explicit configuration. */
export function createRelayRuntime(
  config: RelayConfig,
  logger: StructuredLogger,
  overrides: RelayRuntimeOverrides = {},
): RelayRuntime {
  const layout = new RuntimeLayout(config.rootDir);
  const lock: FileLockOptions = {
    timeoutMs: config.lockTimeoutMs,
    retryMs: config.lockRetryMs,
    onStaleLock: (details) => logger.warn("stale_lock_reclaimed", details),
  };
  const context: RelayContext = {
    config,
    logger,
    mailbox: new Mailbox({ layout, lock, logger }),
    registry: new RelationshipRegistry({ layout, lock, logger }),
    multiplexer: overrides.multiplexer ?? createTmuxMultiplexer(),
    sleep: overrides.sleep ?? ((ms) => delay(ms)),
    cwd: overrides.cwd ?? (() => process.cwd()),
  };
  return { context, dispatcher: new RelayDispatcher({ context, transport: overrides.transport ?? "stdio" }) };
}
