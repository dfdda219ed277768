import path from "node:path";

import { z } from "zod";

import type { StructuredLogger } from "../logger.js";
import { inspectJsonDocument, updateJsonDocument, writeJsonDocument } from "../store/jsonDocument.js";

/**
 * Agent-owned project files touched by the relay:
 *
 * - `<workdir>/<settingsDir>/settings.local.json`: MCP opt-in and Stop hooks.
 * - `<workdir>/.mcp.json`: the manifest declaring the relay server.
 *
 * These files belong to the agent, so anything the relay does not manage is
 * preserved as-is.
 */

type JsonObject = Record<string, unknown>;

const JsonObjectSchema = z.record(z.unknown());

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Single hook invocation as stored under `hooks.Stop[].hooks[]`. */
export interface HookCommand {
  readonly type: "command";
  readonly command: string;
}

/** Outcome of {@link appendStopHook}. */
export interface AppendStopHookResult {
  readonly path: string;
  readonly added: string[];
  readonly skipped: string[];
}

/** Server entry merged into `.mcp.json`. */
export interface ServerManifestEntry {
  readonly name: string;
  readonly command: string;
  readonly args: readonly string[];
  readonly env: Readonly<Record<string, string>>;
}

export function settingsFilePath(workdir: string, settingsDirectory: string): string {
  return path.join(path.resolve(workdir), settingsDirectory, "settings.local.json");
}

export function manifestFilePath(workdir: string): string {
  return path.join(path.resolve(workdir), ".mcp.json");
}

/** Wraps a value in single quotes for POSIX shells. */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export interface HookCommandTarget {
  /** Client executable embedded in the hook. */
  readonly clientCommand: string;
  /** Server executable the client spawns. */
  readonly serverCommand: string;
  /** Session receiving the callback. */
  readonly calledAgent: string;
}

/**
 * Hook injecting `text` into the called agent once the hooked agent stops.
 * `${VAR}` references survive shell quoting and are expanded by the client.
 */
export function buildTextHookCommand(target: HookCommandTarget, text: string): HookCommand {
  const params = JSON.stringify({ target_id: target.calledAgent, text });
  return {
    type: "command",
    command: [
      target.clientCommand,
      "--server",
      shellQuote(target.serverCommand),
      "--method",
      "inject_input_to",
      "--params",
      shellQuote(params),
      "--output",
      "text",
    ].join(" "),
  };
}

/**
 * Hook capturing the hooked pane and forwarding the capture, prefixed with
 * `[screenshot from <hooked>]`, to the called agent.
 */
export function buildScreenshotHookCommand(target: HookCommandTarget, hookedRef: string): HookCommand {
  const params = JSON.stringify({ target_id: hookedRef });
  return {
    type: "command",
    command: [
      target.clientCommand,
      "--server",
      shellQuote(target.serverCommand),
      "--method",
      "get_screenshot_from",
      "--params",
      shellQuote(params),
      "--output",
      "result",
      "--forward-to",
      shellQuote(target.calledAgent),
      "--forward-prefix",
      shellQuote(`[screenshot from ${hookedRef}]\n`),
    ].join(" "),
  };
}

export interface SettingsIoOptions {
  readonly logger?: StructuredLogger;
}

/** Sets `enableAllProjectMcpServers: true` unless the agent already chose a value. */
export async function ensureProjectSettings(
  workdir: string,
  settingsDirectory: string,
  options: SettingsIoOptions = {},
): Promise<void> {
  const filePath = settingsFilePath(workdir, settingsDirectory);
  await updateJsonDocument(
    filePath,
    JsonObjectSchema,
    (): JsonObject => ({}),
    (current) => {
      if (Object.prototype.hasOwnProperty.call(current, "enableAllProjectMcpServers")) {
        return { document: current, changed: false, result: undefined };
      }
      return { document: { ...current, enableAllProjectMcpServers: true }, changed: true, result: undefined };
    },
    {
      onCorrupt: "reset",
      onDiscard: ({ reason }) => options.logger?.warn("settings_reset", { path: filePath, reason }),
    },
  );
}

/**
 * Merges {@link entry} into `mcpServers` of `.mcp.json`. Existing keys win,
 * `env` is merged key by key, `args` is only set when absent.
 */
export async function mergeServerManifest(
  workdir: string,
  entry: ServerManifestEntry,
  options: SettingsIoOptions = {},
): Promise<void> {
  const filePath = manifestFilePath(workdir);
  await updateJsonDocument(
    filePath,
    JsonObjectSchema,
    (): JsonObject => ({}),
    (current) => {
      const servers: JsonObject = isJsonObject(current.mcpServers) ? { ...current.mcpServers } : {};
      const existing = servers[entry.name];
      const incoming: JsonObject = { command: entry.command, args: [...entry.args], env: { ...entry.env } };

      if (!isJsonObject(existing)) {
        servers[entry.name] = incoming;
      } else {
        const merged: JsonObject = { ...existing };
        for (const [key, value] of Object.entries(incoming)) {
          if (key === "env" && isJsonObject(existing.env) && isJsonObject(value)) {
            merged.env = { ...value, ...existing.env };
          } else if (!Object.prototype.hasOwnProperty.call(existing, key)) {
            merged[key] = value;
          }
        }
        servers[entry.name] = merged;
      }

      const document = { ...current, mcpServers: servers };
      const changed = JSON.stringify(document) !== JSON.stringify(current);
      return { document, changed, result: undefined };
    },
    {
      onCorrupt: "reset",
      onDiscard: ({ reason }) => options.logger?.warn("manifest_reset", { path: filePath, reason }),
    },
  );
}

/** Replaces the settings file with the MCP opt-in and a single Stop entry. */
export async function overwriteSettingsWithHooks(
  workdir: string,
  settingsDirectory: string,
  commands: readonly HookCommand[],
): Promise<void> {
  await writeJsonDocument(settingsFilePath(workdir, settingsDirectory), {
    enableAllProjectMcpServers: true,
    hooks: { Stop: [{ hooks: commands }] },
  });
}

function stopEntries(document: JsonObject): unknown[] {
  const hooks = document.hooks;
  if (!isJsonObject(hooks) || !Array.isArray(hooks.Stop)) {
    return [];
  }
  return hooks.Stop;
}

function hookCommandOf(hook: unknown): string | null {
  return isJsonObject(hook) && typeof hook.command === "string" ? hook.command : null;
}

/**
 * Drops every Stop hook whose command mentions {@link marker}; entries left
 * empty are removed. Missing or unreadable files are left alone. Returns the
 * number of hooks removed.
 */
export async function removeRelayHooks(workdir: string, settingsDirectory: string, marker: string): Promise<number> {
  const filePath = settingsFilePath(workdir, settingsDirectory);
  const outcome = await inspectJsonDocument(filePath, JsonObjectSchema);
  if (outcome.status !== "ok") {
    return 0;
  }
  const document = outcome.document;
  const hooks = document.hooks;
  if (!isJsonObject(hooks) || !Array.isArray(hooks.Stop)) {
    return 0;
  }

  let removed = 0;
  const kept: unknown[] = [];
  for (const entry of hooks.Stop) {
    if (!isJsonObject(entry) || !Array.isArray(entry.hooks)) {
      kept.push(entry);
      continue;
    }
    const inner = entry.hooks.filter((hook) => !(hookCommandOf(hook)?.includes(marker) ?? false));
    removed += entry.hooks.length - inner.length;
    if (inner.length > 0) {
      kept.push({ ...entry, hooks: inner });
    }
  }

  if (removed > 0) {
    await writeJsonDocument(filePath, { ...document, hooks: { ...hooks, Stop: kept } });
  }
  return removed;
}

/**
 * Appends {@link commands} as a new Stop entry, skipping commands already
 * present anywhere under `hooks.Stop`. A corrupt settings file is moved to
 * `<path>.bak` and replaced.
 */
export async function appendStopHook(
  workdir: string,
  settingsDirectory: string,
  commands: readonly HookCommand[],
  options: SettingsIoOptions = {},
): Promise<AppendStopHookResult> {
  const filePath = settingsFilePath(workdir, settingsDirectory);
  return updateJsonDocument(
    filePath,
    JsonObjectSchema,
    (): JsonObject => ({}),
    (current) => {
      const existing = new Set<string>();
      for (const entry of stopEntries(current)) {
        if (isJsonObject(entry) && Array.isArray(entry.hooks)) {
          for (const hook of entry.hooks) {
            const command = hookCommandOf(hook);
            if (command !== null) {
              existing.add(command);
            }
          }
        }
      }

      const fresh = commands.filter((hook) => !existing.has(hook.command));
      const result: AppendStopHookResult = {
        path: filePath,
        added: fresh.map((hook) => hook.command),
        skipped: commands.filter((hook) => existing.has(hook.command)).map((hook) => hook.command),
      };
      if (fresh.length === 0) {
        return { document: current, changed: false, result };
      }

      const hooks: JsonObject = isJsonObject(current.hooks) ? current.hooks : {};
      const document = {
        ...current,
        hooks: { ...hooks, Stop: [...stopEntries(current), { hooks: fresh }] },
      };
      return { document, changed: true, result };
    },
    {
      onCorrupt: "backup",
      onDiscard: ({ reason, backupPath }) => options.logger?.warn("settings_backed_up", { path: filePath, reason, backup: backupPath }),
    },
  );
}
