import {
  buildScreenshotHookCommand,
  buildTextHookCommand,
  ensureProjectSettings,
  mergeServerManifest,
  overwriteSettingsWithHooks,
  removeRelayHooks,
  type HookCommand,
} from "../hooks/settings.js";
import { attempt, fail, ok, type HandlerResult } from "../rpc/result.js";
import { EmptyParamsSchema, StartSessionParamsSchema, TargetParamsSchema, type StartSessionParams } from "../rpc/schemas.js";
import { applyWorkdirPolicy } from "../workdirPolicy.js";
import { parseParams, requireSelf, resolveSessionWorkdir, type RelayContext } from "./context.js";

export interface WhoamiResult {
  id: string;
  workdir: string;
  father?: string;
}

export interface SessionListing {
  id: string;
  workdir: string;
  title: string;
  father?: string;
}

/** `whoami`: the caller's id, its current directory, and its parent when registered. */
export async function whoami(params: Record<string, unknown>, context: RelayContext): Promise<HandlerResult<WhoamiResult>> {
  const parsed = parseParams(EmptyParamsSchema, params);
  if (!parsed.ok) {
    return parsed;
  }
  const self = requireSelf(context);
  if (!self.ok) {
    return self;
  }

  const workdir = await resolveSessionWorkdir(context, self.value);
  const father = await attempt("store", () => context.registry.getFather(self.value));
  if (!father.ok) {
    return father;
  }
  return ok({ id: self.value, workdir, ...(father.value ? { father: father.value } : {}) });
}

/** `list`: every pane known to the multiplexer, annotated with its registered parent. */
export async function listSessions(
  params: Record<string, unknown>,
  context: RelayContext,
): Promise<HandlerResult<SessionListing[]>> {
  const parsed = parseParams(EmptyParamsSchema, params);
  if (!parsed.ok) {
    return parsed;
  }
  const panes = await attempt("gateway", () => context.multiplexer.listPanes(), (message) => `tmux list-panes failed: ${message}`);
  if (!panes.ok) {
    return panes;
  }
  const children = await attempt("store", () => context.registry.listChildren());
  if (!children.ok) {
    return children;
  }

  const fathers = new Map(children.value.map((entry) => [entry.child, entry.father]));
  return ok(
    panes.value.map((pane) => {
      const father = fathers.get(pane.id);
      return { id: pane.id, workdir: pane.workdir, title: pane.title, ...(father ? { father } : {}) };
    }),
  );
}

function creationHookCommands(params: StartSessionParams, context: RelayContext, childId: string): HookCommand[] {
  if (!params.add_hook || params.calledagent === undefined) {
    return [];
  }
  const target = {
    clientCommand: context.config.clientCommand,
    serverCommand: context.config.serverCommand,
    calledAgent: params.calledagent,
  };
  if (params.hook_mode === "screenshot") {
    return [buildScreenshotHookCommand(target, childId)];
  }
  return [buildTextHookCommand(target, `[msg from ${childId}] ${params.text ?? ""}`)];
}

/**
 * Prepares the agent-owned settings of a fresh session: MCP opt-in, relay
 * manifest entry, then either the creation hooks or a cleanup of stale relay
 * hooks. Failures are logged; the session already exists at this point.
 */
async function prepareAgentSettings(
  params: StartSessionParams,
  context: RelayContext,
  childId: string,
  workdir: string,
): Promise<void> {
  const { config, logger } = context;
  try {
    await ensureProjectSettings(workdir, config.settingsDirectory, { logger });
    await mergeServerManifest(
      workdir,
      {
        name: config.serverCommand,
        command: config.serverCommand,
        args: [],
        env: { SESSION_RELAY_ROOT: config.rootDir },
      },
      { logger },
    );
    if (params.add_hook) {
      await overwriteSettingsWithHooks(workdir, config.settingsDirectory, creationHookCommands(params, context, childId));
    } else {
      const removed = await removeRelayHooks(workdir, config.settingsDirectory, config.serverCommand);
      if (removed > 0) {
        logger.info("relay_hooks_removed", { session: childId, removed });
      }
    }
  } catch (error) {
    logger.warn("agent_settings_failed", {
      session: childId,
      workdir,
      reason: error instanceof Error ? error.message : String(error),
    });
  }
}

/**
 * `start_new_session_and_get_return_id`: splits the caller's pane, launches
 * the agent command in the validated workdir and records the parent link.
 */
export async function startSession(
  params: Record<string, unknown>,
  context: RelayContext,
): Promise<HandlerResult<{ id: string }>> {
  const parsed = parseParams(StartSessionParamsSchema, params);
  if (!parsed.ok) {
    return parsed;
  }
  const parent = requireSelf(context);
  if (!parent.ok) {
    return parent;
  }

  const requested = parsed.value.workdir ?? (await resolveSessionWorkdir(context, parent.value));
  const workdir = await attempt("validation", () => applyWorkdirPolicy(requested, parsed.value.workdir_policy));
  if (!workdir.ok) {
    return workdir;
  }

  const { multiplexer, config, logger } = context;
  const child = await attempt(
    "gateway",
    () => multiplexer.splitPane(parent.value, workdir.value, config.agentCommand, "down"),
    (message) => `tmux split-window failed: ${message}`,
  );
  if (!child.ok) {
    return child;
  }
  if (!child.value) {
    return fail("gateway", "tmux split-window returned no pane id");
  }

  try {
    await multiplexer.setTitle(child.value, `agent:${child.value}`);
  } catch (error) {
    logger.warn("pane_title_failed", { session: child.value, reason: error instanceof Error ? error.message : String(error) });
  }

  await prepareAgentSettings(parsed.value, context, child.value, workdir.value);

  const registered = await attempt("store", () => context.registry.setChild(parent.value, child.value, workdir.value));
  if (!registered.ok) {
    return registered;
  }
  logger.info("session_started", { parent: parent.value, session: child.value, workdir: workdir.value });
  return ok({ id: child.value });
}

/** `kill_pane_and_agent`: closes the pane; the multiplexer terminates whatever runs in it. */
export async function killSession(
  params: Record<string, unknown>,
  context: RelayContext,
): Promise<HandlerResult<{ ok: true }>> {
  const parsed = parseParams(TargetParamsSchema, params);
  if (!parsed.ok) {
    return parsed;
  }
  const killed = await attempt(
    "gateway",
    () => context.multiplexer.killPane(parsed.value.target_id),
    (message) => `tmux kill-pane failed: ${message}`,
  );
  if (!killed.ok) {
    return killed;
  }
  context.logger.info("session_killed", { session: parsed.value.target_id });
  return ok({ ok: true });
}
