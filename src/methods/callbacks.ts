import { appendStopHook, buildScreenshotHookCommand, buildTextHookCommand, type AppendStopHookResult } from "../hooks/settings.js";
import { attempt, ok, type HandlerResult } from "../rpc/result.js";
import { AddCallbackHookParamsSchema } from "../rpc/schemas.js";
import { parseParams, type RelayContext } from "./context.js";

/**
 * Reference to the hooked session inside hook commands. The hook runs in the
 * hooked agent's pane, where the multiplexer exports its id; the client
 * expands it at run time.
 */
export const HOOKED_SESSION_REF = "${TMUX_PANE}";

/**
 * `add_callback_hook_when_completed`: appends a Stop hook to the hooked
 * agent's settings so the called agent hears back once it finishes. Only
 * sessions started afterwards in that workdir pick the hook up.
 */
export async function addCallbackHook(
  params: Record<string, unknown>,
  context: RelayContext,
): Promise<HandlerResult<AppendStopHookResult>> {
  const parsed = parseParams(AddCallbackHookParamsSchema, params);
  if (!parsed.ok) {
    return parsed;
  }
  const input = parsed.value;
  const { config, logger } = context;
  const target = {
    clientCommand: config.clientCommand,
    serverCommand: config.serverCommand,
    calledAgent: input.calledagent,
  };
  const command =
    input.mode === "screenshot"
      ? buildScreenshotHookCommand(target, HOOKED_SESSION_REF)
      : buildTextHookCommand(target, `[msg from ${HOOKED_SESSION_REF}] ${input.text ?? ""}`);

  const appended = await attempt("store", () =>
    appendStopHook(input.hooked_workdir, config.settingsDirectory, [command], { logger }),
  );
  if (!appended.ok) {
    return appended;
  }
  logger.info("callback_hook_appended", {
    hooked: input.hookedagent,
    called: input.calledagent,
    mode: input.mode,
    added: appended.value.added.length,
  });
  return ok(appended.value);
}
