import { addCallbackHook } from "./callbacks.js";
import { getScreenshot } from "./capture.js";
import type { MethodHandler } from "./context.js";
import { checkMessageBox, injectInput, sendMessage } from "./messaging.js";
import { killSession, listSessions, startSession, whoami } from "./sessions.js";

export type { MethodHandler, RelayContext } from "./context.js";

/** Direct method namespace, also reachable through `tools/call`. */
export const DIRECT_METHODS: ReadonlyMap<string, MethodHandler> = new Map<string, MethodHandler>([
  ["whoami", whoami],
  ["list", listSessions],
  ["start_new_session_and_get_return_id", startSession],
  ["get_screenshot_from", getScreenshot],
  ["send_message_to", sendMessage],
  ["inject_input_to", injectInput],
  ["add_callback_hook_when_completed", addCallbackHook],
  ["check_message_box", checkMessageBox],
  ["kill_pane_and_agent", killSession],
]);
