import { attempt, ok, type HandlerResult } from "../rpc/result.js";
import { TargetParamsSchema } from "../rpc/schemas.js";
import { parseParams, type RelayContext } from "./context.js";

/**
 * `get_screenshot_from`: the target's full scroll-back as text. The depth is
 * the multiplexer's history limit, or the configured fallback when it cannot
 * be read.
 */
export async function getScreenshot(
  params: Record<string, unknown>,
  context: RelayContext,
): Promise<HandlerResult<{ text: string }>> {
  const parsed = parseParams(TargetParamsSchema, params);
  if (!parsed.ok) {
    return parsed;
  }
  const { multiplexer, config } = context;
  const target = parsed.value.target_id;
  const captured = await attempt(
    "gateway",
    async () => {
      const depth = (await multiplexer.historyLimit()) ?? config.historyLines;
      return multiplexer.captureText(target, depth);
    },
    (message) => `tmux capture failed: ${message}`,
  );
  if (!captured.ok) {
    return captured;
  }
  return ok({ text: captured.value });
}
