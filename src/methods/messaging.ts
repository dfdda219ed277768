import { randomUUID } from "node:crypto";
import process from "node:process";

import { attempt, ok, type HandlerResult } from "../rpc/result.js";
import {
  CheckMessageBoxParamsSchema,
  InjectInputParamsSchema,
  SendMessageParamsSchema,
  type InjectInputParams,
} from "../rpc/schemas.js";
import type { MailboxMessage } from "../store/mailbox.js";
import { parseParams, requireSelf, type RelayContext } from "./context.js";

/** Delay between pasting and pressing Enter, so the agent's input box settles first. */
export const SUBMIT_DELAY_MS = 100;

/** Sender recorded when the server runs outside a session. */
export const UNKNOWN_SENDER = "unknown";

/** `send_message_to`: queues `From <sender>: <text>` in the target's mailbox. */
export async function sendMessage(
  params: Record<string, unknown>,
  context: RelayContext,
): Promise<HandlerResult<{ ok: true }>> {
  const parsed = parseParams(SendMessageParamsSchema, params);
  if (!parsed.ok) {
    return parsed;
  }
  const sender = context.config.selfId ?? UNKNOWN_SENDER;
  const { target_id: target, text } = parsed.value;
  const appended = await attempt("store", () => context.mailbox.append(target, sender, `From ${sender}: ${text}`));
  if (!appended.ok) {
    return appended;
  }
  context.logger.info("message_queued", { target, sender, message_id: appended.value });
  return ok({ ok: true });
}

/** `check_message_box`: messages for the caller newer than `since_id`, plus the next cursor. */
export async function checkMessageBox(
  params: Record<string, unknown>,
  context: RelayContext,
): Promise<HandlerResult<{ messages: MailboxMessage[]; since_id: number }>> {
  const parsed = parseParams(CheckMessageBoxParamsSchema, params);
  if (!parsed.ok) {
    return parsed;
  }
  const self = requireSelf(context);
  if (!self.ok) {
    return self;
  }
  const read = await attempt("store", () => context.mailbox.readSince(self.value, parsed.value.since_id));
  if (!read.ok) {
    return read;
  }
  return ok({ messages: read.value.messages, since_id: read.value.maxId });
}

/** Text pasted into the target: explicit prefix first, then the optional sender tag. */
export function composeInjectedText(params: InjectInputParams, sender: string): string {
  if (params.prefix) {
    return `${params.prefix}${params.text}`;
  }
  return params.with_from ? `From ${sender}: ${params.text}` : params.text;
}

/**
 * `inject_input_to`: types text into the target's input through a named paste
 * buffer so the bytes arrive verbatim, optionally clearing the line first
 * and submitting afterwards.
 */
export async function injectInput(
  params: Record<string, unknown>,
  context: RelayContext,
): Promise<HandlerResult<{ ok: true }>> {
  const parsed = parseParams(InjectInputParamsSchema, params);
  if (!parsed.ok) {
    return parsed;
  }
  const input = parsed.value;
  const target = input.target_id;
  const payload = composeInjectedText(input, context.config.selfId ?? UNKNOWN_SENDER);
  const bufferName = `session_relay_${process.pid}_${randomUUID()}`;
  const { multiplexer } = context;

  const delivered = await attempt(
    "gateway",
    async () => {
      if (input.mode === "replace") {
        await multiplexer.clearLine(target);
      }
      await multiplexer.setBuffer(bufferName, payload);
      await multiplexer.pasteBuffer(bufferName, target, true);
      if (input.submit) {
        await context.sleep(SUBMIT_DELAY_MS);
        await multiplexer.sendEnter(target);
      }
    },
    (message) => `tmux input injection failed: ${message}`,
  );
  if (!delivered.ok) {
    return delivered;
  }
  context.logger.info("input_injected", { target, mode: input.mode, submit: input.submit, length: payload.length });
  return ok({ ok: true });
}
