import { HOOK_MODES, INJECT_MODES, WORKDIR_POLICIES } from "./schemas.js";

/** Entry of the `tools/list` answer. */
export interface ToolDescriptor {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: {
    readonly type: "object";
    readonly properties: Readonly<Record<string, Readonly<Record<string, unknown>>>>;
    readonly required: readonly string[];
  };
}

const sessionRef = (description: string) => ({ type: "string", description }) as const;

/** Tools advertised to MCP clients, one per direct method. */
export const TOOL_CATALOG: readonly ToolDescriptor[] = [
  {
    name: "whoami",
    description: "Return the caller's session id, its working directory, and its parent session when known.",
    inputSchema: { type: "object", properties: {}, required: [] },
  },
  {
    name: "list",
    description: "List every pane with its working directory, title and parent session when known.",
    inputSchema: { type: "object", properties: {}, required: [] },
  },
  {
    name: "start_new_session_and_get_return_id",
    description:
      "Start a new agent in a pane split from the caller and return its id; the pane is titled 'agent:<id>'. " +
      "Hooks only take effect for agents started after they are written, so request them here with add_hook.",
    inputSchema: {
      type: "object",
      properties: {
        workdir: { type: "string" },
        workdir_policy: { type: "string", enum: [...WORKDIR_POLICIES], default: "require_empty_existing" },
        add_hook: { type: "boolean", default: false },
        hook_mode: { type: "string", enum: [...HOOK_MODES], default: "text" },
        calledagent: sessionRef("Session id receiving the callback, e.g. '%7'."),
        text: { type: "string" },
      },
      required: [],
    },
  },
  {
    name: "get_screenshot_from",
    description: "Capture the full text buffer (not an image) of a target pane.",
    inputSchema: {
      type: "object",
      properties: { target_id: sessionRef("Session id, e.g. '%7'.") },
      required: ["target_id"],
    },
  },
  {
    name: "send_message_to",
    description:
      "Passive delivery: queue a message in the target's mailbox. The target sees it only when it calls " +
      "check_message_box; use inject_input_to for immediate delivery.",
    inputSchema: {
      type: "object",
      properties: { target_id: sessionRef("Session id, e.g. '%7'."), text: { type: "string" } },
      required: ["target_id", "text"],
    },
  },
  {
    name: "inject_input_to",
    description:
      "Active delivery: type text into the target's input and optionally submit it. " +
      "with_from prepends 'From <sender>:', prefix prepends arbitrary text. Modes: append, replace.",
    inputSchema: {
      type: "object",
      properties: {
        target_id: sessionRef("Session id, e.g. '%7'."),
        text: { type: "string" },
        with_from: { type: "boolean", default: false },
        prefix: { type: "string" },
        submit: { type: "boolean", default: true },
        mode: { type: "string", enum: [...INJECT_MODES], default: "append" },
      },
      required: ["target_id", "text"],
    },
  },
  {
    name: "check_message_box",
    description: "Pull the caller's mailbox messages newer than since_id. Poll it: send_message_to never pushes.",
    inputSchema: {
      type: "object",
      properties: { since_id: { type: "integer", default: 0 } },
      required: [],
    },
  },
  {
    name: "add_callback_hook_when_completed",
    description:
      "Append a Stop hook (text or screenshot) to the hooked agent's project settings. " +
      "Agents already running do not reload it; only sessions started afterwards are affected.",
    inputSchema: {
      type: "object",
      properties: {
        hookedagent: sessionRef("Session whose settings are modified, e.g. '%5'."),
        hooked_workdir: { type: "string", description: "Absolute project root of the hooked agent." },
        calledagent: sessionRef("Session receiving the callback, e.g. '%7'."),
        mode: { type: "string", enum: [...HOOK_MODES], default: "text" },
        text: { type: "string" },
      },
      required: ["hookedagent", "hooked_workdir", "calledagent"],
    },
  },
  {
    name: "kill_pane_and_agent",
    description: "Kill a pane by id; the agent running inside is terminated with it.",
    inputSchema: {
      type: "object",
      properties: { target_id: sessionRef("Session id, e.g. '%7'.") },
      required: ["target_id"],
    },
  },
];
