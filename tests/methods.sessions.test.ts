import { describe, it, beforeEach, afterEach } from "mocha";
import { expect } from "chai";
import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { killSession, listSessions, startSession, whoami } from "../src/methods/sessions.js";
import { FakeMultiplexer } from "./helpers/fakeMultiplexer.js";
import { createRelayHarness, type RelayHarness } from "./helpers/relayHarness.js";

async function readJson(filePath: string): Promise<unknown> {
  return JSON.parse(await readFile(filePath, "utf8"));
}

describe("methods/sessions", () => {
  let scratch: string;
  let harness: RelayHarness;

  beforeEach(async () => {
    scratch = await mkdtemp(path.join(tmpdir(), "relay-sessions-"));
  });

  afterEach(async () => {
    await harness.dispose();
    await rm(scratch, { recursive: true, force: true });
  });

  describe("whoami", () => {
    it("returns the caller id and workdir, plus the parent once registered", async () => {
      harness = await createRelayHarness();

      expect(await whoami({}, harness.context)).to.deep.equal({ ok: true, value: { id: "%1", workdir: "/work/parent" } });

      await harness.context.registry.setChild("%0", "%1", "/work/parent");
      expect(await whoami({}, harness.context)).to.deep.equal({
        ok: true,
        value: { id: "%1", workdir: "/work/parent", father: "%0" },
      });
    });

    it("falls back to the process directory when the multiplexer cannot report one", async () => {
      const multiplexer = new FakeMultiplexer({ "%1": { workdir: "/work/parent" } });
      multiplexer.failOn("currentPath", "no server running");
      harness = await createRelayHarness({ multiplexer, cwd: "/home/ops" });

      expect(await whoami({}, harness.context)).to.deep.equal({ ok: true, value: { id: "%1", workdir: "/home/ops" } });
      expect(harness.logger.messages("debug")).to.include("workdir_fallback_to_cwd");
    });

    it("fails when the server runs outside a session", async () => {
      harness = await createRelayHarness({ config: { selfId: null } });

      expect(await whoami({}, harness.context)).to.deep.equal({
        ok: false,
        error: {
          kind: "unavailable",
          message: "caller session id is unknown; run inside a tmux pane or set SESSION_RELAY_SELF",
        },
      });
    });
  });

  describe("list", () => {
    it("annotates panes with their registered parent", async () => {
      harness = await createRelayHarness({
        multiplexer: new FakeMultiplexer({
          "%1": { workdir: "/work/parent" },
          "%2": { workdir: "/work/child", title: "agent:%2" },
        }),
      });
      await harness.context.registry.setChild("%1", "%2", "/work/child");

      expect(await listSessions({}, harness.context)).to.deep.equal({
        ok: true,
        value: [
          { id: "%1", workdir: "/work/parent", title: "" },
          { id: "%2", workdir: "/work/child", title: "agent:%2", father: "%1" },
        ],
      });
    });

    it("reports multiplexer failures", async () => {
      const multiplexer = new FakeMultiplexer();
      multiplexer.failOn("listPanes", "no server running on /tmp/tmux-1000/default");
      harness = await createRelayHarness({ multiplexer });

      expect(await listSessions({}, harness.context)).to.deep.equal({
        ok: false,
        error: { kind: "gateway", message: "tmux list-panes failed: no server running on /tmp/tmux-1000/default" },
      });
    });
  });

  describe("start_new_session_and_get_return_id", () => {
    it("splits the caller's pane, titles it, prepares settings and registers the child", async () => {
      harness = await createRelayHarness();
      const workdir = path.join(scratch, "fresh");
      await mkdir(workdir);

      const result = await startSession({ workdir }, harness.context);

      expect(result).to.deep.equal({ ok: true, value: { id: "%10" } });
      expect(harness.multiplexer.calls).to.deep.equal([
        ["splitPane", "%1", workdir, "claude", "down"],
        ["setTitle", "%10", "agent:%10"],
      ]);
      expect(await readJson(path.join(workdir, ".claude", "settings.local.json"))).to.deep.equal({
        enableAllProjectMcpServers: true,
      });
      expect(await readJson(path.join(workdir, ".mcp.json"))).to.deep.equal({
        mcpServers: {
          "session-relay": { command: "session-relay", args: [], env: { SESSION_RELAY_ROOT: harness.root } },
        },
      });
      expect(await harness.context.registry.getFather("%10")).to.equal("%1");
      expect(await harness.context.registry.getWorkdir("%10")).to.equal(workdir);
      expect(harness.logger.messages("info")).to.include("session_started");
    });

    it("defaults the workdir to the caller's current directory", async () => {
      harness = await createRelayHarness({ multiplexer: new FakeMultiplexer({ "%1": { workdir: scratch } }) });

      const result = await startSession({ workdir_policy: "USE_EXISTING" }, harness.context);

      expect(result).to.deep.equal({ ok: true, value: { id: "%10" } });
      expect(harness.multiplexer.calls[1]).to.deep.equal(["splitPane", "%1", scratch, "claude", "down"]);
    });

    it("writes a text callback hook naming the new child", async () => {
      harness = await createRelayHarness();
      const workdir = path.join(scratch, "hooked");

      await startSession(
        { workdir, workdir_policy: "create_new", add_hook: true, calledagent: "%1", text: "done" },
        harness.context,
      );

      expect(await readJson(path.join(workdir, ".claude", "settings.local.json"))).to.deep.equal({
        enableAllProjectMcpServers: true,
        hooks: {
          Stop: [
            {
              hooks: [
                {
                  type: "command",
                  command:
                    "session-relay-call --server 'session-relay' --method inject_input_to " +
                    `--params '{"target_id":"%1","text":"[msg from %10] done"}' --output text`,
                },
              ],
            },
          ],
        },
      });
    });

    it("writes a screenshot callback hook that forwards the capture", async () => {
      harness = await createRelayHarness();
      const workdir = path.join(scratch, "shot");

      await startSession(
        { workdir, workdir_policy: "create_or_empty", add_hook: true, hook_mode: "screenshot", calledagent: "%1" },
        harness.context,
      );

      const settings = await readJson(path.join(workdir, ".claude", "settings.local.json"));
      expect(settings).to.have.nested.property(
        "hooks.Stop[0].hooks[0].command",
        "session-relay-call --server 'session-relay' --method get_screenshot_from " +
          `--params '{"target_id":"%10"}' --output result --forward-to '%1' --forward-prefix '[screenshot from %10]\n'`,
      );
    });

    it("removes stale relay hooks when no hook is requested", async () => {
      harness = await createRelayHarness();
      const workdir = path.join(scratch, "reused");
      await mkdir(path.join(workdir, ".claude"), { recursive: true });
      await writeFile(
        path.join(workdir, ".claude", "settings.local.json"),
        JSON.stringify({
          enableAllProjectMcpServers: false,
          hooks: {
            Stop: [
              { hooks: [{ type: "command", command: "session-relay-call --server 'session-relay' --method x" }] },
              { hooks: [{ type: "command", command: "make lint" }] },
            ],
          },
        }),
        "utf8",
      );

      await startSession({ workdir, workdir_policy: "use_existing" }, harness.context);

      expect(await readJson(path.join(workdir, ".claude", "settings.local.json"))).to.deep.equal({
        enableAllProjectMcpServers: false,
        hooks: { Stop: [{ hooks: [{ type: "command", command: "make lint" }] }] },
      });
      expect(harness.logger.messages("info")).to.include("relay_hooks_removed");
    });

    it("validates hook parameters before touching the multiplexer", async () => {
      harness = await createRelayHarness();

      expect(await startSession({ workdir: scratch, add_hook: true }, harness.context)).to.deep.equal({
        ok: false,
        error: {
          kind: "validation",
          message: "invalid params: calledagent: required when add_hook is true; text: required when hook_mode is 'text'",
        },
      });
      expect(harness.multiplexer.calls).to.deep.equal([]);
    });

    it("refuses a workdir that violates the policy", async () => {
      harness = await createRelayHarness();
      await writeFile(path.join(scratch, "notes.txt"), "x", "utf8");

      expect(await startSession({ workdir: scratch }, harness.context)).to.deep.equal({
        ok: false,
        error: { kind: "validation", message: `workdir is not empty: ${scratch}` },
      });
      expect(harness.multiplexer.operations()).to.not.include("splitPane");
    });

    it("reports a failed split", async () => {
      const multiplexer = new FakeMultiplexer({ "%1": { workdir: "/work/parent" } });
      multiplexer.failOn("splitPane", "no space for new pane");
      harness = await createRelayHarness({ multiplexer });

      expect(await startSession({ workdir: scratch }, harness.context)).to.deep.equal({
        ok: false,
        error: { kind: "gateway", message: "tmux split-window failed: no space for new pane" },
      });
      expect(await harness.context.registry.listChildren()).to.deep.equal([]);
    });

    it("still registers the child when the title cannot be set", async () => {
      const multiplexer = new FakeMultiplexer({ "%1": { workdir: "/work/parent" } });
      multiplexer.failOn("setTitle");
      harness = await createRelayHarness({ multiplexer });

      expect(await startSession({ workdir: scratch }, harness.context)).to.deep.equal({ ok: true, value: { id: "%10" } });
      expect(harness.logger.messages("warn")).to.deep.equal(["pane_title_failed"]);
    });
  });

  describe("kill_pane_and_agent", () => {
    it("closes the pane", async () => {
      harness = await createRelayHarness({
        multiplexer: new FakeMultiplexer({ "%1": { workdir: "/work/parent" }, "%2": { workdir: "/work/child" } }),
      });

      expect(await killSession({ target_id: "%2" }, harness.context)).to.deep.equal({ ok: true, value: { ok: true } });
      expect([...harness.multiplexer.panes.keys()]).to.deep.equal(["%1"]);
    });

    it("reports unknown panes", async () => {
      harness = await createRelayHarness();

      expect(await killSession({ target_id: "%99" }, harness.context)).to.deep.equal({
        ok: false,
        error: { kind: "gateway", message: "tmux kill-pane failed: can't find pane: %99" },
      });
    });

    it("requires a target", async () => {
      harness = await createRelayHarness();

      expect(await killSession({ target_id: "  " }, harness.context)).to.deep.equal({
        ok: false,
        error: { kind: "validation", message: "invalid params: target_id: must be a non-empty session id (e.g. '%7')" },
      });
    });
  });
});
