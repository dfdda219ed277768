import { describe, it, afterEach } from "mocha";
import { expect } from "chai";

import { checkMessageBox, composeInjectedText, injectInput, sendMessage, SUBMIT_DELAY_MS } from "../src/methods/messaging.js";
import { InjectInputParamsSchema } from "../src/rpc/schemas.js";
import { FakeMultiplexer } from "./helpers/fakeMultiplexer.js";
import { createRelayHarness, type RelayHarness } from "./helpers/relayHarness.js";

const BUFFER_NAME = /^session_relay_\d+_[0-9a-f-]{36}$/;

describe("methods/messaging", () => {
  let harness: RelayHarness;

  afterEach(async () => {
    await harness.dispose();
  });

  describe("send_message_to / check_message_box", () => {
    it("queues tagged messages and returns them by cursor", async () => {
      harness = await createRelayHarness();

      expect(await sendMessage({ target_id: "%1", text: "hello" }, harness.context)).to.deep.equal({
        ok: true,
        value: { ok: true },
      });
      await sendMessage({ target_id: "%1", text: "again" }, harness.context);

      const first = await checkMessageBox({}, harness.context);
      expect(first.ok && first.value.messages.map((message) => [message.id, message.from, message.text])).to.deep.equal([
        [1, "%1", "From %1: hello"],
        [2, "%1", "From %1: again"],
      ]);
      expect(first.ok && first.value.since_id).to.equal(2);

      const next = await checkMessageBox({ since_id: "2" }, harness.context);
      expect(next).to.deep.equal({ ok: true, value: { messages: [], since_id: 2 } });
    });

    it("records an unknown sender when the server runs outside a session", async () => {
      harness = await createRelayHarness({ config: { selfId: null } });

      await sendMessage({ target_id: "%4", text: "hi" }, harness.context);

      const inbox = await harness.context.mailbox.readSince("%4", 0);
      expect(inbox.messages.map((message) => [message.from, message.text])).to.deep.equal([["unknown", "From unknown: hi"]]);
    });

    it("rejects a negative cursor", async () => {
      harness = await createRelayHarness();

      expect(await checkMessageBox({ since_id: -1 }, harness.context)).to.deep.equal({
        ok: false,
        error: { kind: "validation", message: "invalid params: since_id: Number must be greater than or equal to 0" },
      });
    });

    it("requires text", async () => {
      harness = await createRelayHarness();

      expect(await sendMessage({ target_id: "%2" }, harness.context)).to.deep.equal({
        ok: false,
        error: { kind: "validation", message: "invalid params: text: Required" },
      });
    });
  });

  describe("composeInjectedText", () => {
    const params = (input: Record<string, unknown>) => InjectInputParamsSchema.parse({ target_id: "%2", text: "hello", ...input });

    it("sends the text unchanged by default", () => {
      expect(composeInjectedText(params({}), "%1")).to.equal("hello");
    });

    it("tags the sender on request", () => {
      expect(composeInjectedText(params({ with_from: true }), "%1")).to.equal("From %1: hello");
    });

    it("lets an explicit prefix win over the sender tag", () => {
      expect(composeInjectedText(params({ with_from: true, prefix: "[ci] " }), "%1")).to.equal("[ci] hello");
    });
  });

  describe("inject_input_to", () => {
    it("pastes through a named buffer and submits after a short pause", async () => {
      harness = await createRelayHarness({
        multiplexer: new FakeMultiplexer({ "%1": { workdir: "/w" }, "%2": { workdir: "/w" } }),
      });

      expect(await injectInput({ target_id: "%2", text: "line one\nline two" }, harness.context)).to.deep.equal({
        ok: true,
        value: { ok: true },
      });

      expect(harness.multiplexer.operations()).to.deep.equal(["setBuffer", "pasteBuffer", "sendEnter"]);
      const [, bufferName, data] = harness.multiplexer.calls[0] ?? [];
      expect(bufferName).to.match(BUFFER_NAME);
      expect(data).to.equal("line one\nline two");
      expect(harness.multiplexer.calls[1]).to.deep.equal(["pasteBuffer", bufferName, "%2", true]);
      expect(harness.multiplexer.typed.get("%2")).to.deep.equal(["line one\nline two"]);
      expect(harness.multiplexer.buffers.size).to.equal(0);
      expect(harness.sleeps).to.deep.equal([SUBMIT_DELAY_MS]);
    });

    it("clears the input line first in replace mode and skips submission on request", async () => {
      harness = await createRelayHarness({
        multiplexer: new FakeMultiplexer({ "%1": { workdir: "/w" }, "%2": { workdir: "/w" } }),
      });

      await injectInput({ target_id: "%2", text: "draft", mode: "Replace", submit: false, with_from: true }, harness.context);

      expect(harness.multiplexer.operations()).to.deep.equal(["clearLine", "setBuffer", "pasteBuffer"]);
      expect(harness.multiplexer.typed.get("%2")).to.deep.equal(["From %1: draft"]);
      expect(harness.sleeps).to.deep.equal([]);
    });

    it("reports a target that does not exist", async () => {
      harness = await createRelayHarness();

      expect(await injectInput({ target_id: "%9", text: "x" }, harness.context)).to.deep.equal({
        ok: false,
        error: { kind: "gateway", message: "tmux input injection failed: can't find pane: %9" },
      });
    });

    it("rejects unknown modes", async () => {
      harness = await createRelayHarness();

      const result = await injectInput({ target_id: "%2", text: "x", mode: "overwrite" }, harness.context);

      expect(result.ok).to.equal(false);
      expect(harness.multiplexer.calls).to.deep.equal([]);
    });
  });
});
