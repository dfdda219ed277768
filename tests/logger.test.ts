import { describe, it } from "mocha";
import { expect } from "chai";
import { mkdtemp, readdir, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { runWithJsonRpcContext } from "../src/infra/jsonRpcContext.js";
import { StructuredLogger, type LogEntry } from "../src/logger.js";

function collectingSink(): { lines: string[]; write(chunk: string): void } {
  const lines: string[] = [];
  return {
    lines,
    write(chunk: string) {
      lines.push(chunk);
    },
  };
}

describe("StructuredLogger", () => {
  it("rotates the log file when the configured size is exceeded", async () => {
    const directory = await mkdtemp(path.join(tmpdir(), "logger-"));
    const logFile = path.join(directory, "relay.log");

    try {
      const logger = new StructuredLogger({ logFile, sink: null, maxFileSizeBytes: 256, maxFileCount: 3 });

      for (let index = 0; index < 6; index += 1) {
        logger.info("rotation_test_entry", { index, payload: "x".repeat(120) });
      }
      await logger.flush();

      const files = await readdir(directory);
      expect(files).to.include("relay.log");
      expect(files).to.include("relay.log.1");
      expect(files).to.not.include("relay.log.3");

      const archived = await readFile(path.join(directory, "relay.log.1"), "utf8");
      expect(archived).to.contain("rotation_test_entry");
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });

  it("writes one JSON line per entry to the sink and redacts sensitive keys", () => {
    const sink = collectingSink();
    const logger = new StructuredLogger({ sink });

    logger.warn("credentials_seen", { token: "test-secret", nested: { password: "test-secret", user: "ops" } });

    expect(sink.lines).to.have.length(1);
    const entry: unknown = JSON.parse(sink.lines[0] ?? "");
    expect(entry).to.include({ level: "warn", message: "credentials_seen" });
    expect(entry).to.have.deep.property("payload", {
      token: "[REDACTED]",
      nested: { password: "[REDACTED]", user: "ops" },
    });
  });

  it("drops entries below the configured level", () => {
    const sink = collectingSink();
    const logger = new StructuredLogger({ sink, level: "warn" });

    logger.debug("ignored_debug");
    logger.info("ignored_info");
    logger.error("kept_error");

    expect(sink.lines).to.have.length(1);
    expect(sink.lines[0]).to.contain("\"message\":\"kept_error\"");
  });

  it("attaches the JSON-RPC correlation fields of the current request", () => {
    const entries: LogEntry[] = [];
    const logger = new StructuredLogger({ sink: null, onEntry: (entry) => entries.push(entry) });

    runWithJsonRpcContext({ requestId: "req-7", method: "whoami", transport: "stdio" }, () => {
      logger.info("inside_request");
    });
    logger.info("outside_request");

    expect(entries[0]).to.include({ request_id: "req-7", method: "whoami", transport: "stdio" });
    expect(entries[1]).to.not.have.property("request_id");
  });

  it("omits file mirroring when callers pass a null logFile override", async () => {
    const directory = await mkdtemp(path.join(tmpdir(), "logger-"));
    try {
      const entries: Array<{ message: string }> = [];
      const logger = new StructuredLogger({
        logFile: null,
        sink: null,
        onEntry: (entry) => entries.push({ message: entry.message }),
      });

      logger.warn("null_logfile_sanitised", { detail: "capture" });
      await logger.flush();

      const files = await readdir(directory);
      expect(files.length, "the logger should not create files when mirroring is disabled").to.equal(0);
      expect(entries.map((entry) => entry.message)).to.deep.equal(["null_logfile_sanitised"]);
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });
});
