import { describe, it, beforeEach, afterEach } from "mocha";
import { expect } from "chai";
import { mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { z } from "zod";

import {
  inspectJsonDocument,
  readJsonDocument,
  updateJsonDocument,
  writeJsonDocument,
} from "../src/store/jsonDocument.js";

const CounterSchema = z.object({ count: z.number().int(), tags: z.array(z.string()).default([]) });
type Counter = z.infer<typeof CounterSchema>;

describe("store/jsonDocument", () => {
  let directory: string;
  let filePath: string;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(tmpdir(), "relay-doc-"));
    filePath = path.join(directory, "sub", "counter.json");
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it("writes pretty JSON with a trailing newline and leaves no temporary file behind", async () => {
    await writeJsonDocument(filePath, { count: 1, tags: ["a"] });

    expect(await readFile(filePath, "utf8")).to.equal('{\n  "count": 1,\n  "tags": [\n    "a"\n  ]\n}\n');
    expect(await readdir(path.dirname(filePath))).to.deep.equal(["counter.json"]);
  });

  it("distinguishes missing, corrupt and valid documents", async () => {
    expect(await inspectJsonDocument(filePath, CounterSchema)).to.deep.equal({ status: "missing" });

    await writeJsonDocument(filePath, { count: "three" });
    const invalid = await inspectJsonDocument(filePath, CounterSchema);
    expect(invalid.status).to.equal("corrupt");

    await writeFile(filePath, "{not json", "utf8");
    expect((await inspectJsonDocument(filePath, CounterSchema)).status).to.equal("corrupt");

    await writeJsonDocument(filePath, { count: 3 });
    expect(await inspectJsonDocument(filePath, CounterSchema)).to.deep.equal({
      status: "ok",
      document: { count: 3, tags: [] },
    });
  });

  it("falls back to the default when the document cannot be used", async () => {
    const arrayDocument = path.join(directory, "array.json");
    await writeFile(arrayDocument, "[]", "utf8");
    const fallback: Counter = { count: 0, tags: [] };

    expect(await readJsonDocument(filePath, CounterSchema, fallback)).to.equal(fallback);
    expect(await readJsonDocument(arrayDocument, CounterSchema, fallback)).to.equal(fallback);
  });

  it("skips the write when the mutation reports no change", async () => {
    const result = await updateJsonDocument(
      filePath,
      CounterSchema,
      () => ({ count: 0, tags: [] }),
      (current) => ({ document: current, changed: false, result: current.count }),
    );

    expect(result).to.equal(0);
    expect((await inspectJsonDocument(filePath, CounterSchema)).status).to.equal("missing");
  });

  it("resets a corrupt document under the reset policy and reports the discard", async () => {
    await writeJsonDocument(filePath, { count: "broken" });
    const discarded: Array<{ backupPath: string | null }> = [];

    await updateJsonDocument(
      filePath,
      CounterSchema,
      () => ({ count: 0, tags: [] }),
      (current) => ({ document: { ...current, count: current.count + 1 }, changed: true, result: undefined }),
      { onCorrupt: "reset", onDiscard: ({ backupPath }) => discarded.push({ backupPath }) },
    );

    expect(JSON.parse(await readFile(filePath, "utf8"))).to.deep.equal({ count: 1, tags: [] });
    expect(discarded).to.deep.equal([{ backupPath: null }]);
  });

  it("moves a corrupt document aside under the backup policy", async () => {
    await writeJsonDocument(filePath, ["not", "an", "object"]);

    await updateJsonDocument(
      filePath,
      CounterSchema,
      () => ({ count: 0, tags: [] }),
      (current) => ({ document: { ...current, tags: ["fresh"] }, changed: true, result: undefined }),
      { onCorrupt: "backup" },
    );

    expect(JSON.parse(await readFile(`${filePath}.bak`, "utf8"))).to.deep.equal(["not", "an", "object"]);
    expect(JSON.parse(await readFile(filePath, "utf8"))).to.deep.equal({ count: 0, tags: ["fresh"] });
  });
});
