import { open, readFile, type FileHandle } from "node:fs/promises";

import { z } from "zod";

import type { StructuredLogger } from "../logger.js";
import { isErrnoException } from "../nodePrimitives.js";
import type { RuntimeLayout } from "../paths.js";
import { withFileLock, type FileLockOptions } from "./fileLock.js";
import { inspectJsonDocument, writeJsonDocument } from "./jsonDocument.js";

/** One persisted message. `id` is unique within its recipient's mailbox only. */
export const MailboxMessageSchema = z.object({
  id: z.number().int().positive(),
  from: z.string(),
  text: z.string(),
  /** Seconds since the epoch. */
  timestamp: z.number(),
});

export type MailboxMessage = z.infer<typeof MailboxMessageSchema>;

/** Id allocation counter stored beside each log. */
const MailboxMetaSchema = z.object({ next_id: z.number().int().positive() });

export type MailboxMeta = z.infer<typeof MailboxMetaSchema>;

/** Answer of {@link Mailbox.readSince}. */
export interface MailboxReadResult {
  /** Messages with `id > sinceId`, ascending. */
  readonly messages: MailboxMessage[];
  /** Next cursor: the largest of `sinceId` and every id in the log. */
  readonly maxId: number;
}

export interface MailboxOptions {
  readonly layout: RuntimeLayout;
  readonly lock: FileLockOptions;
  /** Millisecond clock, overridable in tests. */
  readonly clock?: () => number;
  readonly logger?: StructuredLogger;
  /**
   * Invoked after the counter was persisted and before the record is appended.
   * Tests use it to simulate a crash between the two writes.
   */
  readonly afterCounterPersisted?: (recipient: string, id: number) => Promise<void> | void;
}

interface LogScan {
  readonly records: MailboxMessage[];
  readonly maxId: number;
  readonly malformedLines: number;
}

/**
 * Per-recipient durable mailbox: an append-only JSONL log plus a `next_id`
 * counter, both mutated under the recipient's lock so different recipients
 * never block each other.
 */
export class Mailbox {
  private readonly layout: RuntimeLayout;
  private readonly lockOptions: FileLockOptions;
  private readonly clock: () => number;
  private readonly logger?: StructuredLogger;
  private readonly afterCounterPersisted?: MailboxOptions["afterCounterPersisted"];

  constructor(options: MailboxOptions) {
    this.layout = options.layout;
    this.lockOptions = options.lock;
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger;
    this.afterCounterPersisted = options.afterCounterPersisted;
  }

  /**
   * Appends a message for {@link recipient} and returns its id. The counter is
   * persisted before the record so a crash in between skips an id instead of
   * ever issuing it twice.
   */
  async append(recipient: string, sender: string, text: string): Promise<number> {
    const logPath = this.layout.inboxLog(recipient);
    const metaPath = this.layout.inboxMeta(recipient);

    return withFileLock(
      this.layout.inboxLock(recipient),
      async () => {
        const id = await this.loadNextId(recipient, metaPath, logPath);
        const meta: MailboxMeta = { next_id: id + 1 };
        await writeJsonDocument(metaPath, meta);
        await this.afterCounterPersisted?.(recipient, id);

        const record: MailboxMessage = { id, from: sender, text, timestamp: this.clock() / 1000 };
        await appendRecord(logPath, JSON.stringify(record));
        this.logger?.debug("mailbox_appended", { recipient, id, sender });
        return id;
      },
      this.lockOptions,
    );
  }

  /** Returns every message of {@link recipient} newer than {@link sinceId}. */
  async readSince(recipient: string, sinceId: number): Promise<MailboxReadResult> {
    const logPath = this.layout.inboxLog(recipient);

    return withFileLock(
      this.layout.inboxLock(recipient),
      async () => {
        const scan = await scanLog(logPath);
        if (scan.malformedLines > 0) {
          this.logger?.warn("mailbox_malformed_lines_skipped", { recipient, count: scan.malformedLines });
        }
        const messages = scan.records.filter((record) => record.id > sinceId).sort((a, b) => a.id - b.id);
        return { messages, maxId: Math.max(sinceId, scan.maxId) };
      },
      this.lockOptions,
    );
  }

  /**
   * Reads the counter. A missing or damaged counter next to an existing log is
   * rebuilt from the highest id present in the log.
   */
  private async loadNextId(recipient: string, metaPath: string, logPath: string): Promise<number> {
    const outcome = await inspectJsonDocument(metaPath, MailboxMetaSchema);
    if (outcome.status === "ok") {
      return outcome.document.next_id;
    }
    const scan = await scanLog(logPath);
    if (scan.maxId > 0) {
      this.logger?.warn("mailbox_counter_recovered", {
        recipient,
        reason: outcome.status === "corrupt" ? outcome.reason : "missing",
        next_id: scan.maxId + 1,
      });
    }
    return scan.maxId + 1;
  }
}

async function scanLog(logPath: string): Promise<LogScan> {
  let content: string;
  try {
    content = await readFile(logPath, "utf8");
  } catch (error) {
    if (isErrnoException(error, "ENOENT")) {
      return { records: [], maxId: 0, malformedLines: 0 };
    }
    throw error;
  }

  const records: MailboxMessage[] = [];
  let maxId = 0;
  let malformedLines = 0;
  for (const rawLine of content.split("\n")) {
    const line = rawLine.trim();
    if (line.length === 0) {
      continue;
    }
    let decoded: unknown;
    try {
      decoded = JSON.parse(line);
    } catch {
      malformedLines += 1;
      continue;
    }
    const parsed = MailboxMessageSchema.safeParse(decoded);
    if (!parsed.success) {
      malformedLines += 1;
      continue;
    }
    records.push(parsed.data);
    maxId = Math.max(maxId, parsed.data.id);
  }
  return { records, maxId, malformedLines };
}

/**
 * Appends one JSON line and fsyncs it. A previous crash may have left a torn
 * final line; the new record then starts on a fresh line so it stays parseable.
 */
async function appendRecord(logPath: string, serialised: string): Promise<void> {
  const handle: FileHandle = await open(logPath, "a+");
  try {
    const { size } = await handle.stat();
    let prefix = "";
    if (size > 0) {
      const lastByte = Buffer.alloc(1);
      await handle.read(lastByte, 0, 1, size - 1);
      if (lastByte[0] !== 0x0a) {
        prefix = "\n";
      }
    }
    await handle.appendFile(`${prefix}${serialised}\n`, "utf8");
    await handle.sync();
  } finally {
    await handle.close();
  }
}
