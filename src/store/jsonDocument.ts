import { randomUUID } from "node:crypto";
import { mkdir, open, readFile, rename, rm } from "node:fs/promises";
import path from "node:path";

import type { ZodType, ZodTypeDef } from "zod";

import { isErrnoException } from "../nodePrimitives.js";

/** Schema accepted by the readers. Its input side stays `unknown` so defaults and transforms fit. */
export type DocumentSchema<T> = ZodType<T, ZodTypeDef, unknown>;

/** Outcome of a tolerant read: the caller learns why the fallback was used. */
export type DocumentReadOutcome<T> =
  | { readonly status: "ok"; readonly document: T }
  | { readonly status: "missing" }
  | { readonly status: "corrupt"; readonly reason: string };

/**
 * Reads and validates a JSON document. Absent files, undecodable JSON and
 * documents failing {@link schema} are reported instead of thrown so callers
 * can degrade to defaults.
 */
export async function inspectJsonDocument<T>(
  filePath: string,
  schema: DocumentSchema<T>,
): Promise<DocumentReadOutcome<T>> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (error) {
    if (isErrnoException(error, "ENOENT") || isErrnoException(error, "ENOTDIR")) {
      return { status: "missing" };
    }
    throw error;
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch (error) {
    return { status: "corrupt", reason: error instanceof Error ? error.message : String(error) };
  }

  const parsed = schema.safeParse(decoded);
  if (!parsed.success) {
    return { status: "corrupt", reason: parsed.error.issues.map((issue) => issue.message).join("; ") };
  }
  return { status: "ok", document: parsed.data };
}

/**
 * Returns the stored document or {@link fallback} when it is missing or
 * corrupt. Availability wins over surfacing damaged state.
 */
export async function readJsonDocument<T>(filePath: string, schema: DocumentSchema<T>, fallback: T): Promise<T> {
  const outcome = await inspectJsonDocument(filePath, schema);
  return outcome.status === "ok" ? outcome.document : fallback;
}

/**
 * Atomically replaces {@link filePath}: the payload goes to a temporary file in
 * the same directory, is fsynced, then renamed over the target. Concurrent
 * readers see either the previous or the new document, never a torn one.
 */
export async function writeJsonDocument(filePath: string, document: unknown): Promise<void> {
  const directory = path.dirname(filePath);
  await mkdir(directory, { recursive: true });
  const tempPath = path.join(directory, `.${path.basename(filePath)}.${process.pid}.${randomUUID()}.tmp`);
  const handle = await open(tempPath, "w");
  try {
    await handle.writeFile(`${JSON.stringify(document, null, 2)}\n`, "utf8");
    await handle.sync();
  } finally {
    await handle.close();
  }
  try {
    await rename(tempPath, filePath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}

/** Policy applied by {@link updateJsonDocument} when the stored document is unusable. */
export type CorruptDocumentPolicy = "reset" | "backup";

export interface UpdateJsonDocumentOptions {
  /**
   * `reset` silently starts again from the fallback; `backup` first renames
   * the damaged file to `<path>.bak`.
   */
  readonly onCorrupt?: CorruptDocumentPolicy;
  /** Notified when a corrupt document was discarded. */
  readonly onDiscard?: (details: { filePath: string; reason: string; backupPath: string | null }) => void;
}

/** Result of {@link updateJsonDocument}. `changed: false` skips the write. */
export interface DocumentMutation<T, R> {
  readonly document: T;
  readonly changed: boolean;
  readonly result: R;
}

/**
 * Read-modify-write merge of a JSON document. The caller is responsible for
 * holding whatever lock protects {@link filePath}.
 */
export async function updateJsonDocument<T, R>(
  filePath: string,
  schema: DocumentSchema<T>,
  fallback: () => T,
  mutate: (current: T) => DocumentMutation<T, R>,
  options: UpdateJsonDocumentOptions = {},
): Promise<R> {
  const outcome = await inspectJsonDocument(filePath, schema);
  let current: T;
  if (outcome.status === "ok") {
    current = outcome.document;
  } else {
    if (outcome.status === "corrupt") {
      let backupPath: string | null = null;
      if (options.onCorrupt === "backup") {
        backupPath = `${filePath}.bak`;
        await rename(filePath, backupPath);
      }
      options.onDiscard?.({ filePath, reason: outcome.reason, backupPath });
    }
    current = fallback();
  }

  const mutation = mutate(current);
  if (mutation.changed) {
    await writeJsonDocument(filePath, mutation.document);
  }
  return mutation.result;
}
