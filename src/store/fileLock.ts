import { mkdir, open, readFile, stat, unlink, type FileHandle } from "node:fs/promises";
import path from "node:path";
import process from "node:process";
import { setTimeout as delay } from "node:timers/promises";

import { isErrnoException } from "../nodePrimitives.js";

/** Lock files without a readable holder pid older than this are reclaimed. */
const ANONYMOUS_LOCK_GRACE_MS = 1_000;

/**
 * Raised when a lock could not be acquired within the configured timeout. The
 * holder is alive but has not released the lock.
 */
export class LockBusyError extends Error {
  readonly lockPath: string;
  readonly waitedMs: number;

  constructor(lockPath: string, waitedMs: number) {
    super(`lock busy: ${path.basename(lockPath)} still held after ${waitedMs}ms`);
    this.name = "LockBusyError";
    this.lockPath = lockPath;
    this.waitedMs = waitedMs;
  }
}

export interface FileLockOptions {
  /** Maximum time spent waiting for the lock; `0` waits forever. */
  readonly timeoutMs: number;
  /** Delay between two acquisition attempts. */
  readonly retryMs: number;
  /** Clock override for tests. */
  readonly clock?: () => number;
  /** Liveness check override for tests. Defaults to `process.kill(pid, 0)`. */
  readonly isProcessAlive?: (pid: number) => boolean;
  /** Notified whenever a stale lock left by a dead holder is removed. */
  readonly onStaleLock?: (details: { lockPath: string; holderPid: number | null }) => void;
}

/**
 * Runs {@link body} while holding an exclusive cross-process lock on
 * {@link lockPath}. The lock is a file created with `O_CREAT | O_EXCL` that
 * records the holder pid; it is removed on every exit path of {@link body}.
 * A lock whose holder process no longer exists is reclaimed, which mirrors the
 * automatic release of OS advisory locks when their owner dies.
 */
export async function withFileLock<T>(
  lockPath: string,
  body: () => Promise<T>,
  options: FileLockOptions,
): Promise<T> {
  await acquireFileLock(lockPath, options);
  try {
    return await body();
  } finally {
    await unlinkIfPresent(lockPath);
  }
}

async function acquireFileLock(lockPath: string, options: FileLockOptions): Promise<void> {
  const clock = options.clock ?? Date.now;
  const startedAt = clock();
  await mkdir(path.dirname(lockPath), { recursive: true });

  for (;;) {
    if (await tryCreateLock(lockPath)) {
      return;
    }
    if (await reclaimIfStale(lockPath, options, clock)) {
      continue;
    }
    const waited = clock() - startedAt;
    if (options.timeoutMs > 0 && waited >= options.timeoutMs) {
      throw new LockBusyError(lockPath, waited);
    }
    await delay(options.retryMs);
  }
}

async function tryCreateLock(lockPath: string): Promise<boolean> {
  let handle: FileHandle;
  try {
    handle = await open(lockPath, "wx");
  } catch (error) {
    if (isErrnoException(error, "EEXIST")) {
      return false;
    }
    throw error;
  }
  try {
    await handle.writeFile(`${process.pid}\n`, "utf8");
    await handle.sync();
  } finally {
    await handle.close();
  }
  return true;
}

interface LockObservation {
  readonly holderPid: number | null;
  readonly stale: boolean;
}

/** Reads a lock file and judges its holder. `null` when the file is gone. */
async function observeLock(
  lockPath: string,
  options: FileLockOptions,
  clock: () => number,
): Promise<LockObservation | null> {
  let content: string;
  let modifiedAt: number;
  try {
    content = await readFile(lockPath, "utf8");
    modifiedAt = (await stat(lockPath)).mtimeMs;
  } catch (error) {
    if (isErrnoException(error, "ENOENT")) {
      return null;
    }
    throw error;
  }

  const holderPid = parseHolderPid(content);
  const isAlive = options.isProcessAlive ?? defaultIsProcessAlive;
  const stale =
    holderPid === null ? clock() - modifiedAt > ANONYMOUS_LOCK_GRACE_MS : !isAlive(holderPid);
  return { holderPid, stale };
}

/**
 * Removes the lock when its holder is gone. Returns `true` when the caller
 * should retry immediately (lock removed or vanished in the meantime).
 *
 * The removal happens under a second exclusive file, `<lock>.reclaim`, and only
 * after the lock has been observed again with the same dead holder: a waiter
 * that judged the lock stale must not unlink a lock another waiter has since
 * reclaimed and re-acquired.
 */
async function reclaimIfStale(
  lockPath: string,
  options: FileLockOptions,
  clock: () => number,
): Promise<boolean> {
  const observed = await observeLock(lockPath, options, clock);
  if (observed === null) {
    return true;
  }
  if (!observed.stale) {
    return false;
  }

  const guardPath = `${lockPath}.reclaim`;
  if (!(await tryCreateLock(guardPath))) {
    await clearDeadGuard(guardPath, options, clock);
    return false;
  }
  try {
    const current = await observeLock(lockPath, options, clock);
    if (current === null) {
      return true;
    }
    if (!current.stale || current.holderPid !== observed.holderPid) {
      return false;
    }
    await unlinkIfPresent(lockPath);
    options.onStaleLock?.({ lockPath, holderPid: current.holderPid });
    return true;
  } finally {
    await unlinkIfPresent(guardPath);
  }
}

/** A reclaim guard left behind by a process that died mid-reclaim. */
async function clearDeadGuard(guardPath: string, options: FileLockOptions, clock: () => number): Promise<void> {
  const guard = await observeLock(guardPath, options, clock);
  if (guard?.stale) {
    await unlinkIfPresent(guardPath);
  }
}

async function unlinkIfPresent(filePath: string): Promise<void> {
  try {
    await unlink(filePath);
  } catch (error) {
    if (!isErrnoException(error, "ENOENT")) {
      throw error;
    }
  }
}

function parseHolderPid(content: string): number | null {
  const trimmed = content.trim();
  if (!/^\d+$/.test(trimmed)) {
    return null;
  }
  const pid = Number.parseInt(trimmed, 10);
  return pid > 0 ? pid : null;
}

function defaultIsProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to another user.
    return isErrnoException(error, "EPERM");
  }
}
