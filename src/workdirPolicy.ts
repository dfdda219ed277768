import { mkdir, readdir, stat } from "node:fs/promises";
import path from "node:path";

import { isErrnoException } from "./nodePrimitives.js";
import type { WorkdirPolicy } from "./rpc/schemas.js";

/** Entries ignored when deciding whether a directory is empty. */
const IGNORED_ENTRIES = new Set([".DS_Store"]);

/** Raised when a workdir does not satisfy the requested policy. */
export class WorkdirPolicyError extends Error {
  readonly workdir: string;
  readonly policy: WorkdirPolicy;

  constructor(message: string, workdir: string, policy: WorkdirPolicy) {
    super(message);
    this.name = "WorkdirPolicyError";
    this.workdir = workdir;
    this.policy = policy;
  }
}

async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await stat(target)).isDirectory();
  } catch (error) {
    if (isErrnoException(error, "ENOENT") || isErrnoException(error, "ENOTDIR")) {
      return false;
    }
    throw error;
  }
}

async function isEmptyDirectory(target: string): Promise<boolean> {
  const entries = await readdir(target);
  return entries.every((entry) => IGNORED_ENTRIES.has(entry));
}

/**
 * Validates (and, for the creating policies, prepares) the directory a new
 * session will run in. Returns the absolute workdir.
 *
 * - `require_empty_existing`: must exist and be empty.
 * - `use_existing`: must exist, contents untouched.
 * - `create_new`: must not exist, created here.
 * - `create_or_empty`: created when missing, otherwise must be empty.
 */
export async function applyWorkdirPolicy(workdir: string, policy: WorkdirPolicy): Promise<string> {
  const target = path.resolve(workdir);
  const exists = await isDirectory(target);

  switch (policy) {
    case "require_empty_existing":
      if (!exists) {
        throw new WorkdirPolicyError(`workdir does not exist: ${target}`, target, policy);
      }
      if (!(await isEmptyDirectory(target))) {
        throw new WorkdirPolicyError(`workdir is not empty: ${target}`, target, policy);
      }
      return target;
    case "use_existing":
      if (!exists) {
        throw new WorkdirPolicyError(`workdir does not exist: ${target}`, target, policy);
      }
      return target;
    case "create_new":
      if (exists) {
        throw new WorkdirPolicyError(`workdir already exists: ${target}`, target, policy);
      }
      await mkdir(target, { recursive: true });
      return target;
    case "create_or_empty":
      if (exists) {
        if (!(await isEmptyDirectory(target))) {
          throw new WorkdirPolicyError(`workdir is not empty: ${target}`, target, policy);
        }
        return target;
      }
      await mkdir(target, { recursive: true });
      return target;
  }
}
