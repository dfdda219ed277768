import path from "node:path";

/**
 * Error raised when a caller-supplied identifier would resolve outside the
 * runtime root (path separators, `..`, NUL bytes).
 */
export class PathResolutionError extends Error {
  /** Stable error code surfaced to clients when a path escapes its root. */
  public readonly code = "E-PATHS-ESCAPE";
  public readonly attemptedPath: string;
  public readonly rootDirectory: string;

  constructor(message: string, attemptedPath: string, rootDirectory: string) {
    super(message);
    this.name = "PathResolutionError";
    this.attemptedPath = attemptedPath;
    this.rootDirectory = rootDirectory;
  }
}

/**
 * Normalises a target path and ensures it stays within the provided root.
 *
 * @throws {PathResolutionError} When the resulting path escapes the root.
 */
export function resolveWithin(rootDir: string, ...segments: string[]): string {
  const absoluteRoot = path.resolve(rootDir);
  const targetPath = path.resolve(absoluteRoot, ...segments);
  const relative = path.relative(absoluteRoot, targetPath);

  if (relative.startsWith("..") || path.isAbsolute(relative)) {
    throw new PathResolutionError("path escapes base directory", targetPath, absoluteRoot);
  }

  return targetPath;
}

/**
 * Session ids are opaque, but they end up in file names. Anything that cannot
 * live as a single path component is rejected.
 */
export function assertFileSafeSessionId(sessionId: string, rootDir: string): void {
  if (
    sessionId.length === 0 ||
    sessionId === "." ||
    sessionId === ".." ||
    sessionId.includes("/") ||
    sessionId.includes("\\") ||
    sessionId.includes("\u0000")
  ) {
    throw new PathResolutionError(`session id cannot be used as a file name: ${JSON.stringify(sessionId)}`, sessionId, rootDir);
  }
}

/**
 * On-disk layout of the runtime root:
 *
 * ```
 * <root>/inbox/<id>.jsonl      message log
 * <root>/inbox/<id>.meta.json  next-id counter
 * <root>/inbox/.<id>.lock      per-recipient lock
 * <root>/registry.json         parent/child registry
 * <root>/.registry.lock        registry lock
 * ```
 */
export class RuntimeLayout {
  readonly rootDir: string;
  readonly inboxDir: string;

  constructor(rootDir: string) {
    this.rootDir = path.resolve(rootDir);
    this.inboxDir = path.join(this.rootDir, "inbox");
  }

  inboxLog(sessionId: string): string {
    return this.inboxFile(sessionId, `${sessionId}.jsonl`);
  }

  inboxMeta(sessionId: string): string {
    return this.inboxFile(sessionId, `${sessionId}.meta.json`);
  }

  inboxLock(sessionId: string): string {
    return this.inboxFile(sessionId, `.${sessionId}.lock`);
  }

  get registryDocument(): string {
    return path.join(this.rootDir, "registry.json");
  }

  get registryLock(): string {
    return path.join(this.rootDir, ".registry.lock");
  }

  private inboxFile(sessionId: string, fileName: string): string {
    assertFileSafeSessionId(sessionId, this.inboxDir);
    return resolveWithin(this.inboxDir, fileName);
  }
}
