/**
 * Gateway to the terminal multiplexer hosting the agents. Every call is a
 * single-shot `tmux` invocation; the relay keeps no multiplexer state.
 */
import { execFile } from "node:child_process";
import { promisify } from "node:util";

/** Pane as reported by `list-panes -a`. */
export interface PaneInfo {
  readonly id: string;
  readonly workdir: string;
  readonly title: string;
}

export type SplitDirection = "down" | "right";

export interface TerminalMultiplexer {
  /** Current working directory of {@link paneId} (or of the active pane). */
  currentPath(paneId?: string): Promise<string>;
  listPanes(): Promise<PaneInfo[]>;
  /** Scroll-back depth configured on the server, `null` when unavailable. */
  historyLimit(): Promise<number | null>;
  /** Full text of the pane (escapes preserved, wrapped lines joined). */
  captureText(paneId: string, maxLines: number): Promise<string>;
  /** Splits {@link parentPane}, runs {@link command} in {@link workdir}, returns the new pane id. */
  splitPane(parentPane: string, workdir: string, command: string, direction: SplitDirection): Promise<string>;
  clearLine(paneId: string): Promise<void>;
  setBuffer(name: string, data: string): Promise<void>;
  pasteBuffer(name: string, targetPane: string, deleteAfter: boolean): Promise<void>;
  sendEnter(paneId: string): Promise<void>;
  killPane(paneId: string): Promise<void>;
  setTitle(paneId: string, title: string): Promise<void>;
}

/** Raised when a multiplexer command exits with a failure. */
export class MultiplexerError extends Error {
  readonly args: readonly string[];

  constructor(message: string, args: readonly string[]) {
    super(message);
    this.name = "MultiplexerError";
    this.args = args;
  }
}

/** Executes the multiplexer binary and resolves with its stdout. */
export type CommandRunner = (file: string, args: readonly string[]) => Promise<{ stdout: string; stderr: string }>;

const execFileAsync = promisify(execFile);

const defaultRunner: CommandRunner = (file, args) => execFileAsync(file, [...args], { encoding: "utf8" });

interface TmuxMultiplexerDeps {
  /** Concrete runner (defaults to `execFile`). Tests inject a recorder. */
  readonly run?: CommandRunner;
  /** Binary name, `tmux` unless overridden. */
  readonly binary?: string;
}

function extractStderr(error: unknown): string {
  if (error && typeof error === "object" && "stderr" in error && typeof error.stderr === "string") {
    return error.stderr.trim();
  }
  return "";
}

/** Factory returning the tmux-backed {@link TerminalMultiplexer}. */
export function createTmuxMultiplexer({ run = defaultRunner, binary = "tmux" }: TmuxMultiplexerDeps = {}): TerminalMultiplexer {
  const tmux = async (...args: string[]): Promise<string> => {
    try {
      const { stdout } = await run(binary, args);
      return stdout;
    } catch (error) {
      const stderr = extractStderr(error);
      throw new MultiplexerError(stderr || (error instanceof Error ? error.message : String(error)), args);
    }
  };

  return {
    async currentPath(paneId) {
      const args = ["display", "-p", "#{pane_current_path}"];
      if (paneId) {
        args.push("-t", paneId);
      }
      return (await tmux(...args)).trim();
    },

    async listPanes() {
      const out = await tmux("list-panes", "-a", "-F", "#{pane_id}\t#{pane_current_path}\t#{pane_title}");
      return out
        .split("\n")
        .filter((line) => line.length > 0)
        .map((line) => {
          const [id = "", workdir = "", title = ""] = line.split("\t");
          return { id: id.trim(), workdir: workdir.trim(), title: title.trim() };
        });
    },

    async historyLimit() {
      try {
        const value = Number.parseInt((await tmux("show", "-gv", "history-limit")).trim(), 10);
        return Number.isSafeInteger(value) && value > 0 ? value : null;
      } catch (error) {
        if (error instanceof MultiplexerError) {
          return null;
        }
        throw error;
      }
    },

    captureText(paneId, maxLines) {
      return tmux("capture-pane", "-p", "-e", "-J", "-S", `-${maxLines}`, "-t", paneId);
    },

    async splitPane(parentPane, workdir, command, direction) {
      const args = ["split-window", "-P", "-F", "#{pane_id}", "-c", workdir, "-t", parentPane];
      if (direction === "right") {
        args.splice(1, 0, "-h");
      }
      args.push(command);
      return (await tmux(...args)).trim();
    },

    async clearLine(paneId) {
      await tmux("send-keys", "-t", paneId, "C-u");
    },

    async setBuffer(name, data) {
      await tmux("set-buffer", "-b", name, "--", data);
    },

    async pasteBuffer(name, targetPane, deleteAfter) {
      const args = ["paste-buffer", "-b", name, "-t", targetPane];
      if (deleteAfter) {
        args.push("-d");
      }
      await tmux(...args);
    },

    async sendEnter(paneId) {
      await tmux("send-keys", "-t", paneId, "Enter");
    },

    async killPane(paneId) {
      await tmux("kill-pane", "-t", paneId);
    },

    async setTitle(paneId, title) {
      await tmux("select-pane", "-t", paneId, "-T", title);
    },
  };
}
