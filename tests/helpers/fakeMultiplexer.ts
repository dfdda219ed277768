import { MultiplexerError, type PaneInfo, type SplitDirection, type TerminalMultiplexer } from "../../src/gateways/multiplexer.js";

/** Call recorded by {@link FakeMultiplexer}, e.g. `["paste-buffer", "buf", "%2", true]`. */
export type RecordedCall = [string, ...unknown[]];

interface FakePane {
  workdir: string;
  title: string;
  screen: string;
}

/**
 * In-memory multiplexer: panes live in a map, every call is recorded, and any
 * operation can be made to fail through {@link failOn}.
 */
export class FakeMultiplexer implements TerminalMultiplexer {
  readonly calls: RecordedCall[] = [];
  readonly panes = new Map<string, FakePane>();
  readonly buffers = new Map<string, string>();
  /** Text pasted into each pane, in order. */
  readonly typed = new Map<string, string[]>();
  historyDepth: number | null = 5000;
  private nextPane: number;
  private readonly failures = new Map<string, string>();

  constructor(panes: Record<string, { workdir: string; title?: string; screen?: string }> = {}, nextPane = 10) {
    for (const [id, pane] of Object.entries(panes)) {
      this.panes.set(id, { workdir: pane.workdir, title: pane.title ?? "", screen: pane.screen ?? "" });
    }
    this.nextPane = nextPane;
  }

  /** Makes the named operation reject with a {@link MultiplexerError}. */
  failOn(operation: string, stderr = `${operation} failed`): void {
    this.failures.set(operation, stderr);
  }

  private enter(operation: string, ...args: unknown[]): void {
    this.calls.push([operation, ...args]);
    const failure = this.failures.get(operation);
    if (failure !== undefined) {
      throw new MultiplexerError(failure, [operation]);
    }
  }

  private pane(id: string): FakePane {
    const pane = this.panes.get(id);
    if (!pane) {
      throw new MultiplexerError(`can't find pane: ${id}`, [id]);
    }
    return pane;
  }

  async currentPath(paneId?: string): Promise<string> {
    this.enter("currentPath", paneId);
    return this.pane(paneId ?? "").workdir;
  }

  async listPanes(): Promise<PaneInfo[]> {
    this.enter("listPanes");
    return [...this.panes.entries()].map(([id, pane]) => ({ id, workdir: pane.workdir, title: pane.title }));
  }

  async historyLimit(): Promise<number | null> {
    this.enter("historyLimit");
    return this.historyDepth;
  }

  async captureText(paneId: string, maxLines: number): Promise<string> {
    this.enter("captureText", paneId, maxLines);
    return this.pane(paneId).screen;
  }

  async splitPane(parentPane: string, workdir: string, command: string, direction: SplitDirection): Promise<string> {
    this.enter("splitPane", parentPane, workdir, command, direction);
    this.pane(parentPane);
    const id = `%${this.nextPane}`;
    this.nextPane += 1;
    this.panes.set(id, { workdir, title: "", screen: "" });
    return id;
  }

  async clearLine(paneId: string): Promise<void> {
    this.enter("clearLine", paneId);
    this.typed.set(paneId, []);
  }

  async setBuffer(name: string, data: string): Promise<void> {
    this.enter("setBuffer", name, data);
    this.buffers.set(name, data);
  }

  async pasteBuffer(name: string, targetPane: string, deleteAfter: boolean): Promise<void> {
    this.enter("pasteBuffer", name, targetPane, deleteAfter);
    this.pane(targetPane);
    const data = this.buffers.get(name) ?? "";
    this.typed.set(targetPane, [...(this.typed.get(targetPane) ?? []), data]);
    if (deleteAfter) {
      this.buffers.delete(name);
    }
  }

  async sendEnter(paneId: string): Promise<void> {
    this.enter("sendEnter", paneId);
  }

  async killPane(paneId: string): Promise<void> {
    this.enter("killPane", paneId);
    this.pane(paneId);
    this.panes.delete(paneId);
  }

  async setTitle(paneId: string, title: string): Promise<void> {
    this.enter("setTitle", paneId, title);
    this.pane(paneId).title = title;
  }

  /** Operation names in call order. */
  operations(): string[] {
    return this.calls.map(([operation]) => operation);
  }
}
