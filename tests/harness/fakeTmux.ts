import type { TmuxGateway } from "../../src/tmux/types.js";
import { TmuxCommandError } from "../../src/tmux/types.js";
import type { TmuxSessionState, TmuxWindowState } from "../../src/types/model.js";

interface FakeTmuxOptions {
  available?: boolean;
}

type FailingOperation = "list" | "create" | "rename" | "kill";

let createdCounter = 1_700_000_000;

export const buildWindow = (index: number, name: string, paneCount = 1): TmuxWindowState => ({
  index,
  name,
  active: index === 0,
  panes: Array.from({ length: paneCount }, (_, paneIndex) => ({
    index: paneIndex,
    currentCommand: "bash",
    currentPath: "/home/tester",
    active: paneIndex === 0
  }))
});

export const buildSession = (
  name: string,
  windows: TmuxWindowState[] = [buildWindow(0, "shell")]
): TmuxSessionState => ({
  name,
  id: `$${name}`,
  attached: false,
  windows: windows.length,
  created: createdCounter++,
  windowStates: windows
});

/** In-memory tmux server. Every gateway call is recorded in `calls`. */
export class FakeTmuxGateway implements TmuxGateway {
  private sessions: TmuxSessionState[];
  private readonly available: boolean;
  private readonly failures = new Map<FailingOperation, string>();
  public readonly calls: string[] = [];

  public constructor(seed: Array<string | TmuxSessionState> = [], options: FakeTmuxOptions = {}) {
    this.sessions = seed.map((entry) => (typeof entry === "string" ? buildSession(entry) : entry));
    this.available = options.available ?? true;
  }

  public failNext(operation: FailingOperation, message: string): void {
    this.failures.set(operation, message);
  }

  public setSessions(sessions: TmuxSessionState[]): void {
    this.sessions = sessions;
  }

  public isAvailable(): Promise<boolean> {
    this.calls.push("isAvailable");
    return Promise.resolve(this.available);
  }

  public async listSessionTree(): Promise<TmuxSessionState[]> {
    this.calls.push("listSessionTree");
    this.throwIfFailing("list", ["list-panes", "-a"]);
    return structuredClone(this.sessions);
  }

  public async createSession(name: string): Promise<void> {
    this.calls.push(`createSession:${name}`);
    this.throwIfFailing("create", ["new-session", "-d", "-s", name]);
    if (this.sessions.some((session) => session.name === name)) {
      throw new TmuxCommandError(
        `Failed to create session: duplicate session: ${name}`,
        ["new-session", "-d", "-s", name]
      );
    }
    this.sessions.push(buildSession(name));
  }

  public async renameSession(oldName: string, newName: string): Promise<void> {
    this.calls.push(`renameSession:${oldName}:${newName}`);
    this.throwIfFailing("rename", ["rename-session", "-t", oldName, newName]);
    const session = this.sessions.find((candidate) => candidate.name === oldName);
    if (!session) {
      throw new TmuxCommandError(
        `Failed to rename session: can't find session: ${oldName}`,
        ["rename-session", "-t", oldName, newName]
      );
    }
    session.name = newName;
  }

  public async killSession(name: string): Promise<void> {
    this.calls.push(`killSession:${name}`);
    this.throwIfFailing("kill", ["kill-session", "-t", name]);
    this.sessions = this.sessions.filter((session) => session.name !== name);
  }

  private throwIfFailing(operation: FailingOperation, args: string[]): void {
    const message = this.failures.get(operation);
    if (message === undefined) {
      return;
    }
    this.failures.delete(operation);
    throw new TmuxCommandError(message, args);
  }
}
