import { EventEmitter } from "node:events";
import { FLASH_TTL_MS, isFlashExpired, type FlashMessage } from "./flash.js";
import { printableText, type KeyPress, type NamedKey } from "./keys.js";
import { labelPosition } from "./labels.js";
import { buildSessionTree, type SessionTreeNode } from "../state/session-tree.js";
import { TreeState } from "../state/tree-state.js";
import { errorMessage, type TmuxGateway } from "../tmux/types.js";
import type { TmuxSessionState, TreePath } from "../types/model.js";
import type { Logger } from "../util/file-logger.js";

export const AUTO_REFRESH_INTERVAL_MS = 2_000;

export type Mode =
  | { type: "normal" }
  | { type: "create_session"; input: string }
  | { type: "rename_session"; target: string; input: string }
  | { type: "confirm_kill"; target: string };

export type AppAction =
  | { type: "quit" }
  | { type: "attach"; target: string }
  | { type: "refresh" }
  | { type: "none" };

export interface SessionAppOptions {
  tmux: TmuxGateway;
  logger?: Logger;
  now?: () => number;
  refreshIntervalMs?: number;
  flashTtlMs?: number;
}

const NORMAL: Mode = { type: "normal" };
const QUIT: AppAction = { type: "quit" };
const REFRESH: AppAction = { type: "refresh" };
const NONE: AppAction = { type: "none" };

const isKey = (key: KeyPress, name: NamedKey): boolean => key.type === "key" && key.name === name;

const dropLastChar = (input: string): string => Array.from(input).slice(0, -1).join("");

/** `session` for a session row, `session:window` for anything below it. */
export const attachTarget = (selection: TreePath): string | null => {
  if (selection.length === 0) {
    return null;
  }
  if (selection.length === 1) {
    return selection[0];
  }
  return `${selection[0]}:${selection[1]}`;
};

/**
 * Application core: owns the session hierarchy, the tree cursor and the
 * input mode, and turns key presses into actions for the run loop. Emits
 * `changed` whenever something the renderer shows may have changed.
 */
export class SessionApp extends EventEmitter {
  public readonly tree = new TreeState();
  private readonly tmux: TmuxGateway;
  private readonly logger?: Logger;
  private readonly now: () => number;
  private readonly refreshIntervalMs: number;
  private readonly flashTtlMs: number;
  private currentSessions: TmuxSessionState[] = [];
  private currentNodes: SessionTreeNode[] = [];
  private currentMode: Mode = NORMAL;
  private currentFlash: FlashMessage | null = null;
  private lastRefreshAt: number;

  public constructor(options: SessionAppOptions) {
    super();
    this.tmux = options.tmux;
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
    this.refreshIntervalMs = options.refreshIntervalMs ?? AUTO_REFRESH_INTERVAL_MS;
    this.flashTtlMs = options.flashTtlMs ?? FLASH_TTL_MS;
    this.lastRefreshAt = this.now();
  }

  /** Loads the sessions and focuses the first window of the first session. */
  public static async create(options: SessionAppOptions): Promise<SessionApp> {
    const app = new SessionApp(options);
    await app.refresh();
    const [first] = app.sessions;
    if (first) {
      app.tree.openAndSelect(app.sessions, first.name);
    }
    return app;
  }

  public get sessions(): readonly TmuxSessionState[] {
    return this.currentSessions;
  }

  public get treeNodes(): readonly SessionTreeNode[] {
    return this.currentNodes;
  }

  public get mode(): Mode {
    return this.currentMode;
  }

  public get flash(): FlashMessage | null {
    return this.currentFlash;
  }

  public setFlash(text: string): void {
    this.currentFlash = { text, createdAt: this.now() };
  }

  /** Logs an unexpected failure and shows it on the status line. */
  public reportFailure(context: string, error: unknown): void {
    this.logger?.error(context, error);
    this.setFlash(`Error: ${errorMessage(error)}`);
    this.emit("changed");
  }

  public async refresh(): Promise<void> {
    this.lastRefreshAt = this.now();
    try {
      this.currentSessions = await this.tmux.listSessionTree();
      this.currentNodes = buildSessionTree(this.currentSessions);
    } catch (error) {
      this.logger?.error("session refresh failed", error);
      this.setFlash(`Refresh failed: ${errorMessage(error)}`);
    }
    this.emit("changed");
  }

  /** Housekeeping: expires the flash message and refreshes on a fixed interval. */
  public async tick(): Promise<void> {
    const now = this.now();
    if (this.currentFlash && isFlashExpired(this.currentFlash, now, this.flashTtlMs)) {
      this.currentFlash = null;
      this.emit("changed");
    }
    if (now - this.lastRefreshAt >= this.refreshIntervalMs) {
      await this.refresh();
    }
  }

  public async handleKey(key: KeyPress): Promise<AppAction> {
    const action = await this.dispatchKey(this.currentMode, key);
    this.emit("changed");
    return action;
  }

  private async dispatchKey(mode: Mode, key: KeyPress): Promise<AppAction> {
    switch (mode.type) {
      case "normal":
        return this.handleNormalKey(key);
      case "create_session":
        return this.handleCreateSessionKey(mode, key);
      case "rename_session":
        return this.handleRenameSessionKey(mode, key);
      case "confirm_kill":
        return this.handleConfirmKillKey(mode, key);
    }
  }

  private handleNormalKey(key: KeyPress): AppAction {
    const nodes = this.currentNodes;

    if (key.type === "key") {
      switch (key.name) {
        case "escape":
          return QUIT;
        case "down":
          this.tree.moveDown(nodes);
          return NONE;
        case "up":
          this.tree.moveUp(nodes);
          return NONE;
        case "right":
          this.tree.expand(nodes);
          return NONE;
        case "left":
          this.tree.collapse();
          return NONE;
        case "enter":
          return this.attachSelection();
        default:
          return NONE;
      }
    }

    if (key.ctrl) {
      return key.char === "c" ? QUIT : NONE;
    }

    switch (key.char) {
      case "q":
        return QUIT;
      case "j":
        this.tree.moveDown(nodes);
        return NONE;
      case "k":
        this.tree.moveUp(nodes);
        return NONE;
      case "g":
        this.tree.selectFirst(nodes);
        return NONE;
      case "G":
        this.tree.selectLast(nodes);
        return NONE;
      case " ":
      case "l":
        this.tree.expand(nodes);
        return NONE;
      case "h":
        this.tree.collapse();
        return NONE;
      case "n":
        this.currentMode = { type: "create_session", input: "" };
        return NONE;
      case "d":
        return this.startKill();
      case "r":
        return this.startRename();
      case "R":
        return REFRESH;
      default:
        break;
    }

    if (/^[A-Z]$/.test(key.char)) {
      this.jumpToSession(key.char);
      return this.attachSelection();
    }
    if (/^[a-z]$/.test(key.char)) {
      this.jumpToSession(key.char);
      return NONE;
    }
    if (/^[1-9]$/.test(key.char)) {
      this.jumpToWindow(Number.parseInt(key.char, 10));
    }
    return NONE;
  }

  private async handleCreateSessionKey(
    mode: Extract<Mode, { type: "create_session" }>,
    key: KeyPress
  ): Promise<AppAction> {
    if (isKey(key, "escape")) {
      this.currentMode = NORMAL;
      return NONE;
    }
    if (isKey(key, "enter")) {
      this.currentMode = NORMAL;
      const name = mode.input.trim();
      if (!name) {
        return NONE;
      }
      return this.runMutation(() => this.tmux.createSession(name), `Created session '${name}'`);
    }

    this.currentMode = { ...mode, input: this.editInput(mode.input, key) };
    return NONE;
  }

  private async handleRenameSessionKey(
    mode: Extract<Mode, { type: "rename_session" }>,
    key: KeyPress
  ): Promise<AppAction> {
    if (isKey(key, "escape")) {
      this.currentMode = NORMAL;
      return NONE;
    }
    if (isKey(key, "enter")) {
      this.currentMode = NORMAL;
      const newName = mode.input.trim();
      if (!newName || newName === mode.target) {
        return NONE;
      }
      return this.runMutation(
        () => this.tmux.renameSession(mode.target, newName),
        `Renamed '${mode.target}' → '${newName}'`
      );
    }

    this.currentMode = { ...mode, input: this.editInput(mode.input, key) };
    return NONE;
  }

  private async handleConfirmKillKey(
    mode: Extract<Mode, { type: "confirm_kill" }>,
    key: KeyPress
  ): Promise<AppAction> {
    this.currentMode = NORMAL;
    if (key.type !== "char" || key.ctrl || (key.char !== "y" && key.char !== "Y")) {
      return NONE;
    }
    return this.runMutation(
      () => this.tmux.killSession(mode.target),
      `Killed session '${mode.target}'`
    );
  }

  private editInput(input: string, key: KeyPress): string {
    if (isKey(key, "backspace")) {
      return dropLastChar(input);
    }
    const text = printableText(key);
    return text === null ? input : input + text;
  }

  private async runMutation(operation: () => Promise<void>, success: string): Promise<AppAction> {
    try {
      await operation();
      this.setFlash(success);
      return REFRESH;
    } catch (error) {
      this.logger?.error(error);
      this.setFlash(`Error: ${errorMessage(error)}`);
      return NONE;
    }
  }

  private attachSelection(): AppAction {
    const target = attachTarget(this.tree.currentSelection());
    return target === null ? NONE : { type: "attach", target };
  }

  private selectedSession(): string | undefined {
    const [sessionName] = this.tree.currentSelection();
    return sessionName;
  }

  private startKill(): AppAction {
    const target = this.selectedSession();
    if (target !== undefined) {
      this.currentMode = { type: "confirm_kill", target };
    }
    return NONE;
  }

  private startRename(): AppAction {
    const target = this.selectedSession();
    if (target !== undefined) {
      this.currentMode = { type: "rename_session", target, input: target };
    }
    return NONE;
  }

  /** Letter jump: `a`/`A` is the first session, `z`/`Z` the 26th. */
  private jumpToSession(letter: string): void {
    const position = labelPosition(letter);
    const session = position === undefined ? undefined : this.currentSessions[position];
    if (session) {
      this.tree.openAndSelect(this.currentSessions, session.name);
    }
  }

  private jumpToWindow(position: number): void {
    const sessionName = this.selectedSession();
    if (sessionName !== undefined) {
      this.tree.selectWindow(this.currentSessions, sessionName, position);
    }
  }
}
