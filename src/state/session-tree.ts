import type {
  SessionHierarchy,
  TmuxPaneState,
  TmuxSessionState,
  TmuxWindowState
} from "../types/model.js";
import type { TreeNode } from "./tree-state.js";

export type SessionTreeItem =
  | { type: "session"; session: TmuxSessionState }
  | { type: "window"; sessionName: string; window: TmuxWindowState }
  | { type: "pane"; pane: TmuxPaneState };

export interface SessionTreeNode extends TreeNode<SessionTreeNode> {
  /** 0-based rank among siblings. */
  position: number;
  item: SessionTreeItem;
}

const paneNodes = (window: TmuxWindowState): SessionTreeNode[] =>
  // A lone pane is the window itself, so it gets no leaf of its own.
  window.panes.length > 1
    ? window.panes.map((pane, position): SessionTreeNode => ({
        id: String(pane.index),
        position,
        item: { type: "pane", pane },
        children: []
      }))
    : [];

export const buildSessionTree = (sessions: SessionHierarchy): SessionTreeNode[] =>
  sessions.map((session, position): SessionTreeNode => ({
    id: session.name,
    position,
    item: { type: "session", session },
    children: session.windowStates.map((window, windowPosition): SessionTreeNode => ({
      id: String(window.index),
      position: windowPosition,
      item: { type: "window", sessionName: session.name, window },
      children: paneNodes(window)
    }))
  }));
