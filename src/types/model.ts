export interface TmuxPaneState {
  index: number;
  currentCommand: string;
  currentPath: string;
  active: boolean;
}

export interface TmuxWindowState {
  index: number;
  name: string;
  active: boolean;
  panes: TmuxPaneState[];
}

export interface TmuxSessionSummary {
  name: string;
  id: string;
  attached: boolean;
  /** Window count as reported by tmux; may exceed `windowStates.length`. */
  windows: number;
  /** Unix timestamp (seconds). */
  created: number;
}

export interface TmuxSessionState extends TmuxSessionSummary {
  windowStates: TmuxWindowState[];
}

export type SessionHierarchy = readonly TmuxSessionState[];

/** `[]`, `[session]`, `[session, window]` or `[session, window, pane]`. */
export type TreePath = readonly string[];
