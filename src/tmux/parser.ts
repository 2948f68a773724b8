import type { TmuxSessionState, TmuxWindowState } from "../types/model.js";

export const FIELD_SEPARATOR = "|";

export const SESSION_TREE_FIELDS = [
  "session_name",
  "session_id",
  "session_attached",
  "session_windows",
  "session_created",
  "window_index",
  "window_name",
  "window_active",
  "pane_index",
  "pane_current_command",
  "pane_current_path",
  "pane_active"
] as const;

export const SESSION_TREE_FMT = SESSION_TREE_FIELDS.map((field) => `#{${field}}`).join(
  FIELD_SEPARATOR
);

const parseCount = (value: string): number =>
  /^\d+$/.test(value) ? Number.parseInt(value, 10) : 0;

const parseFlag = (value: string): boolean => value !== "0";

/**
 * Builds the session → window → pane hierarchy from one `list-panes -a`
 * response. Sessions keep the order of their first appearance; windows and
 * panes are sorted by index.
 */
export const parseSessionTree = (raw: string): TmuxSessionState[] => {
  const sessions = new Map<string, TmuxSessionState>();

  for (const line of raw.split("\n")) {
    const parts = line.replace(/\r$/, "").split(FIELD_SEPARATOR);
    if (parts.length < SESSION_TREE_FIELDS.length) {
      continue;
    }

    const [
      sessionName,
      sessionId,
      sessionAttached,
      sessionWindows,
      sessionCreated,
      windowIndex,
      windowName,
      windowActive,
      paneIndex,
      paneCommand,
      panePath,
      paneActive
    ] = parts;

    let session = sessions.get(sessionName);
    if (!session) {
      session = {
        name: sessionName,
        id: sessionId,
        attached: parseFlag(sessionAttached),
        windows: parseCount(sessionWindows),
        created: parseCount(sessionCreated),
        windowStates: []
      };
      sessions.set(sessionName, session);
    }

    const index = parseCount(windowIndex);
    let window: TmuxWindowState | undefined = session.windowStates.find(
      (candidate) => candidate.index === index
    );
    if (!window) {
      window = {
        index,
        name: windowName,
        active: parseFlag(windowActive),
        panes: []
      };
      session.windowStates.push(window);
    }

    window.panes.push({
      index: parseCount(paneIndex),
      currentCommand: paneCommand,
      currentPath: panePath,
      active: parseFlag(paneActive.trim())
    });
  }

  const parsed = Array.from(sessions.values());
  for (const session of parsed) {
    session.windowStates.sort((left, right) => left.index - right.index);
    for (const window of session.windowStates) {
      window.panes.sort((left, right) => left.index - right.index);
    }
  }
  return parsed;
};
