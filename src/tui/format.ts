import os from "node:os";
import figlet from "figlet";
import type { TmuxPaneState, TmuxSessionState, TmuxWindowState } from "../types/model.js";

/** Replaces the home directory prefix with `~`. */
export const shortenPath = (currentPath: string, home: string = os.homedir()): string => {
  if (!home || home === "/") {
    return currentPath;
  }
  if (currentPath === home) {
    return "~";
  }
  if (currentPath.startsWith(`${home}/`)) {
    return `~${currentPath.slice(home.length)}`;
  }
  return currentPath;
};

/** The active pane, or the first one when tmux reports none as active. */
export const activePane = (window: TmuxWindowState): TmuxPaneState | undefined =>
  window.panes.find((pane) => pane.active) ?? window.panes[0];

export const windowSummary = (window: TmuxWindowState, home?: string): string => {
  const pane = activePane(window);
  if (!pane) {
    return "";
  }
  return `${pane.currentCommand}  ${shortenPath(pane.currentPath, home)}`;
};

export const sessionMeta = (session: TmuxSessionState): string => `  (${session.windows} win)`;

export const paneText = (pane: TmuxPaneState, home?: string): string =>
  `${pane.active ? "* " : "  "}pane ${pane.index}: ${pane.currentCommand}  ${shortenPath(
    pane.currentPath,
    home
  )}`;

export const shortHostname = (hostname: string = os.hostname()): string =>
  hostname.split(".")[0] || "muxtree";

export const BANNER_FONT = "Standard";

/**
 * ASCII-art rendering of `text`, without blank edges or trailing spaces. Falls back to the
 * plain text when the art is wider than `maxWidth`.
 */
export const bannerLines = (text: string, maxWidth: number = Number.POSITIVE_INFINITY): string[] => {
  const lines = figlet
    .textSync(text, { font: BANNER_FONT })
    .split("\n")
    .map((line) => line.trimEnd());
  while (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  while (lines.length > 0 && lines[0] === "") {
    lines.shift();
  }
  if (lines.length === 0 || lines.some((line) => line.length > maxWidth)) {
    return [text];
  }
  return lines;
};

/**
 * Slice of `total` rows that fits in `height` lines and keeps
 * `selectedIndex` in view (centred where possible).
 */
export const scrollWindow = (
  total: number,
  selectedIndex: number,
  height: number
): { start: number; end: number } => {
  const rows = Math.max(1, height);
  if (total <= rows) {
    return { start: 0, end: total };
  }
  const anchor = Math.max(0, selectedIndex);
  const start = Math.min(Math.max(0, anchor - Math.floor(rows / 2)), total - rows);
  return { start, end: start + rows };
};
