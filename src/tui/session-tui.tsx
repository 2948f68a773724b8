import React, { useEffect, useMemo, useState } from "react";
import { render, Box, Text, useApp, useInput, useStdout } from "ink";
import { sessionLabel } from "../app/labels.js";
import type { LoopOutcome, SessionController } from "../app/session-controller.js";
import type { Mode, SessionApp } from "../app/session-app.js";
import type { SessionTreeNode } from "../state/session-tree.js";
import { flattenVisible, samePath, type VisibleNode } from "../state/tree-state.js";
import {
  bannerLines,
  paneText,
  scrollWindow,
  sessionMeta,
  shortHostname,
  windowSummary
} from "./format.js";
import { toKeyPress } from "./keymap.js";

interface SessionTuiProps {
  app: SessionApp;
  controller: SessionController;
  showLogo: boolean;
  tickIntervalMs: number;
}

interface TreeRowProps {
  entry: VisibleNode<SessionTreeNode>;
  selected: boolean;
  open: boolean;
}

const STATUS_HEIGHT = 3;
const POPUP_HEIGHT = 4;
// Rule under the banner.
const BANNER_CHROME_HEIGHT = 1;
const BANNER_INDENT = 2;

const rowContent = (node: SessionTreeNode): React.ReactNode => {
  const item = node.item;
  switch (item.type) {
    case "session":
      return (
        <>
          <Text color="yellow" bold>
            [{sessionLabel(node.position) ?? "?"}]{" "}
          </Text>
          <Text color={item.session.attached ? "green" : "gray"}>
            {item.session.attached ? "● " : "○ "}
          </Text>
          <Text color="cyan" bold>
            {item.session.name}
          </Text>
          <Text dimColor>{sessionMeta(item.session)}</Text>
          {item.session.attached ? <Text color="green">  [attached]</Text> : null}
        </>
      );
    case "window":
      return (
        <>
          <Text color="yellow">[{node.position + 1}] </Text>
          <Text color="white">{item.window.name}</Text>
          <Text dimColor>  {windowSummary(item.window)}</Text>
        </>
      );
    case "pane":
      return <Text dimColor>{paneText(item.pane)}</Text>;
  }
};

const TreeRow: React.FC<TreeRowProps> = ({ entry, selected, open }) => {
  const toggle = entry.node.children.length === 0 ? "  " : open ? "▾ " : "▸ ";
  return (
    <Text backgroundColor={selected ? "gray" : undefined} bold={selected} wrap="truncate-end">
      {selected ? ">> " : "   "}
      {"  ".repeat(entry.depth)}
      {toggle}
      {rowContent(entry.node)}
    </Text>
  );
};

const ModePopup: React.FC<{ mode: Mode }> = ({ mode }) => {
  switch (mode.type) {
    case "normal":
      return null;
    case "create_session":
    case "rename_session":
      return (
        <Box borderStyle="round" borderColor="magenta" flexDirection="column" paddingX={1}>
          <Text bold>
            {mode.type === "create_session" ? "New Session" : `Rename '${mode.target}'`}
          </Text>
          <Text>
            <Text color="cyan">{"> "}</Text>
            <Text color="white">{mode.input}</Text>
            <Text color="cyan">{"█"}</Text>
          </Text>
        </Box>
      );
    case "confirm_kill":
      return (
        <Box borderStyle="round" borderColor="red" flexDirection="column" paddingX={1}>
          <Text bold>Confirm Kill</Text>
          <Text>
            Kill session{" "}
            <Text color="yellow" bold>
              {`'${mode.target}'`}
            </Text>
            ? <Text color="cyan">[y/N]</Text>
          </Text>
        </Box>
      );
  }
};

const KEY_HINTS: Array<[string, string]> = [
  ["a-z", "select"],
  ["A-Z", "open"],
  ["1-9", "window"],
  ["Enter", "attach"],
  ["n", "new"],
  ["r", "rename"],
  ["d", "kill"],
  ["q", "quit"]
];

const StatusBar: React.FC<{ flash: string | null }> = ({ flash }) => (
  <Box
    flexDirection="column"
    borderStyle="single"
    borderBottom={false}
    borderLeft={false}
    borderRight={false}
    borderColor="gray"
  >
    <Text color="yellow">{flash ? `  ${flash}` : " "}</Text>
    <Text>
      {" "}
      {KEY_HINTS.map(([key, label]) => (
        <Text key={key}>
          {" "}
          <Text color="cyan">{key}</Text>
          <Text dimColor>:{label}</Text>
        </Text>
      ))}
    </Text>
  </Box>
);

const SessionTui: React.FC<SessionTuiProps> = ({ app, controller, showLogo, tickIntervalMs }) => {
  const [, setVersion] = useState(0);
  const { exit } = useApp();
  const { stdout } = useStdout();

  useEffect(() => {
    const changed = (): void => {
      setVersion((version) => version + 1);
    };
    app.on("changed", changed);
    return () => {
      app.off("changed", changed);
    };
  }, [app]);

  useEffect(() => {
    const finished = (): void => {
      exit();
    };
    controller.on("finished", finished);
    return () => {
      controller.off("finished", finished);
    };
  }, [controller, exit]);

  useEffect(() => {
    const interval = setInterval(() => {
      void controller.tick();
    }, tickIntervalMs);
    return () => clearInterval(interval);
  }, [controller, tickIntervalMs]);

  useInput((input, key) => {
    const press = toKeyPress(input, key);
    if (press) {
      void controller.pressKey(press);
    }
  });

  const columns = stdout.columns || 80;
  const banner = useMemo(
    () => (showLogo ? bannerLines(shortHostname(), columns - BANNER_INDENT) : []),
    [showLogo, columns]
  );
  const headerHeight = showLogo ? banner.length + BANNER_CHROME_HEIGHT : 0;

  const mode = app.mode;
  const visible = flattenVisible(app.treeNodes, (path) => app.tree.isOpen(path));
  const selection = app.tree.currentSelection();
  const selectedIndex = visible.findIndex((entry) => samePath(entry.path, selection));
  const treeHeight =
    (stdout.rows || 24) -
    STATUS_HEIGHT -
    headerHeight -
    (mode.type === "normal" ? 0 : POPUP_HEIGHT) -
    1;
  const { start, end } = scrollWindow(visible.length, selectedIndex, treeHeight);

  return (
    <Box flexDirection="column">
      {showLogo ? (
        <Box
          borderStyle="single"
          borderTop={false}
          borderLeft={false}
          borderRight={false}
          borderColor="gray"
        >
          <Box flexDirection="column" paddingLeft={BANNER_INDENT}>
            {banner.map((line, index) => (
              <Text key={index} color="magenta" bold wrap="truncate-end">
                {line}
              </Text>
            ))}
          </Box>
        </Box>
      ) : null}

      {visible.length === 0 ? (
        <Box flexDirection="column" paddingY={1}>
          <Text dimColor>  No tmux sessions found.</Text>
          <Text color="yellow">  Press n to create a new session.</Text>
        </Box>
      ) : (
        <Box flexDirection="column">
          {visible.slice(start, end).map((entry, offset) => (
            <TreeRow
              key={entry.path.join("\u0000")}
              entry={entry}
              selected={start + offset === selectedIndex}
              open={app.tree.isOpen(entry.path)}
            />
          ))}
        </Box>
      )}

      <ModePopup mode={mode} />
      <StatusBar flash={app.flash?.text ?? null} />
    </Box>
  );
};

export interface SessionTuiOptions {
  showLogo: boolean;
  tickIntervalMs: number;
}

/** Renders until the user quits or picks an attach target. */
export const runSessionTui = async (
  app: SessionApp,
  controller: SessionController,
  options: SessionTuiOptions
): Promise<LoopOutcome> => {
  const instance = render(
    <SessionTui
      app={app}
      controller={controller}
      showLogo={options.showLogo}
      tickIntervalMs={options.tickIntervalMs}
    />,
    { exitOnCtrlC: false }
  );
  await instance.waitUntilExit();
  return controller.outcome ?? { type: "quit" };
};
