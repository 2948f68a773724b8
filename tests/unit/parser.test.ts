import { describe, expect, test } from "vitest";
import { parseSessionTree, SESSION_TREE_FMT } from "../../src/tmux/parser.js";

const SAMPLE = [
  "dev|$0|1|2|1700000000|0|zsh|1|0|zsh|/home/user|1",
  "dev|$0|1|2|1700000000|1|make|0|0|make|/home/user/project|1",
  "scratch|$1|0|1|1700000001|0|vim|1|0|vim|/tmp|1",
  "scratch|$1|0|1|1700000001|0|vim|1|1|bash|/tmp|0"
].join("\n");

describe("session tree parser", () => {
  test("builds the tmux format string from the twelve fields", () => {
    expect(SESSION_TREE_FMT).toBe(
      "#{session_name}|#{session_id}|#{session_attached}|#{session_windows}|#{session_created}|" +
        "#{window_index}|#{window_name}|#{window_active}|#{pane_index}|#{pane_current_command}|" +
        "#{pane_current_path}|#{pane_active}"
    );
  });

  test("groups panes into windows and sessions", () => {
    const sessions = parseSessionTree(`${SAMPLE}\n`);

    expect(sessions).toHaveLength(2);
    const [dev, scratch] = sessions;
    expect(dev).toMatchObject({
      name: "dev",
      id: "$0",
      attached: true,
      windows: 2,
      created: 1700000000
    });
    expect(dev.windowStates.map((window) => window.name)).toEqual(["zsh", "make"]);
    expect(scratch.attached).toBe(false);
    expect(scratch.windowStates).toHaveLength(1);
    expect(scratch.windowStates[0].panes).toEqual([
      { index: 0, currentCommand: "vim", currentPath: "/tmp", active: true },
      { index: 1, currentCommand: "bash", currentPath: "/tmp", active: false }
    ]);
  });

  test("returns an empty hierarchy for empty output", () => {
    expect(parseSessionTree("")).toEqual([]);
    expect(parseSessionTree("\n\n")).toEqual([]);
  });

  test("sorts windows and panes by index regardless of line order", () => {
    const sessions = parseSessionTree(
      [
        "main|$2|0|3|1|7|logs|0|2|tail|/var/log|0",
        "main|$2|0|3|1|3|edit|1|0|nvim|/src|1",
        "main|$2|0|3|1|7|logs|0|0|less|/var/log|1",
        "main|$2|0|3|1|0|shell|0|0|zsh|/|1"
      ].join("\n")
    );

    const [main] = sessions;
    expect(main.windowStates.map((window) => window.index)).toEqual([0, 3, 7]);
    expect(main.windowStates[2].panes.map((pane) => pane.index)).toEqual([0, 2]);
  });

  test("keeps sessions in order of first appearance and deduplicates them", () => {
    const sessions = parseSessionTree(
      [
        "zeta|$5|0|1|10|0|a|1|0|sh|/|1",
        "alpha|$6|0|1|11|0|b|1|0|sh|/|1",
        "zeta|$9|1|4|99|1|c|0|0|sh|/|1"
      ].join("\n")
    );

    expect(sessions.map((session) => session.name)).toEqual(["zeta", "alpha"]);
    expect(sessions[0]).toMatchObject({ id: "$5", attached: false, windows: 1, created: 10 });
    expect(sessions[0].windowStates).toHaveLength(2);
  });

  test("first occurrence wins for window name and active flag", () => {
    const [session] = parseSessionTree(
      ["s|$0|0|1|1|0|first|1|0|sh|/|1", "s|$0|0|1|1|0|second|0|1|sh|/|0"].join("\n")
    );

    expect(session.windowStates).toEqual([
      expect.objectContaining({ index: 0, name: "first", active: true })
    ]);
    expect(session.windowStates[0].panes).toHaveLength(2);
  });

  test("skips lines with fewer than twelve fields", () => {
    const sessions = parseSessionTree(
      ["broken|$0|1", "ok|$1|0|1|1|0|w|1|0|sh|/|1", "also|broken|line|1|2|3|4|5|6|7|8"].join("\n")
    );

    expect(sessions.map((session) => session.name)).toEqual(["ok"]);
  });

  test("defaults unparsable numbers to zero", () => {
    const [session] = parseSessionTree("s|$0|1|many|soon|x|w|1|-1|sh|/|1");

    expect(session.windows).toBe(0);
    expect(session.created).toBe(0);
    expect(session.windowStates[0].index).toBe(0);
    expect(session.windowStates[0].panes[0].index).toBe(0);
  });

  test("treats anything but a literal 0 as true and trims the last field", () => {
    const [session] = parseSessionTree(
      ["s|$0|2|1|1|0|w|yes|0|sh|/|0  ", "s|$0|2|1|1|0|w|yes|1|sh|/|1\r"].join("\n")
    );

    expect(session.attached).toBe(true);
    expect(session.windowStates[0].active).toBe(true);
    expect(session.windowStates[0].panes.map((pane) => pane.active)).toEqual([false, true]);
  });

  test("keeps identity fields verbatim", () => {
    const [session] = parseSessionTree("my session|$3|0|1|1|0| spaced |1|0|node server.js|/srv/app dir|1");

    expect(session.name).toBe("my session");
    expect(session.windowStates[0].name).toBe(" spaced ");
    expect(session.windowStates[0].panes[0]).toMatchObject({
      currentCommand: "node server.js",
      currentPath: "/srv/app dir"
    });
  });

  test("parsing the same text twice yields equal hierarchies", () => {
    expect(parseSessionTree(SAMPLE)).toEqual(parseSessionTree(SAMPLE));
  });
});
