import type { Key } from "ink";
import { charKey, namedKey, type KeyPress } from "../app/keys.js";

export type InkKey = Pick<
  Key,
  | "return"
  | "escape"
  | "backspace"
  | "delete"
  | "tab"
  | "upArrow"
  | "downArrow"
  | "leftArrow"
  | "rightArrow"
  | "ctrl"
>;

/** Maps an ink `useInput` event onto the core's key model. */
export const toKeyPress = (input: string, key: InkKey): KeyPress | null => {
  if (key.return) {
    return namedKey("enter");
  }
  if (key.escape) {
    return namedKey("escape");
  }
  // Most terminals send DEL for backspace, which ink reports as `delete`.
  if (key.backspace || key.delete) {
    return namedKey("backspace");
  }
  if (key.tab) {
    return namedKey("tab");
  }
  if (key.upArrow) {
    return namedKey("up");
  }
  if (key.downArrow) {
    return namedKey("down");
  }
  if (key.leftArrow) {
    return namedKey("left");
  }
  if (key.rightArrow) {
    return namedKey("right");
  }
  if (!input) {
    return null;
  }
  return charKey(input, key.ctrl);
};
