export type NamedKey = "enter" | "escape" | "backspace" | "tab" | "up" | "down" | "left" | "right";

/** Terminal-toolkit independent key press. `char` holds more than one character for pastes. */
export type KeyPress = { type: "char"; char: string; ctrl: boolean } | { type: "key"; name: NamedKey };

export const charKey = (char: string, ctrl = false): KeyPress => ({ type: "char", char, ctrl });

export const namedKey = (name: NamedKey): KeyPress => ({ type: "key", name });

const CONTROL_CHARS = /[\u0000-\u001f\u007f]/;

/** Text a key press contributes to an input buffer, if any. */
export const printableText = (key: KeyPress): string | null => {
  if (key.type !== "char" || key.ctrl || key.char === "" || CONTROL_CHARS.test(key.char)) {
    return null;
  }
  return key.char;
};
