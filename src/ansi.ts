// Escape stripping for `tail --strip-ansi` and `watch --strip-ansi`.

// ESC [ <params> <intermediates> <final>: colors, cursor movement, erase
const CSI = /\u001B\[[0-?]*[ -/]*[@-~]/g;
// ESC ] ... BEL or ESC \: window titles, hyperlinks
const OSC = /\u001B\][^\u0007\u001B]*(?:\u0007|\u001B\\)/g;
// Remaining escapes: charset selection, keypad and cursor save/restore
const ESC = /\u001B[ -/]*[0-~]/g;
// C0 controls except tab and newline
const CONTROL = /[\u0000-\u0008\u000B-\u001F\u007F]/g;

/** Plain text of a captured log chunk; carriage-return redraws become separate lines. */
export function stripAnsiCodes(text: string): string {
  return text
    .replace(OSC, "")
    .replace(CSI, "")
    .replace(ESC, "")
    .replace(/\r\n?/g, "\n")
    .replace(CONTROL, "");
}
