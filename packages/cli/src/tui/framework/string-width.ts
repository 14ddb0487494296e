/** Code point ranges a terminal draws two columns wide, ascending */
const WIDE_RANGES: ReadonlyArray<readonly [number, number]> = [
  [0x1100, 0x115f],
  [0x2e80, 0x303e],
  [0x3040, 0x33bf],
  [0x3400, 0x4dbf],
  [0x4e00, 0x9fff],
  [0xac00, 0xd7af],
  [0xf900, 0xfaff],
  [0xfe10, 0xfe6f],
  [0xff01, 0xff60],
  [0xffe0, 0xffe6],
  [0x20000, 0x2fa1f],
];

const TAB_STOP = 8;

/** Columns one character occupies: 2 for CJK and fullwidth forms, else 1 */
export function charWidth(char: string): number {
  const cp = char.codePointAt(0) ?? 0;
  if (cp < 0x1100) return 1;
  for (const [lo, hi] of WIDE_RANGES) {
    if (cp < lo) return 1;
    if (cp <= hi) return 2;
  }
  return 1;
}

/** Columns a plain string occupies; no escape sequences expected */
export function displayWidth(str: string): number {
  let width = 0;
  for (const char of str) width += charWidth(char);
  return width;
}

/** Longest prefix of `str` that fits in `maxWidth` columns; wide characters are never split */
export function takeWidth(str: string, maxWidth: number): string {
  let width = 0;
  let end = 0;
  for (const char of str) {
    width += charWidth(char);
    if (width > maxWidth) break;
    end += char.length;
  }
  return str.slice(0, end);
}

/**
 * Fit a plain string into exactly `width` columns: right-padded with spaces
 * when short, cut with a trailing ellipsis when too wide.
 */
export function fitToWidth(str: string, width: number): string {
  const w = displayWidth(str);
  if (w <= width) return str + " ".repeat(width - w);
  const head = takeWidth(str, Math.max(0, width - 1));
  // A wide character may leave one column short of the cut
  return head + " ".repeat(Math.max(0, width - 1 - displayWidth(head))) + "…";
}

/** Cut a plain string to at most `width` columns, without padding */
export function clipToWidth(str: string, width: number): string {
  return displayWidth(str) <= width ? str : takeWidth(str, width);
}

/**
 * Make arbitrary input safe to draw: tabs expand to the next stop, other
 * control characters (ESC included) show in caret notation, so `^[` for ESC
 * and `^?` for DEL.
 */
export function toPrintable(str: string): string {
  let out = "";
  let column = 0;
  for (const char of str) {
    const cp = char.codePointAt(0) ?? 0;
    let shown: string;
    if (char === "\t") {
      shown = " ".repeat(TAB_STOP - (column % TAB_STOP));
    } else if (cp < 0x20) {
      shown = `^${String.fromCharCode(cp + 0x40)}`;
    } else if (cp === 0x7f) {
      shown = "^?";
    } else {
      shown = char;
    }
    out += shown;
    column += displayWidth(shown);
  }
  return out;
}
