import type { LineEntry } from "@strainer/core";
import { CLEAR_SCREEN, cursorTo } from "./framework/terminal";
import { clipToWidth, fitToWidth, toPrintable } from "./framework/string-width";
import { t } from "./theme";

/** Marks the editing position at the end of the filter prompt */
export const CURSOR_MARKER = "█";

export const SEPARATOR_CHAR = "─";

export interface FrameInput {
  /** Filtered view, in buffer order */
  entries: readonly LineEntry[];
  /** Digit width of the whole buffer's count, not just the view's */
  labelWidth: number;
  filter: string;
  prompt: string;
  rows: number;
  columns: number;
}

/**
 * Lay out one full screen: the tail of the view, a separator on row
 * `rows - 2` and the filter prompt on the last row. Always returns
 * exactly `rows` lines (none when `rows` is not positive).
 */
export function renderFrame(frame: FrameInput): string[] {
  const columns = Math.max(1, frame.columns);
  const rows = Math.max(0, frame.rows);
  const promptLine = fitToWidth(frame.prompt + frame.filter + CURSOR_MARKER, columns);
  const separator = SEPARATOR_CHAR.repeat(columns);

  if (rows === 0) return [];
  if (rows === 1) return [promptLine];

  const bodyRows = rows - 2;
  const visible = bodyRows > 0 ? frame.entries.slice(-bodyRows) : [];
  const lines = visible.map((entry) => formatEntry(entry, frame.labelWidth, columns));
  while (lines.length < bodyRows) lines.push("");

  lines.push(separator, promptLine);
  return lines;
}

function formatEntry(entry: LineEntry, labelWidth: number, columns: number): string {
  const label = String(entry.index).padStart(labelWidth, "0");
  const text = clipToWidth(toPrintable(entry.text), Math.max(0, columns - labelWidth - 1));
  const body = entry.isEnd ? `${t.endMarker}${text}${t.reset}` : text;
  return `${t.label}${label}${t.reset} ${body}`;
}

/** Full redraw bytes: clear, then every row written at its own position */
export function paintFrame(lines: readonly string[]): string {
  let out = CLEAR_SCREEN;
  for (const [row, line] of lines.entries()) {
    out += cursorTo(row, 0) + line;
  }
  return out;
}
