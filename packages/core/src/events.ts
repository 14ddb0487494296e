/** One ingested line, or the end-of-input sentinel when `isTerminal` is set */
export interface LineEvent {
  readonly type: "line";
  readonly text: string;
  readonly isTerminal: boolean;
}

/** One printable keystroke: a single code point with ordinal >= 32 (backspace included) */
export interface KeyEvent {
  readonly type: "key";
  readonly char: string;
}

/** Terminal dimensions changed; the consumer re-queries them */
export interface ResizeEvent {
  readonly type: "resize";
}

export type PagerEvent = LineEvent | KeyEvent | ResizeEvent;

export function lineEvent(text: string): LineEvent {
  return Object.freeze({ type: "line", text, isTerminal: false });
}

export function endOfInput(): LineEvent {
  return Object.freeze({ type: "line", text: "", isTerminal: true });
}

export function keyEvent(char: string): KeyEvent {
  return Object.freeze({ type: "key", char });
}

export function resizeEvent(): ResizeEvent {
  return Object.freeze({ type: "resize" });
}
