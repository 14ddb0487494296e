import { openSync } from "node:fs";
import { ReadStream } from "node:tty";

export type TerminalInput = NodeJS.ReadableStream & {
  isTTY?: boolean;
  isRaw?: boolean;
  setRawMode?(mode: boolean): void;
};

export type TerminalOutput = NodeJS.WritableStream & { columns?: number; rows?: number };

export interface TerminalOptions {
  /** Keyboard source; the controlling terminal when stdin is a pipe */
  input?: TerminalInput;
  output?: TerminalOutput;
}

export interface TerminalSize {
  rows: number;
  columns: number;
}

// ANSI escape sequences
const SEQ = {
  SYNC_START: "\x1b[?2026h",
  SYNC_END: "\x1b[?2026l",
  HIDE_CURSOR: "\x1b[?25l",
  SHOW_CURSOR: "\x1b[?25h",
  SAVE_CURSOR: "\x1b7",
  RESTORE_CURSOR: "\x1b8",
  CLEAR_SCREEN: "\x1b[2J\x1b[H",
  ALT_SCREEN_ENTER: "\x1b[?1049h",
  ALT_SCREEN_LEAVE: "\x1b[?1049l",
} as const;

export class Terminal {
  readonly input: TerminalInput | undefined;
  readonly output: TerminalOutput;
  private originalRawMode: boolean | undefined;
  private readonly exitHandler = () => this.restoreMode();

  constructor(options?: TerminalOptions) {
    this.input = options?.input;
    this.output = options?.output ?? process.stdout;
  }

  /** Unbuffered, unechoed input. Restored by `restoreMode()` or, failing that, on process exit. */
  enableRawMode(): void {
    const input = this.input;
    if (!input?.isTTY || !input.setRawMode || this.originalRawMode !== undefined) return;
    this.originalRawMode = input.isRaw ?? false;
    input.setRawMode(true);
    process.on("exit", this.exitHandler);
  }

  restoreMode(): void {
    if (this.originalRawMode === undefined) return;
    const original = this.originalRawMode;
    this.originalRawMode = undefined;
    process.removeListener("exit", this.exitHandler);
    this.input?.setRawMode?.(original);
  }

  get isRawModeEnabled(): boolean {
    return this.originalRawMode !== undefined;
  }

  /** Subscribe to size changes; returns the unsubscribe function */
  onResize(handler: () => void): () => void {
    this.output.on("resize", handler);
    return () => {
      this.output.removeListener("resize", handler);
    };
  }

  /** Write to stdout (raw) */
  write(data: string): void {
    this.output.write(data);
  }

  /** Write wrapped in synchronized output sequences to prevent flicker */
  writeSynchronized(data: string): void {
    this.output.write(SEQ.SYNC_START + data + SEQ.SYNC_END);
  }

  /** Terminal dimensions */
  get columns(): number {
    return this.output.columns ?? 80;
  }

  get rows(): number {
    return this.output.rows ?? 24;
  }

  size(): TerminalSize {
    return { rows: this.rows, columns: this.columns };
  }

  /** Alternate screen */
  enterAltScreen(): void {
    this.write(SEQ.ALT_SCREEN_ENTER);
  }

  leaveAltScreen(): void {
    this.write(SEQ.ALT_SCREEN_LEAVE);
  }

  /** Cursor control */
  hideCursor(): void {
    this.write(SEQ.HIDE_CURSOR);
  }

  showCursor(): void {
    this.write(SEQ.SHOW_CURSOR);
  }

  saveCursor(): void {
    this.write(SEQ.SAVE_CURSOR);
  }

  restoreCursor(): void {
    this.write(SEQ.RESTORE_CURSOR);
  }

  /** 0-based coordinates */
  moveCursorTo(row: number, col: number): void {
    this.write(cursorTo(row, col));
  }

  clearScreen(): void {
    this.write(SEQ.CLEAR_SCREEN);
  }
}

export function cursorTo(row: number, col: number): string {
  return `\x1b[${row + 1};${col + 1}H`;
}

export const CLEAR_SCREEN = SEQ.CLEAR_SCREEN;

/**
 * Open the controlling terminal for keyboard input.
 * stdin is taken by the piped data, so keys come from /dev/tty directly.
 */
export function openControllingTerminal(): ReadStream {
  return new ReadStream(openSync("/dev/tty", "r"));
}
