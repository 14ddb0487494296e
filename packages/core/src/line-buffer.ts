import { BufferSealedError } from "./errors";

export const END_MARKER_TEXT = "(END)";

export interface LineEntry {
  /** 1-based, strictly increasing, no gaps */
  readonly index: number;
  readonly text: string;
  readonly isEnd: boolean;
}

/** Append-only record of every ingested line, closed by one end-of-stream marker. */
export class LineBuffer {
  private items: LineEntry[] = [];
  private sealed = false;

  append(text: string): LineEntry {
    if (this.sealed) throw new BufferSealedError();
    return this.push(text, false);
  }

  /** Append the end-of-stream marker. Repeated calls are ignored. */
  markEnd(): void {
    if (this.sealed) return;
    this.push(END_MARKER_TEXT, true);
    this.sealed = true;
  }

  get entries(): readonly LineEntry[] {
    return this.items;
  }

  get length(): number {
    return this.items.length;
  }

  get ended(): boolean {
    return this.sealed;
  }

  /** Digits needed for the largest index, so labels line up */
  get labelWidth(): number {
    return Math.max(1, String(this.items.length).length);
  }

  private push(text: string, isEnd: boolean): LineEntry {
    const entry: LineEntry = Object.freeze({ index: this.items.length + 1, text, isEnd });
    this.items.push(entry);
    return entry;
  }
}
