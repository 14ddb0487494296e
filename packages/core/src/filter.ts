import type { LineEntry } from "./line-buffer";

export const BACKSPACE = "\x7f";

/** Typing exactly this leaves the pager instead of filtering for it */
export const QUIT_COMMAND = "jj";

export class FilterState {
  text = "";

  /** Backspace drops the last code point; anything else is appended. */
  apply(char: string): void {
    if (char === BACKSPACE) {
      if (this.text.length === 0) return;
      const chars = [...this.text];
      chars.pop();
      this.text = chars.join("");
      return;
    }
    this.text += char;
  }

  get isQuitCommand(): boolean {
    return this.text === QUIT_COMMAND;
  }
}

/** Entries whose text contains `filter`, in buffer order. Empty filter is the identity. */
export function filterEntries(entries: readonly LineEntry[], filter: string): readonly LineEntry[] {
  if (filter === "") return entries;
  return entries.filter((entry) => entry.text.includes(filter));
}
