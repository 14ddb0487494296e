import { PassThrough, Writable } from "node:stream";

/** Keyboard stand-in: a readable TTY that records raw mode switches */
export class FakeKeyboard extends PassThrough {
  readonly isTTY = true;
  isRaw = false;
  readonly rawModeCalls: boolean[] = [];

  setRawMode(mode: boolean): this {
    this.isRaw = mode;
    this.rawModeCalls.push(mode);
    return this;
  }
}

/** Screen stand-in: collects everything written and can fake a SIGWINCH */
export class FakeScreen extends Writable {
  readonly isTTY = true;
  private chunks: string[] = [];

  constructor(
    public rows = 24,
    public columns = 80,
  ) {
    super({ decodeStrings: false });
  }

  override _write(chunk: string | Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.chunks.push(chunk.toString());
    callback();
  }

  get text(): string {
    return this.chunks.join("");
  }

  /** Output since the last full-screen clear */
  get lastFrame(): string {
    const text = this.text;
    const start = text.lastIndexOf("\x1b[2J\x1b[H");
    return start === -1 ? "" : text.slice(start);
  }

  resize(rows: number, columns: number): void {
    this.rows = rows;
    this.columns = columns;
    this.emit("resize");
  }
}
