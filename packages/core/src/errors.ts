/** Invalid invocation, reported before any producer starts. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

/** The user (Ctrl+C) or the OS (SIGINT, SIGTERM) asked the pager to stop. */
export class InterruptError extends Error {
  constructor(public readonly source: string) {
    super(`Interrupted by ${source}`);
    this.name = "InterruptError";
  }
}

export class BusClosedError extends Error {
  constructor() {
    super("Event bus is closed");
    this.name = "BusClosedError";
  }
}

export class BufferSealedError extends Error {
  constructor() {
    super("Line buffer already holds the end-of-stream marker");
    this.name = "BufferSealedError";
  }
}
