import type { EventBus, Logger, PagerEvent } from "@strainer/core";
import { endOfInput, lineEvent } from "@strainer/core";
import { idle, type Producer } from "../lifecycle";

export interface StreamReaderOptions {
  input: NodeJS.ReadableStream;
  bus: EventBus<PagerEvent>;
  logger: Logger;
  /** Sleep between drain cycles */
  pollIntervalMs: number;
  /** Most lines published per cycle */
  batchSize: number;
}

/** Pending lines beyond `batchSize * BACKPRESSURE_FACTOR` pause the input */
const BACKPRESSURE_FACTOR = 100;

/**
 * Turns the piped input into line events.
 *
 * Records end at "\n" only; a lone "\r" is part of the text (progress
 * output rewrites a line that way). The poll loop publishes at most
 * `batchSize` records per cycle. End of input (or a read error) publishes one
 * terminal event and returns.
 */
export class StreamReader implements Producer {
  readonly name = "stream-reader";
  private published = 0;

  constructor(private readonly options: StreamReaderOptions) {}

  get linesPublished(): number {
    return this.published;
  }

  async run(signal: AbortSignal): Promise<void> {
    const { input, bus, logger, pollIntervalMs, batchSize } = this.options;
    const highWater = batchSize * BACKPRESSURE_FACTOR;
    const pending: string[] = [];
    let closed = false;
    let failed = false;
    let paused = false;

    let tail = "";
    const push = (record: string) => {
      pending.push(record.endsWith("\r") ? record.slice(0, -1) : record);
    };
    const onData = (chunk: string | Buffer) => {
      const records = (tail + chunk.toString()).split("\n");
      tail = records.pop() ?? "";
      for (const record of records) push(record);
      if (!paused && pending.length > highWater) {
        paused = true;
        input.pause();
      }
    };
    const flushTail = () => {
      if (tail !== "") push(tail);
      tail = "";
    };
    const onEnd = () => {
      flushTail();
      closed = true;
    };
    const onError = (err: Error) => {
      logger.error("input read failed", { error: err });
      flushTail();
      failed = true;
    };

    input.setEncoding("utf8");
    input.on("data", onData);
    input.on("end", onEnd);
    // destroy() without an error closes without "end"
    input.on("close", onEnd);
    input.on("error", onError);

    try {
      while (!signal.aborted) {
        for (const text of pending.splice(0, batchSize)) {
          bus.publish(lineEvent(text));
          this.published++;
        }

        const exhausted = closed || failed;
        if (exhausted && pending.length === 0) {
          bus.publish(endOfInput());
          logger.info("end of input", { lines: this.published, failed });
          return;
        }

        if (paused && !exhausted && pending.length <= highWater) {
          paused = false;
          input.resume();
        }

        await idle(pollIntervalMs, signal);
      }
    } finally {
      input.removeListener("data", onData);
      input.removeListener("end", onEnd);
      input.removeListener("close", onEnd);
      input.removeListener("error", onError);
      if (!closed) input.pause();
    }
  }
}
