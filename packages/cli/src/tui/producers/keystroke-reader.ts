import type { EventBus, Logger, PagerEvent } from "@strainer/core";
import { keyEvent } from "@strainer/core";
import { isPrintableKey, StdinBuffer } from "../framework/stdin-buffer";
import type { Terminal } from "../framework/terminal";
import { type Producer, untilAborted } from "../lifecycle";

const CTRL_C = "\x03";

export interface KeystrokeReaderOptions {
  terminal: Terminal;
  bus: EventBus<PagerEvent>;
  logger: Logger;
  /** Ctrl+C; raw mode keeps the OS from turning it into SIGINT */
  onInterrupt: (source: string) => void;
}

/**
 * Reads the keyboard in raw mode and publishes printable keys.
 * Raw mode lasts exactly as long as `run`, however it ends.
 */
export class KeystrokeReader implements Producer {
  readonly name = "keystroke-reader";
  private readonly stdinBuffer = new StdinBuffer();

  constructor(private readonly options: KeystrokeReaderOptions) {}

  async run(signal: AbortSignal): Promise<void> {
    const { terminal, logger } = this.options;
    const input = terminal.input;
    if (!input) {
      logger.warn("no keyboard available, keystrokes disabled");
      await untilAborted(signal);
      return;
    }

    const onData = (data: string) => {
      this.handleInput(data);
    };

    terminal.enableRawMode();
    try {
      // The stream's decoder holds back a character split across reads
      input.setEncoding("utf8");
      input.on("data", onData);
      input.resume();
      await untilAborted(signal, input);
    } finally {
      input.removeListener("data", onData);
      input.pause();
      terminal.restoreMode();
    }
  }

  /** Split a raw chunk and publish its printable keys; everything else is dropped */
  handleInput(data: string): void {
    for (const seq of this.stdinBuffer.split(data)) {
      if (seq === CTRL_C) {
        this.options.onInterrupt("ctrl+c");
      } else if (isPrintableKey(seq)) {
        this.options.bus.publish(keyEvent(seq));
      }
    }
  }
}
