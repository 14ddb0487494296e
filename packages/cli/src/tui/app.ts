import type { PagerEvent } from "@strainer/core";
import { EventBus, InterruptError } from "@strainer/core";
import type { AppConfig } from "../config";
import { Terminal, type TerminalInput, type TerminalOutput } from "./framework/terminal";
import { Pager } from "./pager";
import { KeystrokeReader, ResizeNotifier, StreamReader } from "./producers/index";

export interface AppIO {
  /** The piped data */
  source: NodeJS.ReadableStream;
  /** The keyboard; absent means keystrokes are disabled */
  keyboard?: TerminalInput;
  output: TerminalOutput;
}

/** Wires the three producers and the pager around one event bus. */
export class App {
  readonly bus = new EventBus<PagerEvent>();
  readonly terminal: Terminal;
  readonly pager: Pager;

  constructor(
    private config: AppConfig,
    io: AppIO,
    options: { handleSignals?: boolean } = {},
  ) {
    const { settings, logger } = config;
    this.terminal = new Terminal({ input: io.keyboard, output: io.output });

    const producers = [
      new StreamReader({
        input: io.source,
        bus: this.bus,
        logger,
        pollIntervalMs: settings.pollIntervalMs,
        batchSize: settings.batchSize,
      }),
      new KeystrokeReader({
        terminal: this.terminal,
        bus: this.bus,
        logger,
        onInterrupt: (source) => this.bus.fail(new InterruptError(source)),
      }),
      new ResizeNotifier(this.terminal, this.bus),
    ];

    this.pager = new Pager({
      terminal: this.terminal,
      bus: this.bus,
      producers,
      logger,
      prompt: settings.prompt,
      handleSignals: options.handleSignals,
    });
  }

  /** Resolves with the exit code once every producer has stopped */
  async start(): Promise<number> {
    const exitCode = await this.pager.run();
    this.config.logger.info("exit", { exitCode, lines: this.pager.lines.length });
    return exitCode;
  }
}
