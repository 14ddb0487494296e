import type { EventBus, LineEntry, Logger, PagerEvent } from "@strainer/core";
import { FilterState, filterEntries, InterruptError, LineBuffer } from "@strainer/core";
import type { Terminal, TerminalSize } from "./framework/terminal";
import { type Producer, ProducerGroup, watchSignals } from "./lifecycle";
import { paintFrame, renderFrame } from "./viewport";

export type PagerState = "running" | "terminating";

export interface PagerOptions {
  terminal: Terminal;
  bus: EventBus<PagerEvent>;
  producers: readonly Producer[];
  logger: Logger;
  prompt: string;
  /** Route SIGINT/SIGTERM into an orderly shutdown (off in tests) */
  handleSignals?: boolean;
}

/**
 * The single consumer. Owns the line buffer, the filter and the viewport
 * size; producers only ever reach it through the bus. Every consumed event
 * changes one of those, then the whole screen is redrawn.
 */
export class Pager {
  private readonly buffer = new LineBuffer();
  private readonly filter = new FilterState();
  private readonly group: ProducerGroup;
  private size: TerminalSize;
  private current: PagerState = "running";

  constructor(private readonly options: PagerOptions) {
    this.size = options.terminal.size();
    this.group = new ProducerGroup(options.producers, options.logger, (_name, error) => options.bus.fail(error));
  }

  get state(): PagerState {
    return this.current;
  }

  get filterText(): string {
    return this.filter.text;
  }

  get lines(): readonly LineEntry[] {
    return this.buffer.entries;
  }

  /** Entries matching the current filter */
  get view(): readonly LineEntry[] {
    return filterEntries(this.buffer.entries, this.filter.text);
  }

  /** Producers still running; empty once `run` has returned */
  get runningProducers(): string[] {
    return this.group.running;
  }

  /** Run until quit, interrupt or fault. Resolves with the process exit code. */
  async run(): Promise<number> {
    const { bus, logger } = this.options;
    const detachSignals = this.options.handleSignals
      ? watchSignals((sig) => bus.fail(new InterruptError(sig)))
      : () => {};
    let exitCode = 0;

    try {
      this.enterScreen();
      this.group.start();
      this.render();

      while (this.current === "running") {
        const event = await bus.consume();
        this.apply(event);
        if (this.current === "running") this.render();
      }
      logger.info("quit command", { lines: this.buffer.length });
    } catch (err) {
      if (err instanceof InterruptError) {
        logger.info("interrupted", { source: err.source });
      } else {
        logger.error("render loop failed", { error: err });
        exitCode = 1;
      }
    } finally {
      this.current = "terminating";
      detachSignals();
      this.restoreScreen();
      await this.group.shutdown();
      this.restoreMode();
      bus.close();
    }

    return exitCode;
  }

  private apply(event: PagerEvent): void {
    switch (event.type) {
      case "line":
        if (event.isTerminal) {
          this.buffer.markEnd();
        } else {
          this.buffer.append(event.text);
        }
        break;
      case "key":
        this.filter.apply(event.char);
        if (this.filter.isQuitCommand) this.current = "terminating";
        break;
      case "resize":
        this.size = this.options.terminal.size();
        this.options.logger.debug("resize", { ...this.size });
        break;
      default: {
        const unreachable: never = event;
        throw new Error(`Unknown event: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  private render(): void {
    const lines = renderFrame({
      entries: this.view,
      labelWidth: this.buffer.labelWidth,
      filter: this.filter.text,
      prompt: this.options.prompt,
      rows: this.size.rows,
      columns: this.size.columns,
    });
    this.options.terminal.writeSynchronized(paintFrame(lines));
  }

  private enterScreen(): void {
    const { terminal } = this.options;
    terminal.saveCursor();
    terminal.enterAltScreen();
    terminal.hideCursor();
  }

  /** Every step is attempted even when an earlier one throws */
  private restoreScreen(): void {
    const { terminal } = this.options;
    this.attempt("show cursor", () => terminal.showCursor());
    this.attempt("leave alternate screen", () => terminal.leaveAltScreen());
    this.attempt("restore cursor", () => terminal.restoreCursor());
  }

  /** The keystroke reader restores raw mode itself; this covers a reader that never ran */
  private restoreMode(): void {
    this.attempt("restore terminal mode", () => this.options.terminal.restoreMode());
  }

  private attempt(step: string, fn: () => void): void {
    try {
      fn();
    } catch (err) {
      this.options.logger.error("terminal restore step failed", { step, error: err });
    }
  }
}
