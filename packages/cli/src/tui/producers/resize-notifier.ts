import type { EventBus, PagerEvent } from "@strainer/core";
import { resizeEvent } from "@strainer/core";
import type { Terminal } from "../framework/terminal";
import { type Producer, untilAborted } from "../lifecycle";

/** Publishes a resize event for every SIGWINCH the output stream reports. */
export class ResizeNotifier implements Producer {
  readonly name = "resize-notifier";

  constructor(
    private readonly terminal: Terminal,
    private readonly bus: EventBus<PagerEvent>,
  ) {}

  async run(signal: AbortSignal): Promise<void> {
    const unsubscribe = this.terminal.onResize(() => this.bus.publish(resizeEvent()));
    try {
      await untilAborted(signal);
    } finally {
      unsubscribe();
    }
  }
}
