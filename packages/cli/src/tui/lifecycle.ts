import { setTimeout as sleep } from "node:timers/promises";
import type { Logger } from "@strainer/core";

/** One independent event source, run until its signal aborts (or its input ends). */
export interface Producer {
  readonly name: string;
  run(signal: AbortSignal): Promise<void>;
}

export type ProducerFailureHandler = (name: string, error: Error) => void;

/**
 * Starts every producer with one shared cancellation signal and joins them
 * on shutdown. A producer that throws is logged and reported through
 * `onFailure`; it never takes the others down.
 */
export class ProducerGroup {
  private readonly controller = new AbortController();
  private readonly tasks: Array<Promise<void>> = [];
  private readonly active = new Set<string>();
  private stopping: Promise<void> | null = null;

  constructor(
    private readonly producers: readonly Producer[],
    private readonly logger: Logger,
    private readonly onFailure?: ProducerFailureHandler,
  ) {}

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /** Names of producers that have not returned yet */
  get running(): string[] {
    return [...this.active];
  }

  start(): void {
    if (this.tasks.length > 0 || this.stopping) return;
    for (const producer of this.producers) {
      this.active.add(producer.name);
      this.tasks.push(this.launch(producer));
    }
  }

  /** Abort the shared signal and wait for every producer to return. Idempotent. */
  shutdown(): Promise<void> {
    if (!this.stopping) {
      this.controller.abort();
      this.stopping = Promise.all(this.tasks).then(() => {
        this.logger.debug("producers joined", { count: this.tasks.length });
      });
    }
    return this.stopping;
  }

  private async launch(producer: Producer): Promise<void> {
    this.logger.debug("producer started", { producer: producer.name });
    try {
      await producer.run(this.controller.signal);
      this.logger.debug("producer returned", { producer: producer.name });
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.logger.error("producer failed", { producer: producer.name, error });
      this.onFailure?.(producer.name, error);
    } finally {
      this.active.delete(producer.name);
    }
  }
}

/**
 * Sleep for `ms`, waking early when `signal` aborts.
 * Resolves in both cases; only unrelated timer errors reject.
 */
export async function idle(ms: number, signal: AbortSignal): Promise<void> {
  try {
    await sleep(ms, undefined, { signal });
  } catch (err) {
    if (!signal.aborted) throw err;
  }
}

/** Resolves once `signal` aborts; rejects if `source` emits "error" first. */
export function untilAborted(signal: AbortSignal, source?: NodeJS.EventEmitter): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const cleanup = () => {
      signal.removeEventListener("abort", onAbort);
      source?.removeListener("error", onError);
    };
    const onAbort = () => {
      cleanup();
      resolve();
    };
    const onError = (err: Error) => {
      cleanup();
      reject(err);
    };
    if (signal.aborted) {
      resolve();
      return;
    }
    signal.addEventListener("abort", onAbort, { once: true });
    source?.once("error", onError);
  });
}

const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

/** Route SIGINT/SIGTERM to `onSignal`; returns the detach function */
export function watchSignals(onSignal: (signal: NodeJS.Signals) => void): () => void {
  for (const sig of SHUTDOWN_SIGNALS) process.on(sig, onSignal);
  return () => {
    for (const sig of SHUTDOWN_SIGNALS) process.removeListener(sig, onSignal);
  };
}
