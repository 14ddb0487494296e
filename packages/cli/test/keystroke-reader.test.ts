import { EventBus, Logger, type PagerEvent } from "@strainer/core";
import { describe, expect, test, vi } from "vitest";
import { Terminal } from "../src/tui/framework/terminal";
import { KeystrokeReader } from "../src/tui/producers/keystroke-reader";
import { FakeKeyboard, FakeScreen } from "./helpers/fake-tty";

function setup(withKeyboard = true) {
  const keyboard = new FakeKeyboard();
  const terminal = new Terminal({ input: withKeyboard ? keyboard : undefined, output: new FakeScreen() });
  const bus = new EventBus<PagerEvent>();
  const logger = new Logger(undefined);
  const onInterrupt = vi.fn();
  const reader = new KeystrokeReader({ terminal, bus, logger, onInterrupt });
  const controller = new AbortController();
  return { keyboard, terminal, bus, logger, onInterrupt, reader, controller };
}

async function keysOn(bus: EventBus<PagerEvent>): Promise<string[]> {
  const keys: string[] = [];
  while (bus.size > 0) {
    const event = await bus.consume();
    if (event.type === "key") keys.push(event.char);
  }
  return keys;
}

describe("KeystrokeReader", () => {
  test("publishes printable keys and backspace, drops escapes and control bytes", async () => {
    const { keyboard, bus, reader, controller } = setup();
    const running = reader.run(controller.signal);

    keyboard.write("fa\x1b[A\x01\x7fé\t");
    await vi.waitFor(() => expect(bus.size).toBe(4), { interval: 5, timeout: 1000 });

    controller.abort();
    await running;
    expect(await keysOn(bus)).toEqual(["f", "a", "\x7f", "é"]);
  });

  test("a character split across two reads arrives as one key", async () => {
    const { keyboard, bus, reader, controller } = setup();
    const running = reader.run(controller.signal);

    const bytes = Buffer.from("é", "utf8");
    keyboard.write(bytes.subarray(0, 1));
    await new Promise((r) => setTimeout(r, 10));
    keyboard.write(bytes.subarray(1));
    await vi.waitFor(() => expect(bus.size).toBe(1), { interval: 5, timeout: 1000 });

    controller.abort();
    await running;
    expect(await keysOn(bus)).toEqual(["é"]);
  });

  test("holds raw mode exactly while running", async () => {
    const { keyboard, terminal, reader, controller } = setup();
    const running = reader.run(controller.signal);
    expect(keyboard.isRaw).toBe(true);
    expect(terminal.isRawModeEnabled).toBe(true);

    controller.abort();
    await running;
    expect(keyboard.rawModeCalls).toEqual([true, false]);
    expect(terminal.isRawModeEnabled).toBe(false);
  });

  test("ctrl+c is reported as an interrupt, not a key", async () => {
    const { keyboard, bus, onInterrupt, reader, controller } = setup();
    const running = reader.run(controller.signal);

    keyboard.write("\x03");
    await vi.waitFor(() => expect(onInterrupt).toHaveBeenCalledWith("ctrl+c"), { interval: 5, timeout: 1000 });

    controller.abort();
    await running;
    expect(bus.size).toBe(0);
  });

  test("restores the mode when the keyboard fails", async () => {
    const { keyboard, reader, controller } = setup();
    const running = reader.run(controller.signal);

    keyboard.destroy(new Error("tty closed"));
    await expect(running).rejects.toThrow("tty closed");
    expect(keyboard.isRaw).toBe(false);
  });

  test("without a keyboard it waits for shutdown", async () => {
    const { logger, reader, controller } = setup(false);
    const warn = vi.spyOn(logger, "warn");
    const running = reader.run(controller.signal);

    controller.abort();
    await running;
    expect(warn).toHaveBeenCalledWith("no keyboard available, keystrokes disabled");
  });

  test("handleInput keeps surrogate pairs together", () => {
    const { bus, reader } = setup();
    reader.handleInput("😀x");
    expect(bus.size).toBe(2);
  });
});
