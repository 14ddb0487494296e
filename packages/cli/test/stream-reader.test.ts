import { PassThrough } from "node:stream";
import { EventBus, Logger, type PagerEvent } from "@strainer/core";
import { describe, expect, test, vi } from "vitest";
import { StreamReader } from "../src/tui/producers/stream-reader";

function setup(options: { pollIntervalMs?: number; batchSize?: number } = {}) {
  const input = new PassThrough();
  const bus = new EventBus<PagerEvent>();
  const logger = new Logger(undefined);
  const reader = new StreamReader({
    input,
    bus,
    logger,
    pollIntervalMs: options.pollIntervalMs ?? 1,
    batchSize: options.batchSize ?? 10,
  });
  const controller = new AbortController();
  return { input, bus, logger, reader, controller };
}

async function drain(bus: EventBus<PagerEvent>): Promise<PagerEvent[]> {
  const events: PagerEvent[] = [];
  while (bus.size > 0) events.push(await bus.consume());
  return events;
}

describe("StreamReader", () => {
  test("publishes each line in order, then one end-of-input event", async () => {
    const { input, bus, reader, controller } = setup();
    const running = reader.run(controller.signal);
    input.end("alpha\nbeta\r\ngamma");

    await running;
    expect(await drain(bus)).toEqual([
      { type: "line", text: "alpha", isTerminal: false },
      { type: "line", text: "beta", isTerminal: false },
      { type: "line", text: "gamma", isTerminal: false },
      { type: "line", text: "", isTerminal: true },
    ]);
    expect(reader.linesPublished).toBe(3);
  });

  test("a lone carriage return stays inside its record", async () => {
    const { input, bus, reader, controller } = setup();
    const running = reader.run(controller.signal);
    input.end("progress 10%\rprogress 20%\nnext\n");

    await running;
    const texts = (await drain(bus)).map((e) => (e.type === "line" ? e.text : e.type));
    expect(texts).toEqual(["progress 10%\rprogress 20%", "next", ""]);
  });

  test("joins a record split across chunks, including a multi-byte character", async () => {
    const { input, bus, reader, controller } = setup();
    const running = reader.run(controller.signal);
    const bytes = Buffer.from("héllo\nwor", "utf8");
    input.write(bytes.subarray(0, 2));
    input.write(bytes.subarray(2));
    input.end("ld\r\n");

    await running;
    const texts = (await drain(bus)).map((e) => (e.type === "line" ? e.text : e.type));
    expect(texts).toEqual(["héllo", "world", ""]);
  });

  test("empty input publishes only the end-of-input event", async () => {
    const { input, bus, reader, controller } = setup();
    const running = reader.run(controller.signal);
    input.end();

    await running;
    expect(await drain(bus)).toEqual([{ type: "line", text: "", isTerminal: true }]);
  });

  test("keeps blank lines", async () => {
    const { input, bus, reader, controller } = setup();
    const running = reader.run(controller.signal);
    input.end("a\n\nb\n");

    await running;
    const texts = (await drain(bus)).map((e) => (e.type === "line" ? e.text : e.type));
    expect(texts).toEqual(["a", "", "b", ""]);
  });

  test("publishes at most batchSize lines per poll cycle", async () => {
    const { input, bus, reader, controller } = setup({ pollIntervalMs: 100, batchSize: 2 });
    const running = reader.run(controller.signal);
    input.end("1\n2\n3\n4\n5\n");

    await vi.waitFor(() => expect(bus.size).toBeGreaterThan(0), { interval: 5, timeout: 1000 });
    expect(bus.size).toBe(2);

    await running;
    const lines = (await drain(bus)).filter((e) => e.type === "line" && !e.isTerminal);
    expect(lines).toHaveLength(5);
  });

  test("stops on abort without publishing end of input", async () => {
    const { input, bus, reader, controller } = setup({ pollIntervalMs: 10_000 });
    const running = reader.run(controller.signal);
    input.write("partial\n");
    await new Promise((r) => setTimeout(r, 20));

    controller.abort();
    await running;
    expect(await drain(bus)).toEqual([]);
  });

  test("a read error is logged and ends the input", async () => {
    const { input, bus, logger, reader, controller } = setup();
    const error = vi.spyOn(logger, "error");
    const running = reader.run(controller.signal);
    input.write("before\n");
    await new Promise((r) => setTimeout(r, 10));
    input.destroy(new Error("disk gone"));

    await running;
    expect(error).toHaveBeenCalledWith("input read failed", expect.objectContaining({ error: expect.any(Error) }));
    expect(await drain(bus)).toEqual([
      { type: "line", text: "before", isTerminal: false },
      { type: "line", text: "", isTerminal: true },
    ]);
  });
});
