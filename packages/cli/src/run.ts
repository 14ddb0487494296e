import type { ReadStream } from "node:tty";
import { parseArgs } from "node:util";
import { UsageError } from "@strainer/core";
import { version } from "../package.json";
import { loadConfig } from "./config";
import { App } from "./tui/app";
import type { TerminalOutput } from "./tui/framework/terminal";
import { openControllingTerminal } from "./tui/framework/terminal";
import { t } from "./tui/theme";

export const USAGE = `Usage: <command> | strainer [options]

Live-filtering pager for piped input. Type to filter, backspace to edit,
"jj" to quit.

Options:
  -l, --log      Write diagnostics to a new file in the temp directory
  -v, --version  Print the version
  -h, --help     Show this help`;

export interface RunIO {
  argv: string[];
  cwd: string;
  stdin: NodeJS.ReadableStream & { isTTY?: boolean };
  stdout: TerminalOutput;
  stderr: NodeJS.WritableStream;
  /** Signal handlers belong to the real process only */
  handleSignals?: boolean;
}

/**
 * Everything the `strainer` command does, as a function of its streams.
 * Resolves with the process exit code and never rejects: a usage error or a
 * startup fault is printed to stderr and maps to 1.
 */
export async function run(io: RunIO): Promise<number> {
  try {
    return await start(io);
  } catch (err) {
    io.stderr.write(`${t.error}Error:${t.reset} ${err instanceof Error ? err.message : String(err)}\n`);
    return 1;
  }
}

async function start(io: RunIO): Promise<number> {
  let values: { log?: boolean; version?: boolean; help?: boolean };
  try {
    ({ values } = parseArgs({
      args: io.argv,
      options: {
        log: { type: "boolean", short: "l" },
        version: { type: "boolean", short: "v" },
        help: { type: "boolean", short: "h" },
      },
    }));
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }

  if (values.version) {
    io.stdout.write(`strainer ${version}\n`);
    return 0;
  }
  if (values.help) {
    io.stdout.write(`${USAGE}\n`);
    return 0;
  }

  // Keys come from the terminal, so the data has to come from somewhere else
  if (io.stdin.isTTY) {
    throw new UsageError('strainer reads from a pipe or redirect, e.g. "tail -f app.log | strainer"');
  }

  const config = await loadConfig(io.cwd, { log: values.log });
  if (config.logger.file) {
    io.stderr.write(`Logging to ${config.logger.file}\n`);
  }

  let keyboard: ReadStream | undefined;
  try {
    keyboard = openControllingTerminal();
  } catch (err) {
    config.logger.warn("controlling terminal unavailable", { error: err });
  }

  try {
    const app = new App(
      config,
      { source: io.stdin, keyboard, output: io.stdout },
      { handleSignals: io.handleSignals },
    );
    return await app.start();
  } finally {
    keyboard?.destroy();
  }
}
