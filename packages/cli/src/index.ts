#!/usr/bin/env tsx
import { run } from "./run";

run({
  argv: process.argv.slice(2),
  cwd: process.cwd(),
  stdin: process.stdin,
  stdout: process.stdout,
  stderr: process.stderr,
  handleSignals: true,
})
  .then((exitCode) => process.exit(exitCode))
  .catch((err) => {
    console.error(err);
    process.exit(1);
  });
