#!/usr/bin/env node
import { runCli } from "./src/cli.js";
import { terminateActiveCommands } from "./src/exec.js";

const SIGNAL_EXIT_CODES = { SIGINT: 130, SIGTERM: 143 } as const;

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    terminateActiveCommands(signal);
    process.exit(SIGNAL_EXIT_CODES[signal]);
  });
}

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error("iris-singularity-tools crashed:", error);
    process.exitCode = 1;
  });
