#!/usr/bin/env node
import { handleInterrupt, processIo, runCli } from "./cli/run.js";

process.once("SIGINT", () => {
  handleInterrupt(processIo, (code) => process.exit(code));
});

process.exitCode = runCli(process.argv.slice(2));
