#!/usr/bin/env node
import process from "node:process";

process.title = "collector-svc";

if (process.argv.includes("--no-color")) {
  process.env.NO_COLOR = "1";
  process.env.FORCE_COLOR = "0";
  process.argv = process.argv.filter((arg) => arg !== "--no-color");
}

import("./cli/run-main.js")
  .then(({ runCli }) => runCli(process.argv))
  .catch((error: unknown) => {
    console.error(
      "[collector-svc] Failed to start CLI:",
      error instanceof Error ? (error.stack ?? error.message) : error,
    );
    process.exitCode = 1;
  });
