#!/usr/bin/env -S npx tsx
/**
 * Frameo CLI entry
 *
 * Usage: frameo [--host <host>] [--port <port>] <command>
 */

import { runCli } from "./run";

runCli(process.argv.slice(2), { color: process.stdout.isTTY })
  .then((code) => process.exit(code))
  .catch((err) => {
    console.error("CLI failed:", err);
    process.exit(1);
  });
