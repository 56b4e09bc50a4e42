#!/usr/bin/env node

/**
 * CLI entry point for crate-shelf
 *
 * Usage:
 *   crate-shelf                   # List ~/rust and pick a project
 *   crate-shelf --dir <path>      # Scan another directory
 *   crate-shelf --help            # Show help
 */

import { loadConfig } from "./config.js";
import { initLogger } from "./logging/logger.js";
import { runCli } from "./run.js";

const MINIMUM_NODE_VERSION = 20;

/**
 * Check if Node.js version meets minimum requirements.
 * Exits with error if version is too low.
 */
function checkNodeVersion(): void {
  const currentVersion = process.versions.node;
  const majorVersion = Number.parseInt(currentVersion.split(".")[0] ?? "0", 10);

  if (majorVersion < MINIMUM_NODE_VERSION) {
    console.error(`Error: Node.js ${MINIMUM_NODE_VERSION}+ is required.`);
    console.error(`Current version: ${currentVersion}`);
    process.exit(1);
  }
}

checkNodeVersion();

const config = loadConfig();
initLogger({ level: config.logLevel });

// The one interrupt flag for this run; the menu loop watches it
const interrupt = new AbortController();
process.on("SIGINT", () => interrupt.abort());
process.on("SIGTERM", () => interrupt.abort());

async function main() {
  try {
    const code = await runCli(process.argv.slice(2), {
      input: process.stdin,
      output: process.stdout,
      errorOutput: process.stderr,
      signal: interrupt.signal,
      config,
    });
    process.exit(code);
  } catch (error) {
    console.error("Unexpected error:", error);
    process.exit(1);
  }
}

void main();
