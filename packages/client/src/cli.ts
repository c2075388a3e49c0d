#!/usr/bin/env node
/**
 * modelhost-client CLI
 *
 * Usage:
 *   modelhost-client list [--url http://localhost:8000]
 *   modelhost-client invoke classify photo=./cat.png
 */

import { readFile } from "node:fs/promises";
import { parseClientArgs } from "./args.js";
import { CommandFailedError, InputSyntaxError } from "./errors.js";
import { runClient } from "./run.js";

function printHelp(): void {
  console.log(`modelhost-client: Call a modelhost server from the shell

Usage:
  modelhost-client list                          List commands and their fields
  modelhost-client health                        Show readiness
  modelhost-client invoke <command> [name=value...]

Options:
  --url, -u <url>    Server URL (default: http://localhost:8000, env MODELHOST_URL)
  --help, -h         Show this help

Inputs are typed by the command's declaration: image fields take a file path,
text fields take a literal or @path, numbers and booleans are parsed.

Examples:
  modelhost-client invoke classify photo=./cat.png
  modelhost-client invoke caption photo=./cat.png prompt=@prompt.txt --url http://gpu-box:8000
`);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    printHelp();
    process.exit(0);
  }

  try {
    const command = parseClientArgs(args);
    await runClient(command, { write: (text) => console.log(text), readFile: (path) => readFile(path) });
  } catch (err) {
    if (err instanceof CommandFailedError) {
      console.error(`${err.code} (${err.status}): ${err.message}`);
      process.exit(1);
    }
    if (err instanceof InputSyntaxError) {
      console.error(err.message);
      process.exit(1);
    }
    throw err;
  }
}

main().catch((err: unknown) => {
  console.error(`Fatal: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
