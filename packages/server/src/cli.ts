#!/usr/bin/env node
/**
 * modelhost CLI
 *
 * Usage:
 *   modelhost serve <model-module> [options]
 *
 * Examples:
 *   modelhost serve ./dist/squeezenet.js --option checkpoint=weights/squeezenet.onnx
 *   modelhost serve ./dist/squeezenet.js --port 9000 --concurrency 2
 */

import { parseServeArgs, UsageError } from "./config.js";
import { SetupError } from "./errors.js";
import { loadModel } from "./loader.js";
import { describeError } from "./logger.js";
import { startModelServer } from "./start.js";

function printHelp(): void {
  console.log(`modelhost: Serve a model's commands over HTTP

Usage:
  modelhost serve <model-module> [options]

Options:
  --host <address>             Interface to bind (default: 0.0.0.0, env MODELHOST_HOST)
  --port, -p <number>          Port to bind (default: 8000, env MODELHOST_PORT)
  --option, -o <name=value>    Setup option for the model, repeatable
  --concurrency <n>            Handler invocations allowed at once (default: 1)
  --unknown-inputs <policy>    reject | ignore request keys a command does not declare (default: reject)
  --max-body-bytes <n>         Largest accepted request body (default: 10485760)
  --help, -h                   Show this help

The model module's default export (or its "model" export) must be the
result of defineModel() from @modelhost/server.

Examples:
  modelhost serve ./dist/squeezenet.js --option checkpoint=weights/squeezenet.onnx
  modelhost serve ./dist/squeezenet.js --port 9000 --concurrency 2
`);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    printHelp();
    process.exit(0);
  }

  if (args[0] !== "serve") {
    console.error(`Unknown command: ${args[0]}. Use "modelhost serve <model-module>".`);
    process.exit(1);
  }

  let config;
  try {
    config = parseServeArgs(args.slice(1));
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(err.message);
      process.exit(1);
    }
    throw err;
  }

  console.log(`Starting modelhost...`);
  console.log(`  Model:       ${config.modulePath}`);
  console.log(`  Concurrency: ${config.concurrency}`);
  const optionNames = Object.keys(config.options);
  if (optionNames.length > 0) console.log(`  Options:     ${optionNames.join(", ")}`);

  let running;
  try {
    const model = await loadModel(config.modulePath);
    running = await startModelServer(model, {
      host: config.host,
      port: config.port,
      options: config.options,
      concurrency: config.concurrency,
      unknownInputs: config.unknownInputs,
      maxBodyBytes: config.maxBodyBytes,
      logger: console,
    });
  } catch (err) {
    if (err instanceof SetupError) {
      console.error(err.message);
      if (err.cause !== undefined) console.error(describeError(err.cause));
    } else {
      console.error(`Failed to start: ${describeError(err)}`);
    }
    process.exit(1);
  }

  const commands = running.server.commands.map((c) => c.name);
  console.log(`  Commands:    ${commands.length > 0 ? commands.join(", ") : "(none)"}`);

  // Graceful shutdown
  const server = running;
  const shutdown = () => {
    console.log("\nShutting down...");
    server.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error(`Shutdown failed: ${describeError(err)}`);
        process.exit(1);
      },
    );
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err: unknown) => {
  console.error(`Fatal: ${describeError(err)}`);
  process.exit(1);
});
