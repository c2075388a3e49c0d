/**
 * `modelhost serve` configuration
 *
 * Flags win over environment variables, which win over defaults.
 */

import type { UnknownInputPolicy } from "@modelhost/commands";
import { DEFAULT_HOST, DEFAULT_MAX_BODY_BYTES, DEFAULT_PORT } from "./http-server.js";
import type { SetupOptions } from "./setup.js";

export interface ServeConfig {
  /** Path to the model module (default export from defineModel) */
  modulePath: string;
  host: string;
  port: number;
  /** Values for the model's declared setup options */
  options: SetupOptions;
  concurrency: number;
  unknownInputs: UnknownInputPolicy;
  maxBodyBytes: number;
}

/** Bad command line; the message is shown to the user as-is */
export class UsageError extends Error {}

export function parseServeArgs(args: string[], env: NodeJS.ProcessEnv = process.env): ServeConfig {
  let modulePath: string | undefined;
  const config: Omit<ServeConfig, "modulePath"> = {
    host: env.MODELHOST_HOST || DEFAULT_HOST,
    port: env.MODELHOST_PORT ? parsePort(env.MODELHOST_PORT, "MODELHOST_PORT") : DEFAULT_PORT,
    options: {},
    concurrency: 1,
    unknownInputs: "reject",
    maxBodyBytes: DEFAULT_MAX_BODY_BYTES,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case "serve":
        break;
      case "--host":
        config.host = valueOf(args, ++i, arg);
        break;
      case "--port":
      case "-p":
        config.port = parsePort(valueOf(args, ++i, arg), arg);
        break;
      case "--option":
      case "-o": {
        const [name, value] = parseOption(valueOf(args, ++i, arg));
        config.options[name] = value;
        break;
      }
      case "--concurrency":
        config.concurrency = parsePositiveInt(valueOf(args, ++i, arg), arg);
        break;
      case "--unknown-inputs": {
        const policy = valueOf(args, ++i, arg);
        if (policy !== "reject" && policy !== "ignore") {
          throw new UsageError(`${arg} must be "reject" or "ignore", got "${policy}"`);
        }
        config.unknownInputs = policy;
        break;
      }
      case "--max-body-bytes":
        config.maxBodyBytes = parsePositiveInt(valueOf(args, ++i, arg), arg);
        break;
      default:
        if (arg === undefined || arg.startsWith("-")) {
          throw new UsageError(`Unknown option: ${arg}`);
        }
        if (modulePath !== undefined) {
          throw new UsageError(`Unexpected argument: ${arg} (model module already given: ${modulePath})`);
        }
        modulePath = arg;
    }
  }

  if (modulePath === undefined) {
    throw new UsageError("Missing model module: modelhost serve <model-module>");
  }
  return { modulePath, ...config };
}

function valueOf(args: string[], index: number, flag: string): string {
  const value = args[index];
  if (value === undefined) throw new UsageError(`${flag} needs a value`);
  return value;
}

function parsePort(value: string, source: string): number {
  const port = Number(value);
  if (!/^\d+$/.test(value) || port > 65535) {
    throw new UsageError(`Invalid port number from ${source}: ${value}`);
  }
  return port;
}

function parsePositiveInt(value: string, flag: string): number {
  const n = Number(value);
  if (!/^\d+$/.test(value) || n < 1) {
    throw new UsageError(`${flag} must be a positive integer, got ${value}`);
  }
  return n;
}

/** `checkpoint=weights/squeezenet.onnx` → ["checkpoint", "weights/squeezenet.onnx"] */
function parseOption(pair: string): [string, string] {
  const eq = pair.indexOf("=");
  if (eq <= 0) {
    throw new UsageError(`Setup options look like name=value, got "${pair}"`);
  }
  return [pair.slice(0, eq), pair.slice(eq + 1)];
}
