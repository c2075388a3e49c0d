/**
 * `modelhost-client` command line.
 */

import { InputSyntaxError } from "./errors.js";

export const DEFAULT_URL = "http://localhost:8000";

export type ClientCommand =
  | { action: "list"; url: string }
  | { action: "health"; url: string }
  | { action: "invoke"; url: string; command: string; pairs: string[] };

export function parseClientArgs(args: string[], env: NodeJS.ProcessEnv = process.env): ClientCommand {
  let url = env.MODELHOST_URL || DEFAULT_URL;
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;
    if (arg === "--url" || arg === "-u") {
      const value = args[++i];
      if (value === undefined) throw new InputSyntaxError(`${arg} needs a value`);
      url = value;
    } else if (arg.startsWith("-")) {
      throw new InputSyntaxError(`Unknown option: ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  const [action, command, ...pairs] = positional;
  switch (action) {
    case "list":
    case "health":
      if (command !== undefined) throw new InputSyntaxError(`Unexpected argument: ${command}`);
      return { action, url };
    case "invoke":
      if (command === undefined) throw new InputSyntaxError("Missing command: modelhost-client invoke <command> [name=value...]");
      return { action, url, command, pairs };
    case undefined:
      throw new InputSyntaxError("Missing action: list, health or invoke");
    default:
      throw new InputSyntaxError(`Unknown action: ${action}`);
  }
}
