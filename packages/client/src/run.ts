/**
 * Runs one parsed `modelhost-client` command against a server.
 */

import { buildInput, type ReadFile } from "./input.js";
import { CommandClient } from "./http-client.js";
import { InputSyntaxError } from "./errors.js";
import type { ClientCommand } from "./args.js";

export interface ClientIO {
  /** Receives the JSON to print */
  write(text: string): void;
  readFile: ReadFile;
}

export async function runClient(command: ClientCommand, io: ClientIO): Promise<void> {
  const client = new CommandClient(command.url);

  switch (command.action) {
    case "list":
      io.write(JSON.stringify(await client.listCommands(), null, 2));
      break;

    case "health":
      io.write(JSON.stringify(await client.health(), null, 2));
      break;

    case "invoke": {
      const commands = await client.listCommands();
      const descriptor = commands.find((c) => c.name === command.command);
      if (!descriptor) {
        const names = commands.map((c) => c.name).join(", ");
        throw new InputSyntaxError(`Unknown command: ${command.command} (available: ${names || "none"})`);
      }
      const input = await buildInput(descriptor, command.pairs, io.readFile);
      io.write(JSON.stringify(await client.invoke(command.command, input), null, 2));
      break;
    }
  }
}
