/**
 * Command Discovery
 *
 * Turns registered commands into JSON descriptors so clients can learn the
 * command list and each field's declared type without out-of-band docs.
 */

import type { CommandDescriptor, FieldDescriptor } from "@modelhost/protocol";
import { encode } from "./coercion.js";
import type { CommandRegistry } from "./registry.js";
import type { CommandDefinition, Schema } from "./types.js";

/**
 * Describe one command. Defaults are encoded to their wire form.
 */
export function describeCommand<H>(command: CommandDefinition<H>): CommandDescriptor {
  const descriptor: CommandDescriptor = {
    name: command.name,
    input: describeSchema(command.input),
    output: describeSchema(command.output),
  };
  if (command.description !== undefined) descriptor.description = command.description;
  return descriptor;
}

/**
 * Describe every registered command, in registration order.
 */
export function describeCommands<H>(registry: CommandRegistry<H>): CommandDescriptor[] {
  return registry.list().map((command) => describeCommand(command));
}

function describeSchema(schema: Schema): Record<string, FieldDescriptor> {
  const fields: Record<string, FieldDescriptor> = {};
  for (const [key, spec] of Object.entries(schema)) {
    const descriptor: FieldDescriptor = { type: spec.type };
    if (spec.description !== undefined) descriptor.description = spec.description;
    if (spec.default !== undefined) descriptor.default = encode(spec.type, spec.default, key);
    fields[key] = descriptor;
  }
  return fields;
}
