/**
 * Command Registry
 *
 * Maps command names to their schemas and handlers. Populated during startup,
 * then sealed; after sealing it is read-only for the life of the process.
 */

import { DuplicateCommandError, RegistrySealedError, UnknownCommandError } from "./errors.js";
import { validateCommandName, validateSchema } from "./schema.js";
import type { CommandDefinition, CommandOptions, Schema, Values } from "./types.js";

export class CommandRegistry<H> {
  private commands = new Map<string, CommandDefinition<H>>();
  private isSealed = false;

  /**
   * Register a command.
   *
   * Throws DuplicateCommandError if `name` is taken, InvalidSchemaError for a
   * bad name or schema, RegistrySealedError once the server has started. A
   * failed registration leaves the registry unchanged.
   */
  register<I extends Schema, O extends Schema>(
    name: string,
    input: I,
    output: O,
    handler: (model: H, inputs: Values<I>) => Values<O> | Promise<Values<O>>,
    options: CommandOptions = {},
  ): void {
    if (this.isSealed) throw new RegistrySealedError(name);
    validateCommandName(name);
    if (this.commands.has(name)) throw new DuplicateCommandError(name);

    const definition: CommandDefinition<H> = {
      name,
      input: validateSchema(input, `${name} input`),
      output: validateSchema(output, `${name} output`),
      handler,
    };
    if (options.description !== undefined) definition.description = options.description;
    this.commands.set(name, definition);
  }

  /** Look up a command; throws UnknownCommandError if there is none */
  resolve(name: string): CommandDefinition<H> {
    const command = this.commands.get(name);
    if (!command) throw new UnknownCommandError(name);
    return command;
  }

  has(name: string): boolean {
    return this.commands.has(name);
  }

  /** Commands in registration order */
  list(): CommandDefinition<H>[] {
    return [...this.commands.values()];
  }

  get size(): number {
    return this.commands.size;
  }

  /** Refuse further registrations */
  seal(): void {
    this.isSealed = true;
  }

  get sealed(): boolean {
    return this.isSealed;
  }
}
