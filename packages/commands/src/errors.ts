/**
 * Error classes for coercion and registration.
 *
 * Every error carries a stable `code`. Request-time errors use a wire
 * ErrorCode so transports can forward them as-is; registration errors only
 * happen at startup and never reach a client.
 */

import type { ErrorCode } from "@modelhost/protocol";

export type ModelhostErrorCode = ErrorCode | "SETUP_ERROR" | "REGISTRY_ERROR";

export class ModelhostError extends Error {
  readonly code: ModelhostErrorCode;

  constructor(code: ModelhostErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A wire value failed to decode against its declared type */
export class InvalidInputError extends ModelhostError {
  readonly field?: string;

  constructor(message: string, field?: string) {
    super("INVALID_INPUT", message);
    this.field = field;
  }
}

/** A handler produced a value its declared output type cannot represent */
export class SerializationError extends ModelhostError {
  readonly field?: string;

  constructor(message: string, field?: string) {
    super("SERIALIZATION_ERROR", message);
    this.field = field;
  }
}

export class UnknownCommandError extends ModelhostError {
  readonly command: string;

  constructor(command: string) {
    super("UNKNOWN_COMMAND", `Unknown command: ${command}`);
    this.command = command;
  }
}

export class DuplicateCommandError extends ModelhostError {
  readonly command: string;

  constructor(command: string) {
    super("REGISTRY_ERROR", `Command already registered: ${command}`);
    this.command = command;
  }
}

/** Bad command name, unknown type tag, or a default that is not a value of its type */
export class InvalidSchemaError extends ModelhostError {
  constructor(message: string) {
    super("REGISTRY_ERROR", message);
  }
}

export class RegistrySealedError extends ModelhostError {
  constructor(command: string) {
    super("REGISTRY_ERROR", `Registry is sealed, cannot register ${command}`);
  }
}
