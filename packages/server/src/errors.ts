/**
 * Server-side error classes. Coercion and registry errors live in
 * @modelhost/commands; these cover the lifecycle and handler invocation.
 */

import { ModelhostError } from "@modelhost/commands";

/** Setup failed. Fatal: the server never binds. */
export class SetupError extends ModelhostError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("SETUP_ERROR", message, options);
  }
}

/** A handler threw something that is not already a coercion error */
export class HandlerRuntimeError extends ModelhostError {
  readonly command: string;

  constructor(command: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("HANDLER_ERROR", `Command "${command}" failed: ${reason}`, { cause });
    this.command = command;
  }
}
