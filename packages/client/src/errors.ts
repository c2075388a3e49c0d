/**
 * Client-side errors.
 */

/** The server answered a command with an error body or message */
export class CommandFailedError extends Error {
  readonly status: number;
  readonly code: string;
  readonly field?: string;

  constructor(message: string, status: number, code: string, field?: string) {
    super(message);
    this.name = "CommandFailedError";
    this.status = status;
    this.code = code;
    if (field !== undefined) this.field = field;
  }
}

/** The WebSocket closed (or never opened) while a call was pending */
export class ConnectionClosedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConnectionClosedError";
  }
}

/** A `name=value` argument could not be turned into a request input */
export class InputSyntaxError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InputSyntaxError";
  }
}
