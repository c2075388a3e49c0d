/**
 * Dispatcher
 *
 * Transport-independent request pipeline shared by the HTTP server and the
 * WebSocket channel:
 *
 *   Received → Decoding → Invoking → Encoding → Responded
 *
 * Any stage can go straight to Responded with an error. Every per-request
 * failure is turned into an InvocationFailure here; nothing thrown by a
 * handler escapes `invoke`.
 */

import {
  ERROR_STATUS,
  isWireObject,
  type ErrorCode,
  type WireObject,
} from "@modelhost/protocol";
import {
  decodeInputs,
  encodeOutputs,
  InvalidInputError,
  ModelhostError,
  SerializationError,
  type CommandDefinition,
  type CommandRegistry,
  type UnknownInputPolicy,
  type Values,
  type Schema,
} from "@modelhost/commands";
import { HandlerRuntimeError } from "./errors.js";
import { InvocationGate } from "./gate.js";
import { describeError, type Logger } from "./logger.js";

export interface InvocationFailure {
  code: ErrorCode;
  status: number;
  message: string;
  field?: string;
}

export type InvocationResult =
  | { ok: true; output: WireObject }
  | { ok: false; error: InvocationFailure };

export interface DispatcherOptions<H> {
  registry: CommandRegistry<H>;
  /** Handle returned by setup; passed to every handler */
  model: H;
  /** Defaults to a single-slot gate (serialised invocations) */
  gate?: InvocationGate;
  /** What to do with request keys the input schema does not declare (default: reject) */
  unknownInputs?: UnknownInputPolicy;
  logger: Logger;
}

export class Dispatcher<H> {
  private registry: CommandRegistry<H>;
  private model: H;
  private gate: InvocationGate;
  private unknownInputs: UnknownInputPolicy;
  private logger: Logger;

  constructor(options: DispatcherOptions<H>) {
    this.registry = options.registry;
    this.model = options.model;
    this.gate = options.gate ?? new InvocationGate(1);
    this.unknownInputs = options.unknownInputs ?? "reject";
    this.logger = options.logger;
  }

  /**
   * Run one command invocation end to end.
   *
   * @param body - Parsed request body; anything but a JSON object is rejected
   */
  async invoke(commandName: string, body: unknown): Promise<InvocationResult> {
    let command: CommandDefinition<H>;
    let inputs: Values<Schema>;

    // Received → Decoding
    try {
      command = this.registry.resolve(commandName);
      if (!isWireObject(body)) {
        throw new InvalidInputError("Request body must be a JSON object");
      }
      inputs = decodeInputs(command.input, body, { unknownInputs: this.unknownInputs });
    } catch (err) {
      return this.fail(err);
    }

    // Invoking
    let output: unknown;
    try {
      output = await this.gate.run(() => command.handler(this.model, inputs));
    } catch (err) {
      // Handlers may reject their input themselves (e.g. wrong image size)
      if (err instanceof InvalidInputError || err instanceof SerializationError) {
        return this.fail(err, command.name);
      }
      return this.fail(new HandlerRuntimeError(command.name, err), command.name);
    }

    // Encoding
    try {
      return { ok: true, output: encodeOutputs(command.output, output) };
    } catch (err) {
      return this.fail(err, command.name);
    }
  }

  /** The gate handler calls run through */
  get invocationGate(): InvocationGate {
    return this.gate;
  }

  private fail(err: unknown, commandName?: string): InvocationResult {
    const code = err instanceof ModelhostError ? err.code : undefined;
    if (!(err instanceof ModelhostError) || code === undefined || !isRequestCode(code)) {
      this.logger.error(`Unexpected error${commandName ? ` in ${commandName}` : ""}: ${describeError(err)}`);
      return { ok: false, error: { code: "INTERNAL_ERROR", status: 500, message: "Internal server error" } };
    }

    if (err instanceof SerializationError) {
      this.logger.error(`Command "${commandName}" returned output that does not match its schema (model bug): ${err.message}`);
    } else if (err instanceof HandlerRuntimeError) {
      this.logger.error(`${err.message}\n${describeError(err.cause)}`);
    }

    const failure: InvocationFailure = { code, status: ERROR_STATUS[code], message: err.message };
    if ((err instanceof InvalidInputError || err instanceof SerializationError) && err.field !== undefined) {
      failure.field = err.field;
    }
    return { ok: false, error: failure };
  }
}

function isRequestCode(code: string): code is ErrorCode {
  return Object.hasOwn(ERROR_STATUS, code);
}
