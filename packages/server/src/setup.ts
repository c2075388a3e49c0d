/**
 * Setup Lifecycle
 *
 * A model module declares its setup options, a setup function that loads the
 * model once, and the commands it exposes. Setup runs exactly once, after
 * every command is registered and before the server binds; the handle it
 * returns is passed to every handler for the life of the process.
 */

import { isRecord, type CommandRegistry } from "@modelhost/commands";
import { SetupError } from "./errors.js";

export interface SetupOptionSpec {
  description?: string;
  default?: string;
  required?: boolean;
}

/** Option name → value, e.g. `{ checkpoint: "weights/squeezenet.onnx" }` */
export type SetupOptions = Record<string, string>;

export interface ModelDefinition<H> {
  /** Options `setup` accepts. Anything else passed at startup is rejected. */
  options?: Record<string, SetupOptionSpec>;
  /** Load the model. Runs once; the result is shared by every invocation. */
  setup(options: SetupOptions): H | Promise<H>;
  /** Register commands. Runs before setup. */
  commands(registry: CommandRegistry<H>): void;
}

/**
 * Identity helper that gives model modules type inference for `H`.
 */
export function defineModel<H>(definition: ModelDefinition<H>): ModelDefinition<H> {
  return definition;
}

/**
 * Type guard for model modules loaded at runtime.
 */
export function isModelDefinition(value: unknown): value is ModelDefinition<unknown> {
  return (
    isRecord(value) &&
    typeof value.setup === "function" &&
    typeof value.commands === "function" &&
    (value.options === undefined || isRecord(value.options))
  );
}

/**
 * Check given options against the declared ones and fill defaults.
 */
export function resolveSetupOptions(
  declared: Record<string, SetupOptionSpec> = {},
  given: SetupOptions = {},
): SetupOptions {
  for (const name of Object.keys(given)) {
    if (!Object.hasOwn(declared, name)) {
      const known = Object.keys(declared);
      const hint = known.length > 0 ? ` (declared: ${known.join(", ")})` : " (this model declares none)";
      throw new SetupError(`Unknown setup option "${name}"${hint}`);
    }
  }

  const resolved: SetupOptions = {};
  for (const [name, spec] of Object.entries(declared)) {
    const value = Object.hasOwn(given, name) ? given[name] : spec.default;
    if (value === undefined) {
      if (spec.required) throw new SetupError(`Missing required setup option "${name}"`);
      continue;
    }
    resolved[name] = value;
  }
  return resolved;
}

type SetupState<H> =
  | { phase: "idle" }
  | { phase: "running" }
  | { phase: "ready"; handle: H }
  | { phase: "failed"; error: SetupError };

export class SetupLifecycle<H> {
  private state: SetupState<H> = { phase: "idle" };
  private definition: ModelDefinition<H>;

  constructor(definition: ModelDefinition<H>) {
    this.definition = definition;
  }

  /**
   * Resolve options and run setup. Any failure becomes a SetupError; it is
   * not retried, and a second call is refused.
   */
  async run(given: SetupOptions = {}): Promise<H> {
    if (this.state.phase !== "idle") {
      throw new SetupError(`Setup has already run (${this.state.phase})`);
    }
    this.state = { phase: "running" };

    try {
      const options = resolveSetupOptions(this.definition.options, given);
      const handle = await this.definition.setup(options);
      this.state = { phase: "ready", handle };
      return handle;
    } catch (err) {
      const error = err instanceof SetupError
        ? err
        : new SetupError(`Setup failed: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
      this.state = { phase: "failed", error };
      throw error;
    }
  }

  get phase(): SetupState<H>["phase"] {
    return this.state.phase;
  }

  /** The model handle. Throws unless setup completed. */
  get handle(): H {
    if (this.state.phase !== "ready") {
      throw new SetupError(`Model is not ready (${this.state.phase})`);
    }
    return this.state.handle;
  }
}
