/**
 * Schema builders and validation.
 */

import type { TypeTag } from "@modelhost/protocol";
import { decode, encode, isRecord, isTypeTag } from "./coercion.js";
import { InvalidSchemaError, ModelhostError } from "./errors.js";
import type { DomainTypes, FieldSpec, Schema } from "./types.js";

type FieldOptions<T extends TypeTag> = Omit<FieldSpec<T>, "type">;

/**
 * Field spec builders, so schemas read as `{ photo: field.image() }`.
 */
export const field = {
  image: (options: FieldOptions<"image"> = {}): FieldSpec<"image"> => ({ type: "image", ...options }),
  text: (options: FieldOptions<"text"> = {}): FieldSpec<"text"> => ({ type: "text", ...options }),
  number: (options: FieldOptions<"number"> = {}): FieldSpec<"number"> => ({ type: "number", ...options }),
  integer: (options: FieldOptions<"integer"> = {}): FieldSpec<"integer"> => ({ type: "integer", ...options }),
  boolean: (options: FieldOptions<"boolean"> = {}): FieldSpec<"boolean"> => ({ type: "boolean", ...options }),
} satisfies { [T in TypeTag]: (options?: FieldOptions<T>) => FieldSpec<T> };

/** Command names become path segments, so keep them URL-safe */
const COMMAND_NAME = /^[A-Za-z0-9_.-]+$/;

/** Paths the server answers itself */
export const RESERVED_COMMAND_NAMES: readonly string[] = ["health-check"];

export function validateCommandName(name: string): void {
  if (!COMMAND_NAME.test(name) || name === "." || name === "..") {
    throw new InvalidSchemaError(`Invalid command name "${name}": use letters, digits, "_", "-" or "."`);
  }
  if (RESERVED_COMMAND_NAMES.includes(name)) {
    throw new InvalidSchemaError(`Command name "${name}" is reserved by the server`);
  }
}

/**
 * Check a schema at registration time. Callers outside TypeScript can pass
 * anything, so every field is checked against the closed type set, and
 * defaults must round-trip through their own type.
 */
export function validateSchema(schema: unknown, where: string): Schema {
  if (!isRecord(schema)) {
    throw new InvalidSchemaError(`${where} schema must be an object`);
  }
  const checked: Schema = {};
  for (const [key, spec] of Object.entries(schema)) {
    if (!isRecord(spec)) {
      throw new InvalidSchemaError(`${where} field "${key}" must be a field spec`);
    }
    const { type, description, default: fallback } = spec;
    if (!isTypeTag(type)) {
      throw new InvalidSchemaError(`${where} field "${key}" has unknown type "${String(type)}"`);
    }
    const checkedSpec: FieldSpec = { type };
    if (typeof description === "string") checkedSpec.description = description;
    if (fallback !== undefined) checkedSpec.default = checkDefault(type, fallback, `${where} field "${key}"`);
    checked[key] = checkedSpec;
  }
  return checked;
}

function checkDefault(type: TypeTag, value: unknown, where: string): DomainTypes[TypeTag] {
  try {
    return decode(type, encode(type, value));
  } catch (err) {
    const reason = err instanceof ModelhostError ? err.message : String(err);
    throw new InvalidSchemaError(`${where} default is not a valid ${type}: ${reason}`);
  }
}
