/**
 * Command-line inputs → request body.
 *
 * `key=value` pairs are typed by the command's descriptor:
 *
 *   image    value is a file path; the file is read and base64-encoded
 *   text     literal, or `@path` to read the text from a file
 *   number   decimal number
 *   integer  whole number
 *   boolean  true | false
 */

import type { CommandDescriptor, TypeTag, WireObject, WireValue } from "@modelhost/protocol";
import { InputSyntaxError } from "./errors.js";

export type ReadFile = (path: string) => Promise<Buffer>;

export async function buildInput(
  descriptor: CommandDescriptor,
  pairs: string[],
  readFile: ReadFile,
): Promise<WireObject> {
  const input: WireObject = {};

  for (const pair of pairs) {
    const eq = pair.indexOf("=");
    if (eq <= 0) {
      throw new InputSyntaxError(`Inputs look like name=value, got "${pair}"`);
    }
    const key = pair.slice(0, eq);
    const value = pair.slice(eq + 1);

    const spec = descriptor.input[key];
    if (!spec) {
      const known = Object.keys(descriptor.input);
      throw new InputSyntaxError(
        `Command "${descriptor.name}" has no input "${key}" (inputs: ${known.length > 0 ? known.join(", ") : "none"})`,
      );
    }
    input[key] = await parseValue(spec.type, key, value, readFile);
  }

  return input;
}

async function parseValue(type: TypeTag, key: string, value: string, readFile: ReadFile): Promise<WireValue> {
  switch (type) {
    case "image": {
      if (value.startsWith("data:")) return value;
      const data = await readFile(value);
      return data.toString("base64");
    }
    case "text":
      if (value.startsWith("@")) return (await readFile(value.slice(1))).toString("utf8");
      return value;
    case "number": {
      const n = Number(value);
      if (value.trim() === "" || !Number.isFinite(n)) {
        throw new InputSyntaxError(`Input "${key}" must be a number, got "${value}"`);
      }
      return n;
    }
    case "integer": {
      const n = Number(value);
      if (!/^-?\d+$/.test(value) || !Number.isSafeInteger(n)) {
        throw new InputSyntaxError(`Input "${key}" must be an integer, got "${value}"`);
      }
      return n;
    }
    case "boolean":
      if (value === "true") return true;
      if (value === "false") return false;
      throw new InputSyntaxError(`Input "${key}" must be true or false, got "${value}"`);
  }
}
