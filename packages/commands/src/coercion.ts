/**
 * Type Coercion Layer
 *
 * Converts between wire values (JSON) and domain values for each declared
 * type. The set of types is closed: every switch below is exhaustive over
 * TypeTag, so adding a tag fails to compile until it has both directions.
 *
 * All functions here are pure. Decoding failures throw InvalidInputError,
 * encoding failures throw SerializationError.
 */

import type { TypeTag, WireObject, WireValue } from "@modelhost/protocol";
import { InvalidInputError, SerializationError } from "./errors.js";
import type { DomainValue, ImageMimeType, ImageValue, Schema, UnknownInputPolicy, Values } from "./types.js";

export const TYPE_TAGS: readonly TypeTag[] = ["image", "text", "number", "integer", "boolean"];

export function isTypeTag(value: unknown): value is TypeTag {
  return typeof value === "string" && (TYPE_TAGS as readonly string[]).includes(value);
}

// =============================================================================
// Single values
// =============================================================================

/**
 * Decode one wire value as `type`.
 *
 * @param field - Field name, carried on the error for the client
 */
export function decode(type: TypeTag, wire: unknown, field?: string): DomainValue {
  if (wire === undefined || wire === null) {
    throw new InvalidInputError(`${label(field)} is required`, field);
  }
  switch (type) {
    case "image":
      return decodeImage(wire, field);
    case "text":
      if (typeof wire !== "string") throw mismatch(type, wire, field);
      return wire;
    case "number":
      if (typeof wire !== "number" || !Number.isFinite(wire)) throw mismatch(type, wire, field);
      return wire;
    case "integer":
      if (typeof wire !== "number" || !Number.isSafeInteger(wire)) throw mismatch(type, wire, field);
      return wire;
    case "boolean":
      if (typeof wire !== "boolean") throw mismatch(type, wire, field);
      return wire;
    default:
      return unreachable(type);
  }
}

/**
 * Encode one domain value as `type`.
 */
export function encode(type: TypeTag, value: unknown, field?: string): WireValue {
  switch (type) {
    case "image":
      return encodeImage(value, field);
    case "text":
      if (typeof value !== "string") throw unrepresentable(type, value, field);
      return value;
    case "number":
      if (typeof value !== "number" || !Number.isFinite(value)) throw unrepresentable(type, value, field);
      return value;
    case "integer":
      if (typeof value !== "number" || !Number.isSafeInteger(value)) throw unrepresentable(type, value, field);
      return value;
    case "boolean":
      if (typeof value !== "boolean") throw unrepresentable(type, value, field);
      return value;
    default:
      return unreachable(type);
  }
}

// =============================================================================
// Whole schemas
// =============================================================================

/**
 * Decode a request body against an input schema.
 * Absent (or null) keys take the field's default; without one they are an error.
 */
export function decodeInputs(
  schema: Schema,
  body: WireObject,
  options: { unknownInputs?: UnknownInputPolicy } = {},
): Values<Schema> {
  if ((options.unknownInputs ?? "reject") === "reject") {
    for (const key of Object.keys(body)) {
      if (!Object.hasOwn(schema, key)) {
        throw new InvalidInputError(`Unknown input: ${key}`, key);
      }
    }
  }

  const values: Values<Schema> = {};
  for (const [key, spec] of Object.entries(schema)) {
    const wire = Object.hasOwn(body, key) ? body[key] : undefined;
    if ((wire === undefined || wire === null) && spec.default !== undefined) {
      values[key] = freshDefault(spec.default);
      continue;
    }
    values[key] = decode(spec.type, wire, key);
  }
  return values;
}

/**
 * Encode handler output against an output schema.
 * Only declared keys are written; a declared key the handler left out is an error.
 */
export function encodeOutputs(schema: Schema, output: unknown): WireObject {
  if (!isRecord(output)) {
    throw new SerializationError(`Handler must return an object, got ${describe(output)}`);
  }
  const wire: WireObject = {};
  for (const [key, spec] of Object.entries(schema)) {
    if (!Object.hasOwn(output, key) || output[key] === undefined) {
      throw new SerializationError(`Handler output is missing ${key}`, key);
    }
    wire[key] = encode(spec.type, output[key], key);
  }
  return wire;
}

/** Each request gets its own copy of an image default's bytes */
function freshDefault(value: DomainValue): DomainValue {
  if (typeof value === "object") return { data: Buffer.from(value.data), mimeType: value.mimeType };
  return value;
}

// =============================================================================
// Images
// =============================================================================

const STRICT_BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;
const DATA_URI = /^data:([^;,]*)((?:;[^;,]*)*),(.*)$/s;

function decodeImage(wire: unknown, field?: string): ImageValue {
  if (typeof wire !== "string") throw mismatch("image", wire, field);

  let payload = wire;
  const uri = DATA_URI.exec(wire);
  if (uri) {
    const [, mime = "", params = "", rest = ""] = uri;
    if (!mime.toLowerCase().startsWith("image/")) {
      throw new InvalidInputError(`${label(field)} data URI must carry an image/* type, got "${mime}"`, field);
    }
    if (!params.split(";").includes("base64")) {
      throw new InvalidInputError(`${label(field)} data URI must be base64-encoded`, field);
    }
    payload = rest;
  }

  if (!STRICT_BASE64.test(payload)) {
    throw new InvalidInputError(`${label(field)} is not valid base64`, field);
  }
  const data = Buffer.from(payload, "base64");
  if (data.length === 0) {
    throw new InvalidInputError(`${label(field)} is an empty image`, field);
  }
  const mimeType = sniffImageType(data);
  if (!mimeType) {
    throw new InvalidInputError(`${label(field)} is not a recognised image (png, jpeg, gif, webp, bmp)`, field);
  }
  return { data, mimeType };
}

function encodeImage(value: unknown, field?: string): string {
  if (!isRecord(value)) throw unrepresentable("image", value, field);
  const { data, mimeType } = value;
  if (!Buffer.isBuffer(data) || typeof mimeType !== "string") {
    throw unrepresentable("image", value, field);
  }
  const sniffed = sniffImageType(data);
  if (!sniffed) {
    throw new SerializationError(`${label(field)} bytes are not a recognised image`, field);
  }
  if (sniffed !== mimeType) {
    throw new SerializationError(`${label(field)} is labelled ${mimeType} but contains ${sniffed}`, field);
  }
  return `data:${sniffed};base64,${data.toString("base64")}`;
}

/**
 * Identify an image by its signature bytes.
 */
export function sniffImageType(data: Buffer): ImageMimeType | undefined {
  if (startsWith(data, [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a])) return "image/png";
  if (startsWith(data, [0xff, 0xd8, 0xff])) return "image/jpeg";
  const head = data.subarray(0, 12).toString("latin1");
  if (head.startsWith("GIF87a") || head.startsWith("GIF89a")) return "image/gif";
  if (head.length === 12 && head.startsWith("RIFF") && head.endsWith("WEBP")) return "image/webp";
  if (head.startsWith("BM") && data.length >= 26) return "image/bmp";
  return undefined;
}

function startsWith(data: Buffer, signature: number[]): boolean {
  return data.length >= signature.length && signature.every((byte, i) => data[i] === byte);
}

// =============================================================================
// Helpers
// =============================================================================

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describe(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (Buffer.isBuffer(value)) return "buffer";
  return typeof value;
}

function label(field?: string): string {
  return field === undefined ? "Value" : `Field "${field}"`;
}

function mismatch(type: TypeTag, wire: unknown, field?: string): InvalidInputError {
  return new InvalidInputError(`${label(field)} must be ${article(type)}, got ${describe(wire)}`, field);
}

function unrepresentable(type: TypeTag, value: unknown, field?: string): SerializationError {
  return new SerializationError(`${label(field)} cannot be encoded as ${article(type)}, got ${describe(value)}`, field);
}

function article(type: TypeTag): string {
  return type === "image" || type === "integer" ? `an ${type}` : `a ${type}`;
}

function unreachable(type: never): never {
  throw new Error(`Unhandled declared type: ${String(type)}`);
}
