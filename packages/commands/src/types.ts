/**
 * Command and schema types: transport agnostic.
 *
 * A command is a named operation over the model handle with a declared input
 * schema and output schema. Schemas map field names to declared types drawn
 * from a closed set; the TypeScript types of handler inputs and outputs are
 * derived from the schema so handlers are checked against what they declare.
 */

import type { TypeTag } from "@modelhost/protocol";

// =============================================================================
// Domain values: what handlers see
// =============================================================================

/** Image MIME types the coercion layer recognises from signature bytes */
export type ImageMimeType = "image/png" | "image/jpeg" | "image/gif" | "image/webp" | "image/bmp";

export interface ImageValue {
  data: Buffer;
  mimeType: ImageMimeType;
}

/** Declared type tag → in-memory domain value */
export interface DomainTypes {
  image: ImageValue;
  text: string;
  number: number;
  integer: number;
  boolean: boolean;
}

export type DomainValue = DomainTypes[TypeTag];

// =============================================================================
// Schemas
// =============================================================================

export interface FieldSpec<T extends TypeTag = TypeTag> {
  type: T;
  description?: string;
  /** Value used when the key is absent. Present means the field is optional. */
  default?: DomainTypes[T];
}

export type Schema = Record<string, FieldSpec>;

/** Decoded values for a schema: field name → domain value of its declared type */
export type Values<S extends Schema> = {
  [K in keyof S]: DomainTypes[S[K]["type"]];
};

// =============================================================================
// Commands
// =============================================================================

export interface CommandOptions {
  description?: string;
}

export interface CommandDefinition<H, I extends Schema = Schema, O extends Schema = Schema> {
  name: string;
  description?: string;
  input: I;
  output: O;
  /** Runs once per request with the shared model handle and decoded inputs */
  handler(model: H, inputs: Values<I>): Values<O> | Promise<Values<O>>;
}

/** How to treat request keys the input schema does not declare */
export type UnknownInputPolicy = "reject" | "ignore";
