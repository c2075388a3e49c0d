// Types
export type {
  ImageMimeType,
  ImageValue,
  DomainTypes,
  DomainValue,
  FieldSpec,
  Schema,
  Values,
  CommandOptions,
  CommandDefinition,
  UnknownInputPolicy,
} from "./types.js";

// Coercion
export {
  TYPE_TAGS,
  isTypeTag,
  isRecord,
  decode,
  encode,
  decodeInputs,
  encodeOutputs,
  sniffImageType,
} from "./coercion.js";

// Schemas
export { field, validateSchema, validateCommandName, RESERVED_COMMAND_NAMES } from "./schema.js";

// Registry
export { CommandRegistry } from "./registry.js";

// Discovery
export { describeCommand, describeCommands } from "./discovery.js";

// Errors
export {
  ModelhostError,
  InvalidInputError,
  SerializationError,
  UnknownCommandError,
  DuplicateCommandError,
  InvalidSchemaError,
  RegistrySealedError,
} from "./errors.js";
export type { ModelhostErrorCode } from "./errors.js";
