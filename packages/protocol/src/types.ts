/**
 * modelhost Wire Protocol: Types
 *
 * Defines what travels between a modelhost server and its clients, over plain
 * HTTP (`POST /<command>`) and over the WebSocket channel at `/ws`.
 *
 * Command inputs and outputs are JSON objects whose keys follow the command's
 * declared schema. The protocol describes the framing around them (error
 * bodies, descriptors, WebSocket messages); the values themselves are coerced
 * by @modelhost/commands.
 *
 * Protocol version: see version.ts
 */

// =============================================================================
// Wire values
// =============================================================================

/** A JSON value as it appears in a request or response body */
export type WireValue =
  | string
  | number
  | boolean
  | null
  | WireValue[]
  | { [key: string]: WireValue };

/** A request or response envelope: field name → wire value */
export type WireObject = { [key: string]: WireValue };

/** Tags of the closed declared-type set */
export type TypeTag = "image" | "text" | "number" | "integer" | "boolean";

// =============================================================================
// Command discovery
// =============================================================================

export interface FieldDescriptor {
  type: TypeTag;
  description?: string;
  /** Wire-encoded default. Present means the field is optional. */
  default?: WireValue;
}

/** JSON description of a registered command, served at `GET /` and in the welcome */
export interface CommandDescriptor {
  name: string;
  description?: string;
  input: Record<string, FieldDescriptor>;
  output: Record<string, FieldDescriptor>;
}

// =============================================================================
// HTTP
// =============================================================================

/** Body of every non-2xx HTTP response */
export interface ErrorBody {
  /** Human-readable message */
  error: string;
  /** Machine-readable error code */
  code: ErrorCode;
  /** Input or output key the error is about, when there is one */
  field?: string;
}

export interface HealthBody {
  status: "READY";
  commands: number;
}

// =============================================================================
// WebSocket: Handshake
// =============================================================================

/**
 * Client → Server: First message after WebSocket connect.
 * Server validates protocolVersion and responds with WelcomeMessage or ServerError.
 */
export interface HelloMessage {
  type: "hello";
  /** Must match server's PROTOCOL_VERSION */
  protocolVersion: number;
  /** Client identifier, echoed in server logs */
  clientId: string;
}

/**
 * Server → Client: Response to a valid HelloMessage.
 */
export interface WelcomeMessage {
  type: "welcome";
  protocolVersion: number;
  /** Identifier of this server process */
  serverId: string;
  /** Every command the server will accept */
  commands: CommandDescriptor[];
}

// =============================================================================
// WebSocket: Client → Server
// =============================================================================

/** Client → Server: run a command. `id` is echoed in the result or error. */
export interface ClientInvokeMessage {
  type: "invoke";
  id: string;
  command: string;
  input: WireObject;
}

/** Client → Server: keepalive ping */
export interface ClientPing {
  type: "ping";
}

/** Union of all client → server messages (after hello) */
export type ClientMessage = ClientInvokeMessage | ClientPing;

// =============================================================================
// WebSocket: Server → Client
// =============================================================================

/** Server → Client: successful invocation */
export interface ServerResultMessage {
  type: "result";
  id: string;
  output: WireObject;
}

/** Server → Client: keepalive pong */
export interface ServerPong {
  type: "pong";
}

/**
 * Server → Client: Error. Carries `id` when it answers an invoke message.
 */
export interface ServerError {
  type: "error";
  code: ErrorCode;
  message: string;
  id?: string;
  field?: string;
  /** Server's protocol version (included in version mismatch errors) */
  serverVersion?: number;
}

/** Union of all server → client messages (after welcome) */
export type ServerMessage = ServerResultMessage | ServerPong | ServerError;

// =============================================================================
// Error Codes
// =============================================================================

export type ErrorCode =
  | "INVALID_INPUT"          // body or field failed to decode
  | "UNKNOWN_COMMAND"        // no command registered under that name
  | "SERIALIZATION_ERROR"    // handler output not representable by its declared type
  | "HANDLER_ERROR"          // handler threw
  | "METHOD_NOT_ALLOWED"     // command path hit with something other than POST
  | "PAYLOAD_TOO_LARGE"      // request body over the configured limit
  | "INCOMPATIBLE_PROTOCOL"  // protocolVersion mismatch
  | "INVALID_HELLO"          // malformed hello message
  | "INVALID_MESSAGE"        // malformed message after the handshake
  | "INTERNAL_ERROR";        // unexpected server error

/** HTTP status for each error code that can reach an HTTP response */
export const ERROR_STATUS: Readonly<Record<ErrorCode, number>> = {
  INVALID_INPUT: 400,
  UNKNOWN_COMMAND: 404,
  SERIALIZATION_ERROR: 500,
  HANDLER_ERROR: 500,
  METHOD_NOT_ALLOWED: 405,
  PAYLOAD_TOO_LARGE: 413,
  INCOMPATIBLE_PROTOCOL: 400,
  INVALID_HELLO: 400,
  INVALID_MESSAGE: 400,
  INTERNAL_ERROR: 500,
};

// =============================================================================
// Utility Types
// =============================================================================

/** Is this a plain JSON object (not an array, not null)? */
export function isWireObject(value: unknown): value is WireObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Type guard: is this a HelloMessage?
 */
export function isHelloMessage(msg: unknown): msg is HelloMessage {
  return (
    isWireObject(msg) &&
    msg.type === "hello" &&
    typeof msg.protocolVersion === "number" &&
    typeof msg.clientId === "string"
  );
}

/**
 * Type guard: is this a ClientMessage (post-handshake)?
 */
export function isClientMessage(msg: unknown): msg is ClientMessage {
  if (!isWireObject(msg)) return false;
  if (msg.type === "ping") return true;
  return (
    msg.type === "invoke" &&
    typeof msg.id === "string" &&
    typeof msg.command === "string" &&
    isWireObject(msg.input)
  );
}

/**
 * Type guard: is this a CommandDescriptor? Field types are checked against
 * the closed type set.
 */
export function isCommandDescriptor(value: unknown): value is CommandDescriptor {
  return (
    isWireObject(value) &&
    typeof value.name === "string" &&
    (value.description === undefined || typeof value.description === "string") &&
    isFieldMap(value.input) &&
    isFieldMap(value.output)
  );
}

function isFieldMap(value: unknown): boolean {
  return isWireObject(value) && Object.values(value).every((spec) => isWireObject(spec) && isTypeTagName(spec.type));
}

function isTypeTagName(value: unknown): value is TypeTag {
  return value === "image" || value === "text" || value === "number" || value === "integer" || value === "boolean";
}

/**
 * Type guard: is this a HealthBody?
 */
export function isHealthBody(body: unknown): body is HealthBody {
  return isWireObject(body) && body.status === "READY" && typeof body.commands === "number";
}

/**
 * Type guard: is this a WelcomeMessage?
 */
export function isWelcomeMessage(msg: unknown): msg is WelcomeMessage {
  return (
    isWireObject(msg) &&
    msg.type === "welcome" &&
    typeof msg.protocolVersion === "number" &&
    typeof msg.serverId === "string" &&
    Array.isArray(msg.commands) &&
    msg.commands.every(isCommandDescriptor)
  );
}

/**
 * Type guard: is this a ServerMessage (post-handshake)?
 */
export function isServerMessage(msg: unknown): msg is ServerMessage {
  if (!isWireObject(msg)) return false;
  switch (msg.type) {
    case "pong":
      return true;
    case "result":
      return typeof msg.id === "string" && isWireObject(msg.output);
    case "error":
      return typeof msg.code === "string" && typeof msg.message === "string";
    default:
      return false;
  }
}

/**
 * Type guard: is this an ErrorBody (HTTP error response)?
 */
export function isErrorBody(body: unknown): body is ErrorBody {
  return isWireObject(body) && typeof body.error === "string" && typeof body.code === "string";
}
