/**
 * @modelhost/protocol: Wire protocol for modelhost
 *
 * Defines the bodies and messages exchanged between a modelhost server and its
 * clients over HTTP and WebSocket. Every package in the repo imports wire
 * types from here.
 */

export { PROTOCOL_VERSION } from "./version.js";

export type {
  // Values
  WireValue,
  WireObject,
  TypeTag,

  // Discovery
  FieldDescriptor,
  CommandDescriptor,

  // HTTP
  ErrorBody,
  HealthBody,

  // Handshake
  HelloMessage,
  WelcomeMessage,

  // Client → Server
  ClientMessage,
  ClientInvokeMessage,
  ClientPing,

  // Server → Client
  ServerMessage,
  ServerResultMessage,
  ServerPong,
  ServerError,

  // Misc
  ErrorCode,
} from "./types.js";

export {
  ERROR_STATUS,
  isWireObject,
  isHelloMessage,
  isClientMessage,
  isWelcomeMessage,
  isCommandDescriptor,
  isHealthBody,
  isServerMessage,
  isErrorBody,
} from "./types.js";

export {
  createError,
  createErrorBody,
  createIncompatibleProtocolError,
} from "./errors.js";
