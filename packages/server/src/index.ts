/**
 * @modelhost/server: Serve a model's commands over HTTP and WebSocket
 */

export {
  defineModel,
  isModelDefinition,
  resolveSetupOptions,
  SetupLifecycle,
  type ModelDefinition,
  type SetupOptionSpec,
  type SetupOptions,
} from "./setup.js";
export { startModelServer, type StartOptions, type RunningModelServer } from "./start.js";
export {
  HttpServer,
  DEFAULT_HOST,
  DEFAULT_PORT,
  DEFAULT_MAX_BODY_BYTES,
  type HttpServerOptions,
} from "./http-server.js";
export { WsServer, type WsServerOptions } from "./ws-server.js";
export { Dispatcher, type DispatcherOptions, type InvocationResult, type InvocationFailure } from "./dispatcher.js";
export { InvocationGate } from "./gate.js";
export { loadModel } from "./loader.js";
export { parseServeArgs, UsageError, type ServeConfig } from "./config.js";
export { SetupError, HandlerRuntimeError } from "./errors.js";
export { silentLogger, type Logger } from "./logger.js";

// Model modules only need this package to declare commands
export { CommandRegistry, field } from "@modelhost/commands";
export type { ImageValue, Schema, Values } from "@modelhost/commands";
