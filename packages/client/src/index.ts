/**
 * @modelhost/client: Call a modelhost server over HTTP or WebSocket
 */

export { CommandClient, type CommandClientOptions } from "./http-client.js";
export { Connection, type ConnectionState, type ConnectionOptions } from "./connection.js";
export { buildInput, type ReadFile } from "./input.js";
export { parseClientArgs, DEFAULT_URL, type ClientCommand } from "./args.js";
export { runClient, type ClientIO } from "./run.js";
export { CommandFailedError, ConnectionClosedError, InputSyntaxError } from "./errors.js";
