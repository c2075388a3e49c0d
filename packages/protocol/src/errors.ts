/**
 * modelhost Wire Protocol: Error utilities
 */

import type { ErrorBody, ErrorCode, ServerError } from "./types.js";

/**
 * Create a WebSocket error message.
 */
export function createError(
  code: ErrorCode,
  message: string,
  extra: { id?: string; field?: string; serverVersion?: number } = {},
): ServerError {
  const error: ServerError = { type: "error", code, message };
  if (extra.id !== undefined) error.id = extra.id;
  if (extra.field !== undefined) error.field = extra.field;
  if (extra.serverVersion !== undefined) error.serverVersion = extra.serverVersion;
  return error;
}

/**
 * Create an incompatible protocol error.
 */
export function createIncompatibleProtocolError(
  clientVersion: number,
  serverVersion: number
): ServerError {
  return createError(
    "INCOMPATIBLE_PROTOCOL",
    `Server requires protocol v${serverVersion}, client sent v${clientVersion}`,
    { serverVersion },
  );
}

/**
 * Create an HTTP error body.
 */
export function createErrorBody(code: ErrorCode, message: string, field?: string): ErrorBody {
  const body: ErrorBody = { error: message, code };
  if (field !== undefined) body.field = field;
  return body;
}
