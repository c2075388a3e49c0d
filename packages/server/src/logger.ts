/**
 * Minimal logging surface. The CLI passes `console`; tests pass a recorder.
 */
export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/** Drops everything. For embedding the server where output is unwanted. */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.stack ?? err.message;
  return String(err);
}
