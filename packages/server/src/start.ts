/**
 * Startup ordering: register commands → seal → setup → bind.
 *
 * If registration or setup throws, nothing is bound and the error propagates
 * to the caller; the CLI reports it and exits.
 */

import { CommandRegistry } from "@modelhost/commands";
import { HttpServer, type HttpServerOptions } from "./http-server.js";
import { SetupLifecycle, type ModelDefinition, type SetupOptions } from "./setup.js";

export interface StartOptions extends Omit<HttpServerOptions<unknown>, "registry" | "model"> {
  /** Values for the model's declared setup options */
  options?: SetupOptions;
}

export interface RunningModelServer<H> {
  server: HttpServer<H>;
  /** The handle setup produced */
  model: H;
  stop(): Promise<void>;
}

export async function startModelServer<H>(
  definition: ModelDefinition<H>,
  options: StartOptions = {},
): Promise<RunningModelServer<H>> {
  const { options: setupOptions = {}, ...serverOptions } = options;

  const registry = new CommandRegistry<H>();
  definition.commands(registry);
  registry.seal();

  const model = await new SetupLifecycle(definition).run(setupOptions);

  const server = new HttpServer<H>({ ...serverOptions, registry, model });
  await server.start();

  return { server, model, stop: () => server.stop() };
}
