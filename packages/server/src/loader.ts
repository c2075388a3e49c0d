/**
 * Model module loading for the CLI entrypoint.
 */

import { resolve } from "node:path";
import { pathToFileURL } from "node:url";
import { isRecord } from "@modelhost/commands";
import { SetupError } from "./errors.js";
import { isModelDefinition, type ModelDefinition } from "./setup.js";

/**
 * Import a model module and return its definition: the default export, or
 * an export named `model`.
 */
export async function loadModel(modulePath: string, cwd: string = process.cwd()): Promise<ModelDefinition<unknown>> {
  const url = pathToFileURL(resolve(cwd, modulePath)).href;

  let mod: unknown;
  try {
    mod = await import(url);
  } catch (err) {
    throw new SetupError(
      `Cannot load model module ${modulePath}: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    );
  }

  const candidate = isRecord(mod) ? (mod.default ?? mod.model) : undefined;
  if (!isModelDefinition(candidate)) {
    throw new SetupError(`${modulePath} must export a defineModel(...) result as default or as "model"`);
  }
  return candidate;
}
