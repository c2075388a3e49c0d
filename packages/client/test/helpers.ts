/**
 * In-process modelhost server for client tests.
 */

import { defineModel, field, startModelServer, silentLogger, type RunningModelServer } from "@modelhost/server";

/** 16 bytes that start with the PNG signature */
export const PNG = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x00, 0x00, 0x0d, 0x49, 0x48, 0x44, 0x52]);

export interface Studio {
  greeting: string;
}

export const studioModel = defineModel<Studio>({
  setup: () => ({ greeting: "hello" }),
  commands(registry) {
    registry.register(
      "classify",
      { photo: field.image(), topK: field.integer({ default: 1 }) },
      { label: field.text(), bytes: field.integer() },
      (_model, { photo, topK }) => ({
        label: topK > 1 ? "tabby, tabby cat; tiger cat" : "tabby, tabby cat",
        bytes: photo.data.length,
      }),
      { description: "Label a photo" },
    );
    registry.register(
      "greet",
      { name: field.text(), shout: field.boolean({ default: false }), times: field.number({ default: 1 }) },
      { message: field.text() },
      (model, { name, shout, times }) => {
        const message = Array<string>(Math.max(1, Math.floor(times))).fill(`${model.greeting} ${name}`).join(" ");
        return { message: shout ? message.toUpperCase() : message };
      },
    );
    registry.register("slow", { ms: field.integer() }, { done: field.boolean() }, async (_model, { ms }) => {
      await new Promise((resolve) => setTimeout(resolve, ms));
      return { done: true };
    });
  },
});

export function startStudio(): Promise<RunningModelServer<Studio>> {
  return startModelServer(studioModel, { host: "127.0.0.1", port: 0, logger: silentLogger, serverId: "studio" });
}

export function wsUrl(running: RunningModelServer<Studio>): string {
  return `ws://127.0.0.1:${running.server.address().port}/ws`;
}
