import { describe, it, expect } from "vitest";
import {
  defineModel,
  isModelDefinition,
  resolveSetupOptions,
  SetupError,
  SetupLifecycle,
} from "../src/index.js";
import { tabbyModel } from "./helpers.js";

describe("resolveSetupOptions", () => {
  const declared = {
    checkpoint: { description: "Path to weights", required: true },
    device: { default: "cpu" },
    labels: {},
  };

  it("fills defaults and keeps given values", () => {
    expect(resolveSetupOptions(declared, { checkpoint: "squeezenet.onnx" })).toEqual({
      checkpoint: "squeezenet.onnx",
      device: "cpu",
    });
    expect(resolveSetupOptions(declared, { checkpoint: "a", device: "gpu", labels: "imagenet.txt" })).toEqual({
      checkpoint: "a",
      device: "gpu",
      labels: "imagenet.txt",
    });
  });

  it("rejects options the model does not declare", () => {
    expect(() => resolveSetupOptions(declared, { checkpoint: "a", weights: "b" })).toThrow(
      'Unknown setup option "weights" (declared: checkpoint, device, labels)',
    );
    expect(() => resolveSetupOptions(undefined, { weights: "b" })).toThrow(
      'Unknown setup option "weights" (this model declares none)',
    );
  });

  it("rejects a missing required option", () => {
    expect(() => resolveSetupOptions(declared, {})).toThrow(SetupError);
    expect(() => resolveSetupOptions(declared, {})).toThrow('Missing required setup option "checkpoint"');
  });
});

describe("SetupLifecycle", () => {
  it("runs setup once and exposes the handle", async () => {
    const lifecycle = new SetupLifecycle(tabbyModel);
    expect(lifecycle.phase).toBe("idle");

    const handle = await lifecycle.run({ checkpoint: "weights/squeezenet.onnx" });

    expect(handle).toEqual({ checkpoint: "weights/squeezenet.onnx", calls: 0 });
    expect(lifecycle.phase).toBe("ready");
    expect(lifecycle.handle).toBe(handle);
  });

  it("refuses to run a second time", async () => {
    const lifecycle = new SetupLifecycle(tabbyModel);
    await lifecycle.run();
    await expect(lifecycle.run()).rejects.toThrow("Setup has already run (ready)");
  });

  it("wraps setup failures in SetupError and keeps the cause", async () => {
    const cause = new Error("checkpoint not found");
    const model = defineModel({
      setup: (): never => {
        throw cause;
      },
      commands: () => {},
    });
    const lifecycle = new SetupLifecycle(model);

    const err = await lifecycle.run().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(SetupError);
    expect(err).toMatchObject({ message: "Setup failed: checkpoint not found", code: "SETUP_ERROR", cause });
    expect(lifecycle.phase).toBe("failed");
    expect(() => lifecycle.handle).toThrow("Model is not ready (failed)");
  });

  it("wraps rejected async setup too", async () => {
    const model = defineModel({
      setup: async () => Promise.reject(new Error("out of memory")),
      commands: () => {},
    });
    await expect(new SetupLifecycle(model).run()).rejects.toThrow("Setup failed: out of memory");
  });

  it("reports option errors as SetupError without calling setup", async () => {
    let called = false;
    const model = defineModel({
      setup: () => {
        called = true;
        return {};
      },
      commands: () => {},
    });
    await expect(new SetupLifecycle(model).run({ checkpoint: "x" })).rejects.toThrow(SetupError);
    expect(called).toBe(false);
  });
});

describe("isModelDefinition", () => {
  it("accepts defineModel results", () => {
    expect(isModelDefinition(tabbyModel)).toBe(true);
  });

  it("rejects anything without setup and commands functions", () => {
    expect(isModelDefinition({ setup: () => ({}) })).toBe(false);
    expect(isModelDefinition({ setup: "x", commands: () => {} })).toBe(false);
    expect(isModelDefinition({ setup: () => ({}), commands: () => {}, options: "checkpoint" })).toBe(false);
    expect(isModelDefinition(null)).toBe(false);
  });
});
