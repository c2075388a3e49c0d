import { describe, it, expect } from "vitest";
import {
  CommandRegistry,
  DuplicateCommandError,
  InvalidSchemaError,
  RegistrySealedError,
  UnknownCommandError,
  field,
  validateSchema,
} from "../src/index.js";

interface StubModel {
  labels: string[];
}

function classifyRegistry(): CommandRegistry<StubModel> {
  const registry = new CommandRegistry<StubModel>();
  registry.register(
    "classify",
    { photo: field.image() },
    { label: field.text() },
    (model) => ({ label: model.labels[0] ?? "unknown" }),
    { description: "Top ImageNet label" },
  );
  return registry;
}

describe("CommandRegistry", () => {
  it("resolves a registered command", () => {
    const registry = classifyRegistry();
    const command = registry.resolve("classify");

    expect(command.name).toBe("classify");
    expect(command.description).toBe("Top ImageNet label");
    expect(command.input).toEqual({ photo: { type: "image" } });
    expect(command.output).toEqual({ label: { type: "text" } });
  });

  it("passes the model handle to the handler", async () => {
    const registry = classifyRegistry();
    const output = await registry.resolve("classify").handler({ labels: ["tabby, tabby cat"] }, {});
    expect(output).toEqual({ label: "tabby, tabby cat" });
  });

  it("throws UnknownCommandError for unregistered names", () => {
    const registry = classifyRegistry();
    expect(() => registry.resolve("segment")).toThrow(UnknownCommandError);
    expect(() => registry.resolve("segment")).toThrow("Unknown command: segment");
  });

  it("rejects a duplicate name and keeps the first registration", () => {
    const registry = classifyRegistry();

    expect(() =>
      registry.register("classify", { text: field.text() }, { label: field.text() }, () => ({ label: "second" })),
    ).toThrow(DuplicateCommandError);

    expect(registry.size).toBe(1);
    expect(registry.resolve("classify").input).toEqual({ photo: { type: "image" } });
  });

  it("lists commands in registration order", () => {
    const registry = classifyRegistry();
    registry.register("embed", { photo: field.image() }, { norm: field.number() }, () => ({ norm: 1 }));

    expect(registry.list().map((c) => c.name)).toEqual(["classify", "embed"]);
    expect(registry.has("embed")).toBe(true);
    expect(registry.has("detect")).toBe(false);
  });

  it("refuses registration once sealed", () => {
    const registry = classifyRegistry();
    registry.seal();

    expect(registry.sealed).toBe(true);
    expect(() =>
      registry.register("embed", {}, { norm: field.number() }, () => ({ norm: 1 })),
    ).toThrow(RegistrySealedError);
    expect(registry.has("embed")).toBe(false);
  });
});

describe("schema validation at registration", () => {
  it("rejects names that are not path-safe", () => {
    const registry = new CommandRegistry<null>();
    expect(() => registry.register("a/b", {}, {}, () => ({}))).toThrow(InvalidSchemaError);
    expect(() => registry.register("", {}, {}, () => ({}))).toThrow(InvalidSchemaError);
    expect(() => registry.register("..", {}, {}, () => ({}))).toThrow(InvalidSchemaError);
  });

  it("rejects names the server routes itself", () => {
    const registry = new CommandRegistry<null>();
    expect(() => registry.register("health-check", {}, { ok: field.boolean() }, () => ({ ok: true }))).toThrow(
      'Command name "health-check" is reserved by the server',
    );
    expect(registry.has("health-check")).toBe(false);
    expect(() => registry.register("health", {}, {}, () => ({}))).not.toThrow();
  });

  // Schemas from plain JavaScript model modules are only checked at runtime
  it("rejects type tags outside the declared set", () => {
    const input: unknown = JSON.parse('{"clip": {"type": "audio"}}');
    expect(() => validateSchema(input, "listen input")).toThrow(
      'listen input field "clip" has unknown type "audio"',
    );
  });

  it("rejects field specs that are not objects", () => {
    expect(() => validateSchema({ clip: "image" }, "listen input")).toThrow(
      'listen input field "clip" must be a field spec',
    );
    expect(() => validateSchema([], "listen input")).toThrow("listen input schema must be an object");
    expect(() => validateSchema(null, "listen input")).toThrow("listen input schema must be an object");
  });

  it("rejects defaults that are not values of their type", () => {
    const input = { topK: { type: "integer", default: 2.5 } };
    expect(() => validateSchema(input, "classify input")).toThrow(
      'classify input field "topK" default is not a valid integer: Value cannot be encoded as an integer, got number',
    );
  });

  it("keeps descriptions and valid defaults", () => {
    const registry = new CommandRegistry<null>();
    registry.register(
      "classify",
      { topK: field.integer({ default: 5, description: "How many labels" }) },
      {},
      () => ({}),
    );
    expect(registry.resolve("classify").input).toEqual({
      topK: { type: "integer", description: "How many labels", default: 5 },
    });
  });
});
