import { describe, it, expect } from "vitest";
import { CommandRegistry, describeCommands, field } from "../src/index.js";

const PNG = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

function registry(): CommandRegistry<null> {
  const r = new CommandRegistry<null>();
  r.register(
    "classify",
    { photo: field.image({ description: "Photo to label" }), topK: field.integer({ default: 1 }) },
    { label: field.text() },
    () => ({ label: "tabby" }),
    { description: "ImageNet top label" },
  );
  r.register(
    "thumbnail",
    { photo: field.image({ default: { data: PNG, mimeType: "image/png" } }) },
    { thumb: field.image() },
    (_model, { photo }) => ({ thumb: photo }),
  );
  return r;
}

describe("describeCommands", () => {
  it("returns commands in registration order", () => {
    const names = describeCommands(registry()).map((c) => c.name);
    expect(names).toEqual(["classify", "thumbnail"]);
  });

  it("describes field types, descriptions and defaults", () => {
    const [classify] = describeCommands(registry());
    expect(classify).toEqual({
      name: "classify",
      description: "ImageNet top label",
      input: {
        photo: { type: "image", description: "Photo to label" },
        topK: { type: "integer", default: 1 },
      },
      output: { label: { type: "text" } },
    });
  });

  it("encodes image defaults to their wire form", () => {
    const thumbnail = describeCommands(registry())[1];
    expect(thumbnail?.input.photo?.default).toBe(`data:image/png;base64,${PNG.toString("base64")}`);
    expect(thumbnail?.description).toBeUndefined();
  });

  it("is JSON-serialisable as-is", () => {
    const descriptors = describeCommands(registry());
    expect(JSON.parse(JSON.stringify(descriptors))).toEqual(descriptors);
  });
});
