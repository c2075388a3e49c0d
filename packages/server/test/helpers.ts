/**
 * Shared fixtures for server tests.
 */

import { defineModel, field, type Logger } from "../src/index.js";

/** 16 bytes that start with the PNG signature */
export const PNG = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x00, 0x00, 0x0d, 0x49, 0x48, 0x44, 0x52]);
export const PNG_BASE64 = PNG.toString("base64");

export class RecordingLogger implements Logger {
  lines: Array<{ level: "info" | "warn" | "error"; message: string }> = [];

  info(message: string): void {
    this.lines.push({ level: "info", message });
  }

  warn(message: string): void {
    this.lines.push({ level: "warn", message });
  }

  error(message: string): void {
    this.lines.push({ level: "error", message });
  }

  messages(level: "info" | "warn" | "error"): string[] {
    return this.lines.filter((l) => l.level === level).map((l) => l.message);
  }
}

/** Opaque stand-in for a loaded classifier */
export interface StubClassifier {
  checkpoint: string;
  calls: number;
}

/**
 * The tabby model: `classify` always answers "tabby, tabby cat" and counts
 * how often it ran.
 */
export const tabbyModel = defineModel<StubClassifier>({
  options: {
    checkpoint: { description: "Path to weights", default: "squeezenet.onnx" },
  },
  setup: ({ checkpoint = "" }) => ({ checkpoint, calls: 0 }),
  commands(registry) {
    registry.register("classify", { photo: field.image() }, { label: field.text() }, (model) => {
      model.calls++;
      return { label: "tabby, tabby cat" };
    });
  },
});

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
