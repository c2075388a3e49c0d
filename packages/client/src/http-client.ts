/**
 * HTTP client for a modelhost server.
 *
 *   const client = new CommandClient("http://localhost:8000");
 *   const { label } = await client.invoke("classify", { photo: base64 });
 */

import {
  isCommandDescriptor,
  isErrorBody,
  isHealthBody,
  isWireObject,
  type CommandDescriptor,
  type HealthBody,
  type WireObject,
} from "@modelhost/protocol";
import { CommandFailedError } from "./errors.js";

export interface CommandClientOptions {
  /** Extra headers sent with every request */
  headers?: Record<string, string>;
}

export class CommandClient {
  private baseUrl: string;
  private headers: Record<string, string>;

  constructor(baseUrl: string, options: CommandClientOptions = {}) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
    this.headers = options.headers ?? {};
  }

  /**
   * Run a command. Resolves with the encoded outputs; rejects with
   * CommandFailedError for any non-2xx answer.
   */
  async invoke(command: string, input: WireObject = {}): Promise<WireObject> {
    const body = await this.request(`/${encodeURIComponent(command)}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(input),
    });
    if (!isWireObject(body)) {
      throw new CommandFailedError(`Expected a JSON object from ${command}`, 200, "UNEXPECTED_RESPONSE");
    }
    return body;
  }

  /** Descriptors of every command the server accepts */
  async listCommands(): Promise<CommandDescriptor[]> {
    const body = await this.request("/", { method: "GET" });
    if (!Array.isArray(body) || !body.every(isCommandDescriptor)) {
      throw new CommandFailedError("Expected a list of command descriptors", 200, "UNEXPECTED_RESPONSE");
    }
    return body;
  }

  async health(): Promise<HealthBody> {
    const body = await this.request("/health-check", { method: "GET" });
    if (!isHealthBody(body)) {
      throw new CommandFailedError("Expected a health-check body", 200, "UNEXPECTED_RESPONSE");
    }
    return body;
  }

  private async request(path: string, init: { method: string; headers?: Record<string, string>; body?: string }): Promise<unknown> {
    const res = await fetch(`${this.baseUrl}${path}`, {
      ...init,
      headers: { ...this.headers, ...init.headers },
    });
    const text = await res.text();

    let body: unknown;
    try {
      body = text.length > 0 ? JSON.parse(text) : undefined;
    } catch {
      body = undefined;
    }

    if (!res.ok) {
      if (isErrorBody(body)) {
        throw new CommandFailedError(body.error, res.status, body.code, body.field);
      }
      throw new CommandFailedError(`HTTP ${res.status}: ${text || res.statusText}`, res.status, "UNEXPECTED_RESPONSE");
    }
    return body;
  }
}
