/**
 * HTTP Dispatch Server
 *
 * Routes:
 *   POST /<command>   run a command; JSON object in, JSON object out
 *   GET  /            command descriptors
 *   GET  /health-check
 *   GET  /ws          WebSocket upgrade (see ws-server.ts)
 *
 * Errors are JSON `{ error, code, field? }` with 400 for bad input, 404 for
 * unknown commands and 500 for handler or serialization failures. A failing
 * request never takes the process down.
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import {
  createErrorBody,
  ERROR_STATUS,
  type CommandDescriptor,
  type ErrorCode,
  type HealthBody,
} from "@modelhost/protocol";
import { describeCommands, type CommandRegistry, type UnknownInputPolicy } from "@modelhost/commands";
import { Dispatcher } from "./dispatcher.js";
import { InvocationGate } from "./gate.js";
import { describeError, type Logger } from "./logger.js";
import { WsServer } from "./ws-server.js";

export const DEFAULT_HOST = "0.0.0.0";
export const DEFAULT_PORT = 8000;
export const DEFAULT_MAX_BODY_BYTES = 10 * 1024 * 1024;

export interface HttpServerOptions<H> {
  registry: CommandRegistry<H>;
  model: H;
  host?: string;
  /** 0 picks a free port; read it back from `address()` */
  port?: number;
  /** Handler invocations allowed to run at once (default 1) */
  concurrency?: number;
  unknownInputs?: UnknownInputPolicy;
  maxBodyBytes?: number;
  /** Mount the WebSocket channel at /ws (default true) */
  websocket?: boolean;
  serverId?: string;
  logger?: Logger;
}

class PayloadTooLargeError extends Error {
  constructor(limit: number) {
    super(`Request body exceeds ${limit} bytes`);
  }
}

export class HttpServer<H> {
  private server: Server | null = null;
  private wsServer: WsServer<H> | null = null;
  private dispatcher: Dispatcher<H>;
  private registry: CommandRegistry<H>;
  private descriptors: CommandDescriptor[];
  private host: string;
  private port: number;
  private maxBodyBytes: number;
  private websocket: boolean;
  private serverId: string;
  private logger: Logger;

  constructor(options: HttpServerOptions<H>) {
    this.registry = options.registry;
    this.host = options.host ?? DEFAULT_HOST;
    this.port = options.port ?? DEFAULT_PORT;
    this.maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
    this.websocket = options.websocket ?? true;
    this.serverId = options.serverId ?? `modelhost-${process.pid}`;
    this.logger = options.logger ?? console;
    this.descriptors = describeCommands(options.registry);
    this.dispatcher = new Dispatcher({
      registry: options.registry,
      model: options.model,
      gate: new InvocationGate(options.concurrency ?? 1),
      unknownInputs: options.unknownInputs,
      logger: this.logger,
    });
  }

  /**
   * Bind and start accepting requests. The registry is sealed first.
   * Resolves once the socket is listening; the startup line is logged then.
   */
  async start(): Promise<void> {
    if (this.server) throw new Error("Server already started");
    this.registry.seal();

    const server = createServer((req, res) => {
      this.handleRequest(req, res).catch((err: unknown) => {
        this.logger.error(`Request ${req.method} ${req.url} crashed: ${describeError(err)}`);
        if (!res.headersSent) {
          this.sendError(res, "INTERNAL_ERROR", "Internal server error");
        } else {
          res.destroy();
        }
      });
    });
    this.server = server;

    if (this.websocket) {
      this.wsServer = new WsServer({
        server,
        path: "/ws",
        dispatcher: this.dispatcher,
        commands: this.descriptors,
        serverId: this.serverId,
        logger: this.logger,
      });
    }

    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error) => {
        this.server = null;
        reject(err);
      };
      server.once("error", onError);
      server.listen(this.port, this.host, () => {
        server.off("error", onError);
        this.logger.info(`modelhost listening on ${this.url}`);
        resolve();
      });
    });
  }

  /**
   * Stop accepting requests and close open connections.
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;

    if (this.wsServer) {
      await this.wsServer.stop();
      this.wsServer = null;
    }

    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
      server.closeAllConnections();
    });
  }

  /** Bound address; the requested one before `start()` */
  address(): { host: string; port: number } {
    const bound = this.server?.address();
    if (bound && typeof bound === "object") {
      return { host: this.host, port: bound.port };
    }
    return { host: this.host, port: this.port };
  }

  get url(): string {
    const { host, port } = this.address();
    return `http://${host.includes(":") ? `[${host}]` : host}:${port}`;
  }

  /** Command descriptors as served at `GET /` */
  get commands(): CommandDescriptor[] {
    return this.descriptors;
  }

  // ===========================================================================
  // Routing
  // ===========================================================================

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const path = new URL(req.url ?? "/", "http://localhost").pathname;

    if (path === "/") {
      if (req.method !== "GET") return this.sendMethodNotAllowed(res, "GET");
      return this.sendJson(res, 200, this.descriptors);
    }

    if (path === "/health-check") {
      if (req.method !== "GET") return this.sendMethodNotAllowed(res, "GET");
      const health: HealthBody = { status: "READY", commands: this.registry.size };
      return this.sendJson(res, 200, health);
    }

    const name = commandName(path);
    if (name === undefined || !this.registry.has(name)) {
      return this.sendError(res, "UNKNOWN_COMMAND", `Unknown command: ${path.slice(1)}`);
    }
    if (req.method !== "POST") return this.sendMethodNotAllowed(res, "POST");

    let raw: Buffer;
    try {
      raw = await readBody(req, this.maxBodyBytes);
    } catch (err) {
      if (err instanceof PayloadTooLargeError) {
        res.setHeader("Connection", "close");
        return this.sendError(res, "PAYLOAD_TOO_LARGE", err.message);
      }
      throw err;
    }

    let body: unknown = {};
    if (raw.length > 0) {
      try {
        body = JSON.parse(raw.toString("utf8"));
      } catch {
        return this.sendError(res, "INVALID_INPUT", "Request body is not valid JSON");
      }
    }

    const result = await this.dispatcher.invoke(name, body);
    if (result.ok) {
      this.sendJson(res, 200, result.output);
    } else {
      const { code, message, field } = result.error;
      this.sendError(res, code, message, field);
    }
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private sendJson(res: ServerResponse, status: number, body: unknown): void {
    // The caller may have gone away during inference; drop the response
    if (res.writableEnded || res.destroyed) return;
    const payload = JSON.stringify(body);
    res.writeHead(status, {
      "Content-Type": "application/json; charset=utf-8",
      "Content-Length": Buffer.byteLength(payload),
    });
    res.end(payload);
  }

  private sendError(res: ServerResponse, code: ErrorCode, message: string, field?: string): void {
    this.sendJson(res, ERROR_STATUS[code], createErrorBody(code, message, field));
  }

  private sendMethodNotAllowed(res: ServerResponse, allow: string): void {
    res.setHeader("Allow", allow);
    this.sendError(res, "METHOD_NOT_ALLOWED", `Use ${allow} for this path`);
  }
}

/** `/classify` → `classify`; undefined for nested or malformed paths */
function commandName(path: string): string | undefined {
  const segment = path.slice(1);
  if (segment.length === 0 || segment.includes("/")) return undefined;
  try {
    return decodeURIComponent(segment);
  } catch {
    return undefined;
  }
}

function readBody(req: IncomingMessage, limit: number): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const declared = Number(req.headers["content-length"]);
    if (Number.isFinite(declared) && declared > limit) {
      req.resume();
      reject(new PayloadTooLargeError(limit));
      return;
    }

    const chunks: Buffer[] = [];
    let size = 0;
    let overflowed = false;

    req.on("data", (chunk: Buffer) => {
      if (overflowed) return;
      size += chunk.length;
      if (size > limit) {
        overflowed = true;
        chunks.length = 0;
        reject(new PayloadTooLargeError(limit));
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => {
      if (!overflowed) resolve(Buffer.concat(chunks));
    });
    req.on("error", reject);
  });
}
