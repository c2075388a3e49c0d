/**
 * WebSocket Channel
 *
 * Mounted on the HTTP server's upgrade path. Lets a client keep one
 * connection open and run many commands over it, with the same decoding,
 * gate and encoding as `POST /<command>`.
 *
 * Connection lifecycle:
 * 1. Client connects via WebSocket to /ws
 * 2. Client sends HelloMessage
 * 3. Server validates protocol version
 * 4. Server sends WelcomeMessage with the command descriptors
 * 5. Steady-state: invoke → result/error, ping → pong
 *
 * Any number of clients may be connected; their invocations share the gate.
 */

import type { Server } from "node:http";
import { WebSocketServer, type RawData, type WebSocket } from "ws";
import {
  PROTOCOL_VERSION,
  createError,
  createIncompatibleProtocolError,
  isClientMessage,
  isHelloMessage,
  type ClientInvokeMessage,
  type CommandDescriptor,
  type ServerMessage,
  type WelcomeMessage,
} from "@modelhost/protocol";
import type { Dispatcher } from "./dispatcher.js";
import { describeError, type Logger } from "./logger.js";

export interface WsServerOptions<H> {
  server: Server;
  path: string;
  dispatcher: Dispatcher<H>;
  commands: CommandDescriptor[];
  serverId: string;
  logger: Logger;
}

export class WsServer<H> {
  private wss: WebSocketServer;
  private clients = new Set<WebSocket>();
  private dispatcher: Dispatcher<H>;
  private commands: CommandDescriptor[];
  private serverId: string;
  private logger: Logger;

  constructor(options: WsServerOptions<H>) {
    this.dispatcher = options.dispatcher;
    this.commands = options.commands;
    this.serverId = options.serverId;
    this.logger = options.logger;

    this.wss = new WebSocketServer({ server: options.server, path: options.path });
    this.wss.on("connection", (ws) => this.handleConnection(ws));
  }

  /**
   * Close every socket, handshaken or not, and detach from the HTTP server.
   * Sockets that have not finished closing after `closeGraceMs` are terminated.
   */
  async stop(closeGraceMs = 1000): Promise<void> {
    for (const client of this.wss.clients) {
      client.close(1001, "Server shutting down");
    }
    this.clients.clear();

    const grace = setTimeout(() => {
      for (const client of this.wss.clients) client.terminate();
    }, closeGraceMs);

    try {
      await new Promise<void>((resolve) => {
        this.wss.close(() => resolve());
      });
    } finally {
      clearTimeout(grace);
    }
  }

  /** Connected clients that completed the handshake */
  get clientCount(): number {
    return this.clients.size;
  }

  // ===========================================================================
  // WebSocket connection handling
  // ===========================================================================

  private handleConnection(ws: WebSocket): void {
    let clientId: string | null = null;

    ws.on("message", (data) => {
      const parsed = parseMessage(data);
      if (parsed === undefined) {
        this.send(ws, createError("INVALID_MESSAGE", "Invalid JSON"));
        return;
      }

      if (clientId === null) {
        // Expect HelloMessage
        if (!isHelloMessage(parsed)) {
          this.send(ws, createError("INVALID_HELLO", "First message must be a HelloMessage"));
          ws.close(1002, "Invalid handshake");
          return;
        }

        if (parsed.protocolVersion !== PROTOCOL_VERSION) {
          this.send(ws, createIncompatibleProtocolError(parsed.protocolVersion, PROTOCOL_VERSION));
          ws.close(1002, "Incompatible protocol version");
          return;
        }

        clientId = parsed.clientId;
        this.clients.add(ws);
        const welcome: WelcomeMessage = {
          type: "welcome",
          protocolVersion: PROTOCOL_VERSION,
          serverId: this.serverId,
          commands: this.commands,
        };
        this.send(ws, welcome);
        return;
      }

      if (!isClientMessage(parsed)) {
        this.send(ws, createError("INVALID_MESSAGE", "Expected an invoke or ping message"));
        return;
      }

      switch (parsed.type) {
        case "ping":
          this.send(ws, { type: "pong" });
          break;

        case "invoke": {
          const invoker = clientId;
          this.handleInvoke(ws, parsed).catch((err: unknown) => {
            this.logger.error(`Invoke ${parsed.id} from ${invoker} crashed: ${describeError(err)}`);
            this.send(ws, createError("INTERNAL_ERROR", "Internal server error", { id: parsed.id }));
          });
          break;
        }
      }
    });

    ws.on("close", () => {
      this.clients.delete(ws);
    });

    ws.on("error", (err) => {
      this.logger.warn(`WebSocket client ${clientId ?? "(no hello)"} error: ${err.message}`);
    });
  }

  // ===========================================================================
  // Invocation
  // ===========================================================================

  private async handleInvoke(ws: WebSocket, message: ClientInvokeMessage): Promise<void> {
    const result = await this.dispatcher.invoke(message.command, message.input);
    if (result.ok) {
      this.send(ws, { type: "result", id: message.id, output: result.output });
    } else {
      const { code, message: text, field } = result.error;
      this.send(ws, createError(code, text, { id: message.id, field }));
    }
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private send(ws: WebSocket, message: ServerMessage | WelcomeMessage): void {
    // Results for clients that disconnected mid-inference are dropped
    if (ws.readyState === ws.OPEN) {
      ws.send(JSON.stringify(message));
    }
  }
}

function parseMessage(data: RawData): unknown {
  let buffer: Buffer;
  if (Array.isArray(data)) {
    buffer = Buffer.concat(data);
  } else if (data instanceof ArrayBuffer) {
    buffer = Buffer.from(data);
  } else {
    buffer = data;
  }
  try {
    return JSON.parse(buffer.toString("utf8"));
  } catch {
    return undefined;
  }
}
