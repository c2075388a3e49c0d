/**
 * WebSocket Connection
 *
 * Keeps one connection to a modelhost server's /ws channel: sends the hello
 * handshake, receives the welcome with the command list, and correlates
 * invoke results to their calls by id.
 */

import WebSocket from "ws";
import { randomUUID } from "node:crypto";
import {
  ERROR_STATUS,
  PROTOCOL_VERSION,
  isServerMessage,
  isWelcomeMessage,
  type ClientMessage,
  type CommandDescriptor,
  type HelloMessage,
  type ServerError,
  type WelcomeMessage,
  type WireObject,
} from "@modelhost/protocol";
import { CommandFailedError, ConnectionClosedError } from "./errors.js";

export type ConnectionState = "disconnected" | "connecting" | "handshaking" | "connected";

export interface ConnectionOptions {
  /** Sent in the hello; a random UUID by default */
  clientId?: string;
  /** Reconnect this long after an unexpected close. No reconnect when unset. */
  reconnectDelayMs?: number;
  /** Called when connection state changes */
  onStateChange?: (state: ConnectionState) => void;
  /** Called for every welcome, including after a reconnect */
  onWelcome?: (welcome: WelcomeMessage) => void;
  /** Called for server errors that answer no particular call */
  onError?: (error: ServerError) => void;
}

interface Pending {
  resolve: (output: WireObject) => void;
  reject: (err: Error) => void;
}

interface Handshake {
  resolve: (welcome: WelcomeMessage) => void;
  reject: (err: Error) => void;
}

export class Connection {
  private ws: WebSocket | null = null;
  private url: string;
  private clientId: string;
  private options: ConnectionOptions;
  private state: ConnectionState = "disconnected";
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private closing = false;
  private nextId = 0;
  private pending = new Map<string, Pending>();
  private pongWaiters: Array<{ resolve: () => void; reject: (err: Error) => void }> = [];
  private handshake: Handshake | null = null;
  private welcome: WelcomeMessage | null = null;

  constructor(url: string, options: ConnectionOptions = {}) {
    this.url = url;
    this.clientId = options.clientId ?? randomUUID();
    this.options = options;
  }

  /**
   * Connect and complete the handshake. Resolves with the welcome.
   */
  connect(): Promise<WelcomeMessage> {
    if (this.state === "connected" && this.welcome) return Promise.resolve(this.welcome);
    if (this.handshake) return Promise.reject(new Error("Connection is already being established"));

    this.closing = false;
    return new Promise((resolve, reject) => {
      this.handshake = { resolve, reject };
      this.open();
    });
  }

  /**
   * Close without reconnecting. Pending calls are rejected.
   */
  disconnect(): void {
    this.closing = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    if (this.ws) {
      this.ws.close(1000, "Client disconnecting");
    } else {
      this.setState("disconnected");
    }
  }

  /**
   * Run a command over the connection.
   */
  invoke(command: string, input: WireObject = {}): Promise<WireObject> {
    const ws = this.ws;
    if (!ws || this.state !== "connected") {
      return Promise.reject(new ConnectionClosedError(`Not connected (${this.state})`));
    }

    const id = String(++this.nextId);
    return new Promise((resolve, reject) => {
      this.pending.set(id, { resolve, reject });
      this.send(ws, { type: "invoke", id, command, input });
    });
  }

  /** Resolves on the server's pong */
  ping(): Promise<void> {
    const ws = this.ws;
    if (!ws || this.state !== "connected") {
      return Promise.reject(new ConnectionClosedError(`Not connected (${this.state})`));
    }
    return new Promise((resolve, reject) => {
      this.pongWaiters.push({ resolve, reject });
      this.send(ws, { type: "ping" });
    });
  }

  /** Current connection state */
  get connectionState(): ConnectionState {
    return this.state;
  }

  /** Commands from the latest welcome; empty before the first one */
  get commands(): CommandDescriptor[] {
    return this.welcome?.commands ?? [];
  }

  /** Calls sent and not yet answered */
  get pendingCount(): number {
    return this.pending.size;
  }

  // ===========================================================================
  // Internal
  // ===========================================================================

  private open(): void {
    if (this.ws) return;

    this.setState("connecting");
    const ws = new WebSocket(this.url);
    this.ws = ws;
    let lastError: Error | null = null;

    ws.on("open", () => {
      this.setState("handshaking");
      const hello: HelloMessage = {
        type: "hello",
        protocolVersion: PROTOCOL_VERSION,
        clientId: this.clientId,
      };
      ws.send(JSON.stringify(hello));
    });

    ws.on("message", (data) => {
      let parsed: unknown;
      try {
        parsed = JSON.parse(data.toString());
      } catch {
        // Not ours to answer; the server only sends JSON
        return;
      }
      this.handleMessage(parsed);
    });

    ws.on("close", (code, reason) => {
      this.ws = null;
      this.setState("disconnected");

      const why = lastError?.message ?? (reason.length > 0 ? reason.toString() : `code ${code}`);
      const err = new ConnectionClosedError(`Connection closed: ${why}`);
      this.handshake?.reject(err);
      this.handshake = null;
      for (const call of this.pending.values()) call.reject(err);
      this.pending.clear();
      for (const waiter of this.pongWaiters) waiter.reject(err);
      this.pongWaiters = [];

      if (!this.closing) this.scheduleReconnect();
    });

    ws.on("error", (err) => {
      // Followed by close, which rejects whatever is waiting
      lastError = err;
    });
  }

  private handleMessage(message: unknown): void {
    if (isWelcomeMessage(message)) {
      this.welcome = message;
      this.setState("connected");
      this.handshake?.resolve(message);
      this.handshake = null;
      this.options.onWelcome?.(message);
      return;
    }

    if (!isServerMessage(message)) return;

    switch (message.type) {
      case "result": {
        const call = this.pending.get(message.id);
        if (call) {
          this.pending.delete(message.id);
          call.resolve(message.output);
        }
        break;
      }

      case "pong":
        this.pongWaiters.shift()?.resolve();
        break;

      case "error": {
        const call = message.id === undefined ? undefined : this.pending.get(message.id);
        if (call && message.id !== undefined) {
          this.pending.delete(message.id);
          call.reject(toCommandFailure(message));
        } else if (this.handshake) {
          this.handshake.reject(toCommandFailure(message));
          this.handshake = null;
          this.closing = true;
        } else {
          this.options.onError?.(message);
        }
        break;
      }
    }
  }

  private send(ws: WebSocket, message: ClientMessage): void {
    ws.send(JSON.stringify(message));
  }

  private setState(state: ConnectionState): void {
    if (this.state !== state) {
      this.state = state;
      this.options.onStateChange?.(state);
    }
  }

  private scheduleReconnect(): void {
    const delay = this.options.reconnectDelayMs;
    if (delay === undefined || this.reconnectTimer) return;
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.open();
    }, delay);
  }
}

function toCommandFailure(error: ServerError): CommandFailedError {
  const status = Object.hasOwn(ERROR_STATUS, error.code) ? ERROR_STATUS[error.code] : 500;
  return new CommandFailedError(error.message, status, error.code, error.field);
}
