/**
 * WebSocket client against an in-process server.
 */

import { describe, it, expect, afterEach } from "vitest";
import { startModelServer, silentLogger, type RunningModelServer } from "@modelhost/server";
import { CommandFailedError, Connection, ConnectionClosedError, type ConnectionState } from "../src/index.js";
import { PNG, startStudio, studioModel, wsUrl, type Studio } from "./helpers.js";

let running: RunningModelServer<Studio> | null = null;
let connection: Connection | null = null;

afterEach(async () => {
  connection?.disconnect();
  connection = null;
  if (running) {
    await running.stop();
    running = null;
  }
});

async function waitFor(condition: () => boolean, timeoutMs = 5000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) throw new Error("Timed out waiting for condition");
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
}

describe("Connection", () => {
  it("completes the handshake and exposes the command list", async () => {
    running = await startStudio();
    const states: ConnectionState[] = [];
    connection = new Connection(wsUrl(running), { onStateChange: (s) => states.push(s) });

    const welcome = await connection.connect();

    expect(welcome.serverId).toBe("studio");
    expect(connection.commands.map((c) => c.name)).toEqual(["classify", "greet", "slow"]);
    expect(connection.connectionState).toBe("connected");
    expect(states).toEqual(["connecting", "handshaking", "connected"]);
  });

  it("correlates results to calls by id", async () => {
    running = await startStudio();
    connection = new Connection(wsUrl(running));
    await connection.connect();

    const [slow, greet, classify] = await Promise.all([
      connection.invoke("slow", { ms: 30 }),
      connection.invoke("greet", { name: "Ada" }),
      connection.invoke("classify", { photo: PNG.toString("base64"), topK: 2 }),
    ]);

    expect(slow).toEqual({ done: true });
    expect(greet).toEqual({ message: "hello Ada" });
    expect(classify).toEqual({ label: "tabby, tabby cat; tiger cat", bytes: 16 });
    expect(connection.pendingCount).toBe(0);
  });

  it("rejects a failed call with CommandFailedError", async () => {
    running = await startStudio();
    connection = new Connection(wsUrl(running));
    await connection.connect();

    const err = await connection.invoke("greet", { name: 42 }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(CommandFailedError);
    expect(err).toMatchObject({
      message: 'Field "name" must be a text, got number',
      status: 400,
      code: "INVALID_INPUT",
      field: "name",
    });
  });

  it("answers ping", async () => {
    running = await startStudio();
    connection = new Connection(wsUrl(running));
    await connection.connect();
    await expect(connection.ping()).resolves.toBeUndefined();
  });

  it("refuses calls before connecting", async () => {
    connection = new Connection("ws://127.0.0.1:1/ws");
    await expect(connection.invoke("greet", { name: "Ada" })).rejects.toThrow("Not connected (disconnected)");
  });

  it("rejects pending calls when the server goes away", async () => {
    running = await startStudio();
    connection = new Connection(wsUrl(running));
    await connection.connect();

    const pending = connection.invoke("slow", { ms: 200 }).catch((e: unknown) => e);
    const server = running;
    running = null;
    await server.stop();

    const err = await pending;
    expect(err).toBeInstanceOf(ConnectionClosedError);
    expect(err).toMatchObject({ message: "Connection closed: Server shutting down" });
    expect(connection.connectionState).toBe("disconnected");
  });

  it("rejects connect when nothing is listening", async () => {
    const stopped = await startStudio();
    const url = wsUrl(stopped);
    await stopped.stop();

    connection = new Connection(url);
    await expect(connection.connect()).rejects.toBeInstanceOf(ConnectionClosedError);
  });

  it("reconnects after the server restarts when a delay is set", async () => {
    running = await startStudio();
    const port = running.server.address().port;
    let welcomes = 0;
    connection = new Connection(wsUrl(running), { reconnectDelayMs: 20, onWelcome: () => welcomes++ });
    await connection.connect();

    const first = running;
    running = null;
    await first.stop();
    running = await startModelServer(studioModel, { host: "127.0.0.1", port, logger: silentLogger, serverId: "studio" });

    const reconnected = connection;
    await waitFor(() => welcomes === 2 && reconnected.connectionState === "connected");
    expect(await reconnected.invoke("greet", { name: "Ada" })).toEqual({ message: "hello Ada" });
  });
});
