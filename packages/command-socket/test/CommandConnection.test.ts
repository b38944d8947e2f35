import { EventEmitter } from "node:events";
import { describe, expect, it, vi } from "vitest";
import { silentLogger } from "@facesculpt/command-core";
import type { Logger } from "@facesculpt/command-core";
import { CommandConnection, messageToText } from "../src";
import type { CommandConnectionOptions, SocketHandlers } from "../src";

/** Stands in for a ws client: events are emitted by the test, close() only records the call. */
class FakeSocket extends EventEmitter {
  closed = false;

  constructor(handlers: SocketHandlers) {
    super();
    this.on("open", () => handlers.onOpen());
    this.on("message", (data: unknown) => handlers.onMessage(data));
    this.on("close", (code: number) => handlers.onClose(code));
    this.on("error", (err: Error) => handlers.onError(err.message));
  }

  close(): void {
    this.closed = true;
  }
}

function setup(options: Partial<CommandConnectionOptions> = {}) {
  const sockets: FakeSocket[] = [];
  const createSocket = vi.fn((_url: string, handlers: SocketHandlers) => {
    const socket = new FakeSocket(handlers);
    sockets.push(socket);
    return socket;
  });
  const connection = new CommandConnection({ url: "ws://test.invalid:1", createSocket, logger: silentLogger, ...options });
  const latest = () => {
    const socket = sockets[sockets.length - 1];
    if (!socket) throw new Error("no socket created");
    return socket;
  };
  return { sockets, latest, createSocket, connection };
}

describe("CommandConnection", () => {
  it("reports disconnected until the socket opens", () => {
    const { latest, createSocket, connection } = setup();
    expect(connection.queue.connected).toBe(false);

    connection.open();
    expect(createSocket).toHaveBeenCalledWith("ws://test.invalid:1", expect.any(Object));
    expect(connection.isOpen).toBe(false);
    const socket = latest();

    socket.emit("open");
    expect(connection.queue.connected).toBe(true);
    expect(connection.isOpen).toBe(true);
  });

  it("buffers text and binary frames in arrival order", () => {
    const { latest, connection } = setup();
    connection.open();
    const socket = latest();
    socket.emit("open");

    socket.emit("message", Buffer.from('{"command":"insert"}'));
    socket.emit("message", '{"command":"selectXY"}');

    expect(connection.queue.drain()).toEqual(['{"command":"insert"}', '{"command":"selectXY"}']);
  });

  it("drops frames that are not text", () => {
    const logger: Logger = { ...silentLogger, warn: vi.fn() };
    const { latest, connection } = setup({ logger });
    connection.open();
    const socket = latest();

    socket.emit("message", 42);

    expect(connection.queue.size).toBe(0);
    expect(logger.warn).toHaveBeenCalledWith("dropped non-text frame");
  });

  it("marks the queue disconnected when the socket closes but keeps buffered messages", () => {
    const { latest, connection } = setup();
    connection.open();
    const socket = latest();
    socket.emit("open");
    socket.emit("message", '{"command":"move","x":1}');

    socket.emit("close", 1006);

    expect(connection.queue.connected).toBe(false);
    expect(connection.isOpen).toBe(false);
    expect(connection.queue.drain()).toEqual(['{"command":"move","x":1}']);
  });

  it("logs socket errors without throwing", () => {
    const logger: Logger = { ...silentLogger, error: vi.fn() };
    const { latest, connection } = setup({ logger });
    connection.open();
    const socket = latest();

    socket.emit("error", new Error("refused"));

    expect(logger.error).toHaveBeenCalledWith("connection error: refused");
  });

  it("opens a single socket and closes it on demand", () => {
    const { latest, createSocket, connection } = setup();
    connection.open();
    connection.open();
    expect(createSocket).toHaveBeenCalledTimes(1);

    connection.close();
    expect(latest().closed).toBe(true);
    expect(connection.queue.connected).toBe(false);
  });

  it("ignores late events from a socket replaced by reopening", () => {
    const { sockets, connection } = setup();
    connection.open();
    const [first] = sockets;
    first.emit("open");

    connection.close();
    connection.open();
    const second = sockets[1];
    second.emit("open");
    first.emit("message", '{"command":"insert"}');
    first.emit("close", 1000);

    expect(sockets).toHaveLength(2);
    expect(connection.queue.connected).toBe(true);
    expect(connection.isOpen).toBe(true);
    expect(connection.queue.size).toBe(0);

    second.emit("message", '{"command":"selectXY"}');
    expect(connection.queue.drain()).toEqual(['{"command":"selectXY"}']);
  });

  it("reports status changes", () => {
    const onStatus = vi.fn();
    const { latest, connection } = setup({ onStatus });

    connection.open();
    latest().emit("open");
    latest().emit("close", 1006);

    expect(onStatus.mock.calls).toEqual([["connecting"], ["open"], ["closed"]]);
  });

  it("can open again after the server closes the socket", () => {
    const { sockets, connection } = setup();
    connection.open();
    sockets[0].emit("open");
    sockets[0].emit("close", 1001);

    connection.open();
    sockets[1].emit("open");

    expect(sockets).toHaveLength(2);
    expect(connection.isOpen).toBe(true);
  });
});

describe("messageToText", () => {
  it("joins fragmented buffers", () => {
    expect(messageToText([Buffer.from('{"comm'), Buffer.from('and":"click"}')])).toBe('{"command":"click"}');
  });

  it("decodes array buffers as UTF-8", () => {
    const bytes = new TextEncoder().encode("héllo");
    const copy = new ArrayBuffer(bytes.byteLength);
    new Uint8Array(copy).set(bytes);
    expect(messageToText(copy)).toBe("héllo");
  });
});
