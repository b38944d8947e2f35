import NodeWebSocket from "ws";
import { consoleLogger } from "@facesculpt/command-core";
import type { Logger } from "@facesculpt/command-core";
import { MessageQueue } from "@facesculpt/placement-core";

export type ConnectionStatus = "connecting" | "open" | "closed";

export interface SocketHandlers {
  onOpen(): void;
  onMessage(data: unknown): void;
  onClose(code: number): void;
  onError(message: string): void;
}

/** Whatever the factory returns only needs to close; events arrive through the handlers. */
export interface SocketLike {
  close(): void;
}

export type SocketFactory = (url: string, handlers: SocketHandlers) => SocketLike;

export interface CommandConnectionOptions {
  url: string;
  queue?: MessageQueue;
  createSocket?: SocketFactory;
  logger?: Logger;
  onStatus?: (status: ConnectionStatus) => void;
}

const nodeSocketFactory: SocketFactory = (url, handlers) => {
  const socket = new NodeWebSocket(url);
  socket.on("open", () => handlers.onOpen());
  socket.on("message", (data) => handlers.onMessage(data));
  socket.on("close", (code) => handlers.onClose(code));
  socket.on("error", (err) => handlers.onError(err.message));
  return socket;
};

function browserSocketFactory(Impl: typeof globalThis.WebSocket): SocketFactory {
  return (url, handlers) => {
    const socket = new Impl(url);
    socket.binaryType = "arraybuffer";
    socket.addEventListener("open", () => handlers.onOpen());
    socket.addEventListener("message", (event) => handlers.onMessage(event.data));
    socket.addEventListener("close", (event) => handlers.onClose(event.code));
    socket.addEventListener("error", () => handlers.onError(`socket error on ${url}`));
    return socket;
  };
}

// Browsers (and runtimes with a global WebSocket) use it; Node 20 falls back to ws.
function defaultSocketFactory(): SocketFactory {
  return typeof globalThis.WebSocket === "function" ? browserSocketFactory(globalThis.WebSocket) : nodeSocketFactory;
}

const utf8 = new TextDecoder();

function isBytes(value: unknown): value is Uint8Array {
  return value instanceof Uint8Array;
}

export function messageToText(data: unknown): string | null {
  if (typeof data === "string") return data;
  if (isBytes(data)) return utf8.decode(data);
  if (data instanceof ArrayBuffer) return utf8.decode(new Uint8Array(data));
  if (Array.isArray(data) && data.every(isBytes)) {
    const joined = new Uint8Array(data.reduce((total, chunk) => total + chunk.byteLength, 0));
    let offset = 0;
    for (const chunk of data) {
      joined.set(chunk, offset);
      offset += chunk.byteLength;
    }
    return utf8.decode(joined);
  }
  return null;
}

/**
 * Buffers inbound text frames for the frame driver. Nothing here touches
 * interpreter state; the driver drains `queue` on its own tick. Events from a
 * socket that has since been closed or replaced are ignored.
 */
export class CommandConnection {
  readonly queue: MessageQueue;
  private socket: SocketLike | null = null;
  private generation = 0;
  private readonly createSocket: SocketFactory;
  private readonly logger: Logger;

  constructor(private readonly options: CommandConnectionOptions) {
    this.queue = options.queue ?? new MessageQueue();
    this.createSocket = options.createSocket ?? defaultSocketFactory();
    this.logger = options.logger ?? consoleLogger;
    this.queue.markDisconnected();
  }

  open(): void {
    if (this.socket) return;
    const generation = ++this.generation;
    const live = () => this.generation === generation;
    const { url } = this.options;

    this.options.onStatus?.("connecting");
    this.socket = this.createSocket(url, {
      onOpen: () => {
        if (!live()) return;
        this.queue.markConnected();
        this.options.onStatus?.("open");
        this.logger.info(`connected to ${url}`);
      },
      onMessage: (data) => {
        if (!live()) return;
        const text = messageToText(data);
        if (text === null) {
          this.logger.warn("dropped non-text frame");
          return;
        }
        this.queue.push(text);
      },
      onClose: (code) => {
        if (!live()) return;
        this.generation += 1;
        this.socket = null;
        this.queue.markDisconnected();
        this.options.onStatus?.("closed");
        this.logger.warn(`connection to ${url} closed (${code})`);
      },
      onError: (message) => {
        if (!live()) return;
        this.logger.error(`connection error: ${message}`);
      },
    });
  }

  close(): void {
    const socket = this.socket;
    if (!socket) return;
    this.generation += 1;
    this.socket = null;
    this.queue.markDisconnected();
    this.options.onStatus?.("closed");
    socket.close();
  }

  get isOpen(): boolean {
    return this.socket !== null && this.queue.connected;
  }
}
