import type { MessageSource } from "./types";

/** Buffer between the connection adapter and the frame driver. */
export class MessageQueue implements MessageSource {
  private buffer: string[] = [];
  private isConnected = true;

  push(message: string): void {
    this.buffer.push(message);
  }

  drain(): string[] {
    const drained = this.buffer;
    this.buffer = [];
    return drained;
  }

  markConnected(): void {
    this.isConnected = true;
  }

  markDisconnected(): void {
    this.isConnected = false;
  }

  get connected(): boolean {
    return this.isConnected;
  }

  get size(): number {
    return this.buffer.length;
  }
}
