/**
 * WebSocket frame reader
 *
 * Adapts a `ws` client to the pull-based {@link FrameReader} contract.
 * Events from the socket are queued as frames; each one raises a readiness
 * notification, so a reader that stops early (after a pong) is woken again
 * for whatever it left behind.
 */

import type WebSocket from "ws";
import {
  ConnectionClosedError,
  SocketError,
  WouldBlockError,
  type Unhook,
} from "@hookloop/shared";
import type { Frame, FrameReader } from "./frames.js";

/** The part of a `ws` client the reader listens to. */
export interface WebSocketEvents {
  on(event: "message", listener: (data: WebSocket.RawData, isBinary: boolean) => void): unknown;
  on(event: "ping" | "pong", listener: (data: Buffer) => void): unknown;
  on(event: "close", listener: (code: number, reason: Buffer) => void): unknown;
  on(event: "error", listener: (error: Error) => void): unknown;
}

export class WsFrameReader implements FrameReader {
  private readonly queue: Frame[] = [];
  private readonly listeners = new Set<() => void>();
  private closed: { code: number; reason: string } | null = null;
  private failure: SocketError | null = null;

  constructor(socket: WebSocketEvents) {
    socket.on("message", (data: WebSocket.RawData, isBinary: boolean) => {
      const buffer = toBuffer(data);
      this.push(
        isBinary ? { opcode: "binary", data: buffer } : { opcode: "text", data: buffer.toString("utf-8") },
      );
    });
    socket.on("ping", (data: Buffer) => this.push({ opcode: "ping", data }));
    socket.on("pong", (data: Buffer) => this.push({ opcode: "pong", data }));
    socket.on("close", (code: number, reason: Buffer) => {
      this.closed = { code, reason: reason.toString("utf-8") };
      this.notify();
    });
    socket.on("error", (error: Error) => {
      this.failure = new SocketError(error.message, error);
      this.notify();
    });
  }

  get buffered(): number {
    return this.queue.length;
  }

  /** A `recvFrame` call would return a frame or a terminal error. */
  get readable(): boolean {
    return this.queue.length > 0 || this.closed !== null || this.failure !== null;
  }

  recvFrame(): Frame {
    const frame = this.queue.shift();
    if (frame) return frame;
    if (this.failure) throw this.failure;
    if (this.closed) throw new ConnectionClosedError(this.closed.code, this.closed.reason);
    throw new WouldBlockError();
  }

  onReadable(listener: () => void): Unhook {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private push(frame: Frame): void {
    this.queue.push(frame);
    this.notify();
  }

  private notify(): void {
    for (const listener of [...this.listeners]) {
      listener();
    }
  }
}

function toBuffer(data: WebSocket.RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}
