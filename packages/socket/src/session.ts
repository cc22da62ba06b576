/**
 * Socket session
 *
 * Owns one persistent connection and its readiness registration. Every
 * readiness notification runs the read loop:
 *
 * - text frame: decode JSON, hand it to `onMessage`, keep reading
 * - pong: record `lastPongTime`, stop
 * - any other control frame: stop
 * - nothing buffered: stop, registration stays in place
 * - closed / socket error: tear the session down, report via `onDisconnect`
 *
 * Nothing thrown in here reaches the host.
 */

import {
  isFatalSocketError,
  isWouldBlockError,
  SocketError,
  type HostHooks,
  type Unhook,
} from "@hookloop/shared";
import { Logger, type Scheduler } from "@hookloop/kernel";
import type { Frame, FrameReader } from "./frames.js";

const log = Logger.for("SocketSession");

export type SessionState = "idle" | "open" | "closed";

export interface SocketSessionOptions {
  scheduler: Scheduler;
  reader: FrameReader;
  /** Outbound side of the connection. */
  writer?: FrameWriter;
  /** Receives each decoded data frame. */
  onMessage: (message: unknown) => void;
  /** Called once when the connection closes or fails. */
  onDisconnect?: (error: Error) => void;
  /** Clock for `lastPongTime`, in milliseconds. */
  now?: () => number;
}

export interface FrameWriter {
  send(data: string): void;
  ping(): void;
  close(code?: number, reason?: string): void;
}

export class SocketSession {
  private readonly scheduler: Scheduler;
  private readonly host: HostHooks;
  private readonly reader: FrameReader;
  private readonly writer: FrameWriter | undefined;
  private readonly onMessage: (message: unknown) => void;
  private readonly onDisconnect: ((error: Error) => void) | undefined;
  private readonly now: () => number;

  private _state: SessionState = "idle";
  private callbackId: string | null = null;
  private unhook: Unhook | null = null;
  private _lastPongTime: number | null = null;

  constructor(options: SocketSessionOptions) {
    this.scheduler = options.scheduler;
    this.host = options.scheduler.host;
    this.reader = options.reader;
    this.writer = options.writer;
    this.onMessage = options.onMessage;
    this.onDisconnect = options.onDisconnect;
    this.now = options.now ?? Date.now;
  }

  get state(): SessionState {
    return this._state;
  }

  get lastPongTime(): number | null {
    return this._lastPongTime;
  }

  /** Register with the host's readiness hook. */
  open(): void {
    if (this._state !== "idle") {
      throw new Error(`Cannot open a session that is ${this._state}`);
    }
    const callbackId = this.scheduler.watch(() => this.handleReadable(), "socket");
    try {
      this.unhook = this.host.hookReadable(this.reader, this.scheduler.dispatch, callbackId);
    } catch (error) {
      this.scheduler.unwatch(callbackId);
      throw error;
    }
    this.callbackId = callbackId;
    this._state = "open";
  }

  /**
   * The read loop. Runs to the first stopping condition and returns control
   * to the host.
   */
  handleReadable(): void {
    while (this._state === "open") {
      let frame: Frame;
      try {
        frame = this.reader.recvFrame();
      } catch (error) {
        if (isWouldBlockError(error)) return;
        const failure = isFatalSocketError(error)
          ? error
          : new SocketError("Frame read failed", error instanceof Error ? error : undefined);
        log.warn({ err: failure }, "connection lost");
        this.teardown();
        this.reportDisconnect(failure);
        return;
      }

      switch (frame.opcode) {
        case "pong":
          this._lastPongTime = this.now();
          return;
        case "text":
          this.deliver(frame.data);
          break;
        default:
          log.trace({ opcode: frame.opcode }, "control frame ignored");
          return;
      }
    }
  }

  /**
   * Run the read loop until the reader has nothing pending. Used for frames
   * that arrived before {@link open}, which raised no notification.
   */
  drain(): void {
    while (this._state === "open" && this.reader.readable) {
      this.handleReadable();
    }
  }

  /** Send a JSON-encoded data frame. */
  send(message: unknown): void {
    this.requireWriter().send(JSON.stringify(message));
  }

  ping(): void {
    this.requireWriter().ping();
  }

  close(code = 1000, reason = ""): void {
    if (this._state === "closed") return;
    this.teardown();
    this.writer?.close(code, reason);
  }

  private deliver(text: string): void {
    let message: unknown;
    try {
      message = JSON.parse(text);
    } catch (error) {
      log.error({ err: error, length: text.length }, "data frame is not JSON, skipping");
      return;
    }

    try {
      this.onMessage(message);
    } catch (error) {
      log.error({ err: error }, "message handler failed");
    }
  }

  private reportDisconnect(error: Error): void {
    try {
      this.onDisconnect?.(error);
    } catch (handlerError) {
      log.error({ err: handlerError }, "disconnect handler failed");
    }
  }

  private teardown(): void {
    this._state = "closed";
    this.unhook?.();
    this.unhook = null;
    if (this.callbackId) {
      this.scheduler.unwatch(this.callbackId);
      this.callbackId = null;
    }
  }

  private requireWriter(): FrameWriter {
    if (!this.writer) throw new Error("Session has no writer");
    if (this._state !== "open") throw new Error(`Cannot write to a session that is ${this._state}`);
    return this.writer;
  }
}
