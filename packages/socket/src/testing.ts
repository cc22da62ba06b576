/**
 * Socket Testing Utilities
 *
 * `ScriptedFrameReader` plays back a list of frames and errors. Once the
 * script runs dry it reports would-block, like a socket with nothing
 * buffered.
 *
 * @module @hookloop/socket/testing
 */

import { WouldBlockError, type Unhook } from "@hookloop/shared";
import type { Frame, FrameReader } from "./frames.js";

export type ScriptStep = Frame | Error;

export class ScriptedFrameReader implements FrameReader {
  private readonly steps: ScriptStep[];
  private readonly listeners = new Set<() => void>();
  /** Number of `recvFrame` calls so far. */
  reads = 0;

  constructor(steps: ScriptStep[] = []) {
    this.steps = [...steps];
  }

  get remaining(): number {
    return this.steps.length;
  }

  get readable(): boolean {
    return this.steps.length > 0;
  }

  recvFrame(): Frame {
    this.reads += 1;
    const step = this.steps.shift();
    if (step === undefined) throw new WouldBlockError();
    if (step instanceof Error) throw step;
    return step;
  }

  onReadable(listener: () => void): Unhook {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Append steps and raise a readiness notification. */
  push(...steps: ScriptStep[]): void {
    this.steps.push(...steps);
    this.notify();
  }

  notify(): void {
    for (const listener of [...this.listeners]) {
      listener();
    }
  }

  get listenerCount(): number {
    return this.listeners.size;
  }
}

export function textFrame(message: unknown): Frame {
  return { opcode: "text", data: JSON.stringify(message) };
}

export function pongFrame(): Frame {
  return { opcode: "pong", data: Buffer.alloc(0) };
}

export function pingFrame(): Frame {
  return { opcode: "ping", data: Buffer.alloc(0) };
}
