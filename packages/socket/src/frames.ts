import type { ReadinessSource } from "@hookloop/shared";

/**
 * One protocol frame as read off the connection.
 * `text` frames are the data frames; the rest are control frames.
 */
export type Frame =
  | { opcode: "text"; data: string }
  | { opcode: "binary"; data: Buffer }
  | { opcode: "ping"; data: Buffer }
  | { opcode: "pong"; data: Buffer }
  | { opcode: "close"; code: number; reason: string };

export type Opcode = Frame["opcode"];

/**
 * Non-blocking frame source.
 *
 * `recvFrame` either returns a buffered frame or throws:
 * - `WouldBlockError` when nothing is buffered yet
 * - `ConnectionClosedError` once the connection is closed and drained
 * - `SocketError` on a transport failure
 */
export interface FrameReader extends ReadinessSource {
  recvFrame(): Frame;
  /** `recvFrame` would return a frame or a terminal error right now. */
  readonly readable: boolean;
}
