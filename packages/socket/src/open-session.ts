import type { Scheduler } from "@hookloop/kernel";
import { connectWebSocket, type ConnectOptions } from "./connection.js";
import { SocketSession, type SocketSessionOptions } from "./session.js";

export type SessionHandlers = Pick<SocketSessionOptions, "onMessage" | "onDisconnect" | "now">;

/**
 * Connect to `url` and start reading: the returned session is already
 * registered with the host's readiness hook.
 */
export async function openWebSocketSession(
  scheduler: Scheduler,
  url: string,
  options: ConnectOptions,
  handlers: SessionHandlers,
): Promise<SocketSession> {
  const { socket, reader } = await connectWebSocket(url, options);
  const session = new SocketSession({ scheduler, reader, writer: socket, ...handlers });
  session.open();
  session.drain();
  return session;
}
