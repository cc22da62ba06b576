/**
 * @hookloop/socket - Persistent WebSocket sessions driven by host readiness
 *
 * The read loop never waits for data: each readiness notification drains
 * what is buffered and hands control back to the host.
 */

export type { Frame, Opcode, FrameReader } from "./frames.js";
export { WsFrameReader } from "./ws-frame-reader.js";
export type { WebSocketEvents } from "./ws-frame-reader.js";
export { SocketSession } from "./session.js";
export type { SocketSessionOptions, SessionState, FrameWriter } from "./session.js";
export {
  connectWebSocket,
  buildClientOptions,
  createProxyAgent,
  proxyUrl,
} from "./connection.js";
export type { ConnectOptions, WebSocketConnection } from "./connection.js";
export { openWebSocketSession } from "./open-session.js";
export type { SessionHandlers } from "./open-session.js";
