/**
 * WebSocket connection setup
 *
 * Resolves proxy and TLS settings into `ws` client options and opens the
 * connection. Node sockets never block the event loop, so the read loop can
 * start as soon as the connection is open.
 */

import * as fs from "node:fs";
import type { Agent } from "node:http";
import WebSocket from "ws";
import { HttpsProxyAgent } from "https-proxy-agent";
import { SocksProxyAgent } from "socks-proxy-agent";
import { SocketError } from "@hookloop/shared";
import { Logger, type ProxyConfig } from "@hookloop/kernel";
import { WsFrameReader } from "./ws-frame-reader.js";

const log = Logger.for("SocketConnection");

export interface ConnectOptions {
  /** Handshake timeout in milliseconds (0 = none). */
  timeoutMs: number;
  proxy?: ProxyConfig;
  /** PEM bundle of trusted CAs. Node's default store is used when absent. */
  caFile?: string;
}

/**
 * Proxy URL in the form the agents take, credentials URL-encoded.
 */
export function proxyUrl(proxy: ProxyConfig): string {
  const auth =
    proxy.username !== undefined
      ? `${encodeURIComponent(proxy.username)}${
          proxy.password !== undefined ? `:${encodeURIComponent(proxy.password)}` : ""
        }@`
      : "";
  return `${proxy.type}://${auth}${proxy.host}:${proxy.port}`;
}

export function createProxyAgent(proxy: ProxyConfig, timeoutMs: number): Agent {
  const url = proxyUrl(proxy);
  if (proxy.type === "http") {
    return new HttpsProxyAgent(url, timeoutMs > 0 ? { timeout: timeoutMs } : {});
  }
  return new SocksProxyAgent(url, timeoutMs > 0 ? { timeout: timeoutMs } : {});
}

export function buildClientOptions(options: ConnectOptions): WebSocket.ClientOptions {
  const clientOptions: WebSocket.ClientOptions = {};
  if (options.timeoutMs > 0) {
    clientOptions.handshakeTimeout = options.timeoutMs;
  }
  if (options.caFile) {
    clientOptions.ca = fs.readFileSync(options.caFile);
  }
  if (options.proxy) {
    clientOptions.agent = createProxyAgent(options.proxy, options.timeoutMs);
  }
  return clientOptions;
}

export interface WebSocketConnection {
  socket: WebSocket;
  /** Attached before the handshake, so nothing sent right after it is lost. */
  reader: WsFrameReader;
}

/**
 * Open a WebSocket and resolve once the handshake completes.
 *
 * @throws SocketError when the handshake fails or times out
 */
export function connectWebSocket(url: string, options: ConnectOptions): Promise<WebSocketConnection> {
  const clientOptions = buildClientOptions(options);
  log.debug(
    { url, proxy: options.proxy ? `${options.proxy.type}://${options.proxy.host}` : undefined },
    "connecting",
  );

  return new Promise((resolve, reject) => {
    const socket = new WebSocket(url, clientOptions);
    const reader = new WsFrameReader(socket);

    const onOpen = (): void => {
      socket.off("error", onError);
      resolve({ socket, reader });
    };
    const onError = (error: Error): void => {
      socket.off("open", onOpen);
      reject(new SocketError(`Cannot connect to ${url}: ${error.message}`, error));
    };

    socket.once("open", onOpen);
    socket.once("error", onError);
  });
}
