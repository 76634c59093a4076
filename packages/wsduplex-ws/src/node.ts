// Transport binding over the `ws` client (Node.js).

import WebSocket, { type ClientOptions } from "ws";
import { createLogger, type CloseEvent, type WebSocketTransport } from "@wsduplex/core";

const log = createLogger("transport");

/**
 * WebSocketTransport backed by a `ws` client socket.
 *
 * The constructor throws synchronously for an invalid URL or an invalid
 * sub-protocol list, before any listener exists.
 */
export class NodeWebSocketTransport implements WebSocketTransport {
  private socket: WebSocket;

  constructor(url: string, protocols?: string | string[], options?: ClientOptions) {
    this.socket = new WebSocket(url, protocols, options);
    log("connecting to %s", url);
  }

  get readyState(): number {
    return this.socket.readyState;
  }

  get protocol(): string {
    return this.socket.protocol;
  }

  get extensions(): string {
    return this.socket.extensions;
  }

  useArrayBuffers(): void {
    this.socket.binaryType = "arraybuffer";
  }

  onOpen(listener: () => void): void {
    this.socket.onopen = () => listener();
  }

  onMessage(listener: (data: unknown) => void): void {
    this.socket.onmessage = (event) => listener(event.data);
  }

  onError(listener: () => void): void {
    this.socket.onerror = (event) => {
      log("socket error: %s", event.message);
      listener();
    };
  }

  onClose(listener: (event: CloseEvent) => void): void {
    this.socket.onclose = (event) =>
      listener({ code: event.code, reason: event.reason, wasClean: event.wasClean });
  }

  /**
   * Send a frame.
   *
   * `ws` silently discards frames sent after the closing handshake started,
   * so any state other than OPEN is refused here.
   */
  send(data: string | Uint8Array): void {
    if (this.socket.readyState !== WebSocket.OPEN) {
      throw new Error(`WebSocket is not open: readyState ${this.socket.readyState}`);
    }
    this.socket.send(data);
  }

  close(code?: number, reason?: string): void {
    this.socket.close(code, reason);
  }
}
