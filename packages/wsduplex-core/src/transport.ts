/**
 * Transport contract.
 *
 * The adapter consumes a callback-based WebSocket through this interface.
 * The real socket, its handshake and its event loop live behind it.
 *
 * Implementations:
 * - NodeWebSocketTransport (wsduplex-ws) over the `ws` client
 * - MockTransport (wsduplex-ws tests)
 */

import type { CloseEvent } from "./error.ts";

/**
 * A single duplex WebSocket connection.
 */
export interface WebSocketTransport {
  /** Live readyState: 0 connecting, 1 open, 2 closing, 3 closed. */
  readonly readyState: number;

  /** Negotiated sub-protocol, empty until open. */
  readonly protocol: string;

  /** Negotiated extensions, empty until open. */
  readonly extensions: string;

  /**
   * Deliver binary payloads as ArrayBuffer.
   *
   * Must be called before any listener is registered.
   */
  useArrayBuffers(): void;

  onOpen(listener: () => void): void;
  onMessage(listener: (data: unknown) => void): void;
  onError(listener: () => void): void;
  onClose(listener: (event: CloseEvent) => void): void;

  /**
   * Send a text or binary frame.
   *
   * Throws if the transport refuses the frame.
   */
  send(data: string | Uint8Array): void;

  /**
   * Start the closing handshake.
   *
   * Throws for a code outside the permitted range or an oversized reason.
   */
  close(code?: number, reason?: string): void;
}

/**
 * Builds a transport for a URL. Throws synchronously when the URL or the
 * sub-protocols are rejected.
 */
export type TransportFactory = (url: string, protocols?: string | string[]) => WebSocketTransport;

/**
 * Close code reported when no status code was present.
 *
 * Used when a close reason is given without a code.
 */
export const NO_STATUS_CODE = 1005;
