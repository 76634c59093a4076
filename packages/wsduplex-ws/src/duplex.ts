// WsDuplex: a callback-based WebSocket as an awaitable sink and stream.

import {
  PendingSenders,
  WebSocketError,
  createChannelPair,
  createLogger,
  type Message,
  type State,
  type WebSocketTransport,
} from "@wsduplex/core";
import { resolveOptions, type OpenOptions } from "./options.ts";
import { attachRelay, type Notification } from "./relay.ts";
import { SharedSocket, SocketHandle, type StreamItem } from "./shared.ts";
import { WsSink, type MessageSink } from "./sink.ts";
import { WsStream, type MessageStream } from "./stream.ts";

/**
 * A WebSocket connection exposed as a message sink and a message stream.
 *
 * Transport events are relayed, in order, into a channel that the stream
 * drains. Sends wait only while the connection is still Connecting.
 *
 * Releasing the last handle (this one, or both halves after split()) closes
 * the connection unless it is already closed or close() succeeded.
 *
 * @example
 * ```typescript
 * const ws = WsDuplex.open("ws://localhost:9000/echo");
 * const [sink, stream] = ws.split();
 *
 * await sink.send(messageText("hello"));
 * for await (const item of stream) {
 *   if (!item.ok) break;
 *   console.log(item.value);
 * }
 * sink.release();
 * stream.release();
 * ```
 */
export class WsDuplex extends SocketHandle implements MessageSink, MessageStream {
  private constructor(shared: SharedSocket) {
    super(shared, "WsDuplex");
  }

  /**
   * Establish a WebSocket connection.
   *
   * @throws WebSocketError of kind "construction" if the URL is invalid or
   * the port is blocked. No listener is registered in that case.
   */
  static open(url: string, options: OpenOptions = {}): WsDuplex {
    return WsDuplex.setup(url, undefined, options);
  }

  /**
   * Establish a WebSocket connection requesting one sub-protocol.
   *
   * @throws WebSocketError of kind "construction" if the URL is invalid,
   * the port is blocked or the protocol is not supported.
   */
  static openWithProtocol(url: string, protocol: string, options: OpenOptions = {}): WsDuplex {
    return WsDuplex.setup(url, protocol, options);
  }

  /**
   * Establish a WebSocket connection offering several sub-protocols.
   *
   * @throws WebSocketError of kind "construction" if the URL is invalid,
   * the port is blocked or a protocol is not supported.
   */
  static openWithProtocols(
    url: string,
    protocols: readonly string[],
    options: OpenOptions = {},
  ): WsDuplex {
    return WsDuplex.setup(url, [...protocols], options);
  }

  private static setup(
    url: string,
    protocols: string | string[] | undefined,
    options: OpenOptions,
  ): WsDuplex {
    const config = resolveOptions(options);
    const log = createLogger(config.logScope);

    let transport: WebSocketTransport;
    try {
      transport = config.createTransport(url, protocols);
    } catch (e) {
      log("open %s failed: %O", url, e);
      throw WebSocketError.construction(e);
    }

    const pending = new PendingSenders();
    const [sender, receiver] = createChannelPair<Notification>();
    attachRelay(transport, pending, sender, createLogger("relay"));

    log("opened %s", url);
    return new WsDuplex(new SharedSocket(transport, pending, receiver, log));
  }

  /** The current state of the connection, read live from the transport. */
  state(): State {
    return this.socket.state();
  }

  /** The extensions in use. */
  extensions(): string {
    return this.socket.extensions();
  }

  /** The sub-protocol in use. */
  protocol(): string {
    return this.socket.protocol();
  }

  /**
   * Close the connection and release this handle.
   *
   * - no arguments: close without a code
   * - code: close with that code
   * - code and reason: close with both
   * - reason only: close with code 1005 and the reason
   *
   * The handle is released even when the transport rejects the close; the
   * connection is then closed without a code.
   *
   * @throws WebSocketError of kind "close" for a code outside the permitted
   * range or a reason longer than 123 bytes
   */
  close(code?: number, reason?: string): void {
    const socket = this.socket;
    try {
      socket.close(code, reason);
    } finally {
      this.release();
    }
  }

  /**
   * Separate into an outbound and an inbound handle.
   *
   * This handle is released; each half holds its own reference, so the
   * connection stays open until both are released.
   */
  split(): [WsSink, WsStream] {
    const socket = this.socket;
    const halves: [WsSink, WsStream] = [new WsSink(socket), new WsStream(socket)];
    this.release();
    return halves;
  }

  ready(): Promise<void> {
    return this.socket.ready();
  }

  startSend(message: Message): void {
    this.socket.startSend(message);
  }

  async flush(): Promise<void> {
    this.assertLive();
  }

  async end(): Promise<void> {
    this.assertLive();
  }

  async send(message: Message): Promise<void> {
    const socket = this.socket;
    await socket.ready();
    socket.startSend(message);
  }

  next(): Promise<StreamItem | null> {
    return this.socket.next();
  }

  async *[Symbol.asyncIterator](): AsyncIterator<StreamItem> {
    while (true) {
      const item = await this.next();
      if (item === null) {
        return;
      }
      yield item;
    }
  }
}
