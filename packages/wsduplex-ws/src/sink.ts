// Outbound half: a send gate over the transport.

import type { Message } from "@wsduplex/core";
import { SocketHandle, type SharedSocket } from "./shared.ts";

/** Accepts messages for transmission. */
export interface MessageSink {
  /**
   * Resolves once a send may be attempted.
   *
   * Pending only while the connection is Connecting. Resolving does not
   * mean the send will succeed: Closing and Closed are "ready" too, and the
   * transport rejects the frame.
   */
  ready(): Promise<void>;

  /**
   * Hand a message to the transport synchronously.
   *
   * @throws WebSocketError of kind "send" when the transport refuses it
   */
  startSend(message: Message): void;

  /** Resolves immediately: the transport has no separate flush. */
  flush(): Promise<void>;

  /** Resolves immediately. Ending the sink does not close the connection. */
  end(): Promise<void>;

  /** Wait for ready(), then startSend(). */
  send(message: Message): Promise<void>;
}

/**
 * Outbound half of a split WsDuplex.
 */
export class WsSink extends SocketHandle implements MessageSink {
  constructor(shared: SharedSocket) {
    super(shared, "WsSink");
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
}
