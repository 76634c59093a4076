// Inbound half: notifications as a terminating sequence of items.

import { SocketHandle, type SharedSocket, type StreamItem } from "./shared.ts";

/** Yields received messages until the connection closes. */
export interface MessageStream extends AsyncIterable<StreamItem> {
  /**
   * Receive the next item.
   *
   * - `{ ok: true, value }` for a message
   * - `{ ok: false, error }` for an error event, an undecodable payload, or
   *   the close event (kind "closed", carrying code, reason and wasClean)
   * - `null` once the connection is closed; every later call returns null
   *
   * When a close event occurred, its item always comes before the null.
   */
  next(): Promise<StreamItem | null>;
}

/**
 * Inbound half of a split WsDuplex.
 */
export class WsStream extends SocketHandle implements MessageStream {
  constructor(shared: SharedSocket) {
    super(shared, "WsStream");
  }

  next(): Promise<StreamItem | null> {
    return this.socket.next();
  }

  /**
   * Iterate over all items until the connection closes.
   */
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
