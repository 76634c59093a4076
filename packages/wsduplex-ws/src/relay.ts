// Event relay: transport callbacks to the notification channel.

import {
  decodeMessageData,
  describePayload,
  type ChannelSender,
  type CloseEvent,
  type Logger,
  type Message,
  type PendingSenders,
  type WebSocketTransport,
} from "@wsduplex/core";

/**
 * What the relay hands to the stream, in transport event order.
 *
 * A CloseEvent is always followed by ConnectionClosed.
 */
export type Notification =
  | { tag: "Message"; message: Message }
  | { tag: "ErrorEvent" }
  | { tag: "CloseEvent"; event: CloseEvent }
  | { tag: "InvalidPayload"; description: string }
  | { tag: "ConnectionClosed" };

/**
 * Switch the transport to ArrayBuffer binary mode and register the four
 * listeners.
 *
 * Binary mode comes first: Blob payloads can only be read asynchronously,
 * which would let a later event overtake a binary message.
 *
 * Pushes into a channel whose receiver was dropped are ignored.
 */
export function attachRelay(
  transport: WebSocketTransport,
  pending: PendingSenders,
  sender: ChannelSender<Notification>,
  log: Logger,
): void {
  transport.useArrayBuffers();

  transport.onOpen(() => {
    log("open, waking %d pending sender(s)", pending.size);
    pending.wakeAll();
  });

  transport.onMessage((data) => {
    const message = decodeMessageData(data);
    if (message === null) {
      const description = describePayload(data);
      log("message with unexpected payload: %s", description);
      sender.send({ tag: "InvalidPayload", description });
      return;
    }
    sender.send({ tag: "Message", message });
  });

  transport.onError(() => {
    log("error event");
    sender.send({ tag: "ErrorEvent" });
  });

  transport.onClose((event) => {
    log("close code=%d reason=%s clean=%s", event.code, event.reason, event.wasClean);
    sender.send({
      tag: "CloseEvent",
      event: { code: event.code, reason: event.reason, wasClean: event.wasClean },
    });
    sender.send({ tag: "ConnectionClosed" });
    // Senders parked on a connection that never opened now see Closed
    pending.wakeAll();
  });
}
