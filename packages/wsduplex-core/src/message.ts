// WebSocket message payloads.
//
// The adapter treats payloads as opaque: a text frame becomes a Text
// message, a binary frame becomes a Bytes message.

/**
 * Text message variant.
 */
export interface MessageText {
  tag: "Text";
  value: string;
}

/**
 * Binary message variant.
 */
export interface MessageBytes {
  tag: "Bytes";
  value: Uint8Array;
}

/**
 * A message sent or received over a WebSocket.
 */
export type Message = MessageText | MessageBytes;

export function messageText(value: string): MessageText {
  return { tag: "Text", value };
}

export function messageBytes(value: Uint8Array): MessageBytes {
  return { tag: "Bytes", value };
}

/**
 * Decode the `data` of a message event.
 *
 * The transport must be in ArrayBuffer binary mode, so binary frames arrive
 * as an `ArrayBuffer` and text frames as a `string`. Returns null for any
 * other shape.
 */
export function decodeMessageData(data: unknown): Message | null {
  if (data instanceof ArrayBuffer) {
    return messageBytes(new Uint8Array(data));
  }
  if (typeof data === "string") {
    return messageText(data);
  }
  return null;
}

/** Short description of a payload, for error messages and logs. */
export function describePayload(data: unknown): string {
  if (data === null) return "null";
  if (typeof data !== "object") return typeof data;
  return data.constructor?.name ?? "object";
}
