// @wsduplex/ws - WebSocket as an awaitable sink and stream.
//
// Each WebSocket frame is one message; binary frames are read as ArrayBuffer.

export { WsDuplex } from "./duplex.ts";
export { WsSink, type MessageSink } from "./sink.ts";
export { WsStream, type MessageStream } from "./stream.ts";
export { type StreamItem } from "./shared.ts";
export { type OpenOptions } from "./options.ts";
export { NodeWebSocketTransport } from "./node.ts";

// Re-export message and error types from core for convenience
export {
  type Message,
  type CloseEvent,
  type WebSocketTransport,
  type TransportFactory,
  messageText,
  messageBytes,
  State,
  WebSocketError,
} from "@wsduplex/core";
