// @wsduplex/core - transport contract and shared primitives for wsduplex.

export {
  type Message,
  type MessageText,
  type MessageBytes,
  messageText,
  messageBytes,
  decodeMessageData,
  describePayload,
} from "./message.ts";
export { State, ReadyState, stateFromReadyState } from "./state.ts";
export { WebSocketError, type WebSocketErrorKind, type CloseEvent } from "./error.ts";
export {
  createChannel,
  createChannelPair,
  ChannelSender,
  ChannelReceiver,
  type Channel,
} from "./channel.ts";
export { PendingSenders, type Waker } from "./pending.ts";
export { type WebSocketTransport, type TransportFactory, NO_STATUS_CODE } from "./transport.ts";
export { createLogger, ROOT_NAMESPACE, type Logger } from "./logging.ts";
