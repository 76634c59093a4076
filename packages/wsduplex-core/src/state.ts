// Connection state mirrored from the transport's readyState.

import { WebSocketError } from "./error.ts";

/** Connection state. */
export const State = {
  /** The connection is not yet open. */
  Connecting: "connecting",
  /** The connection is open and ready to communicate. */
  Open: "open",
  /** The connection is in the process of closing. */
  Closing: "closing",
  /** The connection is closed or couldn't be opened. */
  Closed: "closed",
} as const;
export type State = (typeof State)[keyof typeof State];

/** readyState values defined by the WebSocket API. */
export const ReadyState = {
  CONNECTING: 0,
  OPEN: 1,
  CLOSING: 2,
  CLOSED: 3,
} as const;

/**
 * Map a transport readyState to a State.
 *
 * @throws WebSocketError of kind "state" for values outside 0..3
 */
export function stateFromReadyState(readyState: number): State {
  switch (readyState) {
    case ReadyState.CONNECTING:
      return State.Connecting;
    case ReadyState.OPEN:
      return State.Open;
    case ReadyState.CLOSING:
      return State.Closing;
    case ReadyState.CLOSED:
      return State.Closed;
    default:
      throw WebSocketError.state(readyState);
  }
}
