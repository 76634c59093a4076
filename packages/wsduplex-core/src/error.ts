// Error taxonomy for the WebSocket adapter.

/**
 * Payload of a close event.
 */
export interface CloseEvent {
  /** Close code sent by the server. */
  code: number;
  /** Reason the server closed the connection. */
  reason: string;
  /** Whether the connection was closed cleanly. */
  wasClean: boolean;
}

export type WebSocketErrorKind =
  | "construction"
  | "send"
  | "connection"
  | "closed"
  | "close"
  | "payload"
  | "state"
  | "released";

/** Error raised by the WebSocket adapter or yielded by its stream. */
export class WebSocketError extends Error {
  /** Set for errors of kind "closed". */
  readonly closeEvent: CloseEvent | undefined;

  constructor(
    public kind: WebSocketErrorKind,
    message: string,
    options?: { cause?: unknown; closeEvent?: CloseEvent },
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "WebSocketError";
    this.closeEvent = options?.closeEvent;
  }

  /** The transport refused to open the connection (bad URL, blocked port, bad sub-protocol). */
  static construction(cause: unknown): WebSocketError {
    return new WebSocketError("construction", `failed to open WebSocket: ${describeCause(cause)}`, {
      cause,
    });
  }

  /** The transport rejected a send. */
  static send(cause: unknown): WebSocketError {
    return new WebSocketError("send", `failed to send message: ${describeCause(cause)}`, {
      cause,
    });
  }

  /** An error event was delivered by the transport. */
  static connection(): WebSocketError {
    return new WebSocketError("connection", "WebSocket connection error");
  }

  /** A close event was delivered by the transport. */
  static closed(event: CloseEvent): WebSocketError {
    const reason = event.reason ? `: ${event.reason}` : "";
    return new WebSocketError("closed", `WebSocket closed with code ${event.code}${reason}`, {
      closeEvent: event,
    });
  }

  /** The transport rejected an explicit close (bad code or oversized reason). */
  static close(cause: unknown): WebSocketError {
    return new WebSocketError("close", `failed to close WebSocket: ${describeCause(cause)}`, {
      cause,
    });
  }

  /** A message event carried neither text nor an ArrayBuffer. */
  static payload(description: string): WebSocketError {
    return new WebSocketError("payload", `unexpected message payload: ${description}`);
  }

  /** The transport reported a readyState outside 0..3. */
  static state(readyState: number): WebSocketError {
    return new WebSocketError("state", `unexpected readyState: ${readyState}`);
  }

  /** A handle was used after release(), close() or split(). */
  static released(handle: string): WebSocketError {
    return new WebSocketError("released", `${handle} has been released`);
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
