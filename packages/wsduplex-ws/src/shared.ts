// State shared by the handles of one connection.

import {
  NO_STATUS_CODE,
  ReadyState,
  State,
  WebSocketError,
  stateFromReadyState,
  type ChannelReceiver,
  type Logger,
  type Message,
  type PendingSenders,
  type WebSocketTransport,
} from "@wsduplex/core";
import type { Notification } from "./relay.ts";

/** One item of the inbound stream. */
export type StreamItem = { ok: true; value: Message } | { ok: false; error: WebSocketError };

/**
 * The transport, its parked senders and the receiving end of its
 * notification channel, shared by every handle of one connection.
 *
 * Handles acquire and release it; releasing the last one closes the
 * transport unless it is already closed or was closed explicitly.
 */
export class SharedSocket {
  private handles = 0;
  private closeRequested = false;
  private terminated = false;
  private released = false;

  constructor(
    private transport: WebSocketTransport,
    private pending: PendingSenders,
    private receiver: ChannelReceiver<Notification>,
    private log: Logger,
  ) {}

  state(): State {
    return stateFromReadyState(this.transport.readyState);
  }

  extensions(): string {
    return this.transport.extensions;
  }

  protocol(): string {
    return this.transport.protocol;
  }

  /**
   * Resolves once the connection has left the Connecting state.
   *
   * While Connecting, the caller is parked and re-checked when the relay
   * sees an open or close event. Rejects once the last handle is released.
   */
  ready(): Promise<void> {
    return new Promise((resolve, reject) => {
      const poll = (): void => {
        if (this.released) {
          reject(WebSocketError.released("connection"));
          return;
        }
        let state: State;
        try {
          state = this.state();
        } catch (e) {
          reject(e);
          return;
        }
        if (state === State.Connecting) {
          this.pending.register(poll);
          return;
        }
        resolve();
      };
      poll();
    });
  }

  /**
   * Hand a message to the transport.
   *
   * @throws WebSocketError of kind "send" when the transport refuses it
   */
  startSend(message: Message): void {
    try {
      this.transport.send(message.value);
    } catch (e) {
      throw WebSocketError.send(e);
    }
  }

  /**
   * Receive the next stream item, or null once the connection is closed.
   */
  async next(): Promise<StreamItem | null> {
    if (this.terminated) {
      return null;
    }

    const notification = await this.receiver.recv();
    if (notification === null) {
      this.terminated = true;
      return null;
    }

    switch (notification.tag) {
      case "Message":
        return { ok: true, value: notification.message };
      case "ErrorEvent":
        return { ok: false, error: WebSocketError.connection() };
      case "CloseEvent":
        return { ok: false, error: WebSocketError.closed(notification.event) };
      case "InvalidPayload":
        return { ok: false, error: WebSocketError.payload(notification.description) };
      case "ConnectionClosed":
        this.terminated = true;
        this.receiver.drop();
        return null;
    }
  }

  /**
   * Close the connection explicitly.
   *
   * A reason without a code is sent with the "no status" code 1005.
   *
   * @throws WebSocketError of kind "close" when the transport rejects the code or reason
   */
  close(code?: number, reason?: string): void {
    try {
      if (code === undefined && reason === undefined) {
        this.transport.close();
      } else if (reason === undefined) {
        this.transport.close(code);
      } else {
        this.transport.close(code ?? NO_STATUS_CODE, reason);
      }
    } catch (e) {
      throw WebSocketError.close(e);
    }
    this.closeRequested = true;
    this.log("closed explicitly code=%s", code ?? "none");
  }

  acquire(): void {
    this.handles++;
  }

  release(): void {
    this.handles--;
    if (this.handles > 0) {
      return;
    }

    this.released = true;
    this.receiver.drop();
    // Parked senders see the released flag and reject
    this.pending.wakeAll();

    if (this.closeRequested || this.transport.readyState === ReadyState.CLOSED) {
      return;
    }
    this.log("last handle released, closing");
    this.transport.close();
  }
}

/**
 * Base class for handles onto a SharedSocket.
 *
 * A handle holds one reference from construction until release().
 */
export abstract class SocketHandle {
  private released = false;

  protected constructor(
    private shared: SharedSocket,
    private handleName: string,
  ) {
    shared.acquire();
  }

  /** The shared socket. Throws once this handle is released. */
  protected get socket(): SharedSocket {
    this.assertLive();
    return this.shared;
  }

  protected assertLive(): void {
    if (this.released) {
      throw WebSocketError.released(this.handleName);
    }
  }

  /** Whether release() (or a consuming call) has happened. */
  get isReleased(): boolean {
    return this.released;
  }

  /**
   * Give up this handle.
   *
   * Releasing the last handle of a connection closes it, unless it is
   * already closed or was closed explicitly. Calling this twice is a no-op.
   */
  release(): void {
    if (this.released) return;
    this.released = true;
    this.shared.release();
  }
}
