// Unbounded async channel carrying transport notifications.

/**
 * A multi-producer single-consumer async channel without a capacity limit.
 *
 * Values are received in the order they were sent. Once closed, sends are
 * refused and receivers drain what is buffered before seeing null.
 */
export interface Channel<T> {
  send(value: T): boolean;
  recv(): Promise<T | null>;
  close(): void;
  /** Close and discard anything still buffered. */
  drop(): void;
  isClosed(): boolean;
}

interface ChannelState<T> {
  buffer: T[];
  closed: boolean;
  waiters: Array<(value: T | null) => void>;
}

export function createChannel<T>(): Channel<T> {
  const state: ChannelState<T> = {
    buffer: [],
    closed: false,
    waiters: [],
  };

  function close(): void {
    if (state.closed) return;
    state.closed = true;
    for (const waiter of state.waiters) {
      waiter(null);
    }
    state.waiters.length = 0;
  }

  return {
    send(value: T): boolean {
      if (state.closed) {
        return false;
      }

      // A receiver is parked only while the buffer is empty
      const waiter = state.waiters.shift();
      if (waiter) {
        waiter(value);
        return true;
      }

      state.buffer.push(value);
      return true;
    },

    recv(): Promise<T | null> {
      if (state.buffer.length > 0) {
        const value = state.buffer.shift();
        return Promise.resolve(value === undefined ? null : value);
      }

      if (state.closed) {
        return Promise.resolve(null);
      }

      return new Promise((resolve) => {
        state.waiters.push(resolve);
      });
    },

    close,

    drop(): void {
      state.buffer.length = 0;
      close();
    },

    isClosed(): boolean {
      return state.closed;
    },
  };
}

/**
 * Sending end of a channel.
 */
export class ChannelSender<T> {
  constructor(private channel: Channel<T>) {}

  /** Returns false when the receiving end is gone. */
  send(value: T): boolean {
    return this.channel.send(value);
  }

  close(): void {
    this.channel.close();
  }
}

/**
 * Receiving end of a channel.
 */
export class ChannelReceiver<T> {
  constructor(private channel: Channel<T>) {}

  recv(): Promise<T | null> {
    return this.channel.recv();
  }

  /** Stop receiving. Buffered values are discarded and later sends fail. */
  drop(): void {
    this.channel.drop();
  }

  isClosed(): boolean {
    return this.channel.isClosed();
  }
}

/**
 * Create a sender/receiver pair.
 */
export function createChannelPair<T>(): [ChannelSender<T>, ChannelReceiver<T>] {
  const channel = createChannel<T>();
  return [new ChannelSender(channel), new ChannelReceiver(channel)];
}
