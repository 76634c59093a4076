// Senders parked until the connection leaves the Connecting state.

/** Callback that re-checks readiness for one parked sender. */
export type Waker = () => void;

/**
 * Wakers of senders waiting for the connection to open.
 *
 * Every parked sender is woken, in registration order. A woken sender
 * re-checks the live state and parks again if it is still Connecting.
 */
export class PendingSenders {
  private wakers: Waker[] = [];

  register(waker: Waker): void {
    this.wakers.push(waker);
  }

  /** Wake and forget every parked sender. */
  wakeAll(): void {
    const wakers = this.wakers;
    this.wakers = [];
    for (const wake of wakers) {
      wake();
    }
  }

  /** Forget every parked sender without waking it. */
  clear(): void {
    this.wakers = [];
  }

  get size(): number {
    return this.wakers.length;
  }
}
