/**
 * Paces the supervisor between passes. Implementations block (sleep or wait
 * for a change notification) and never busy-poll.
 */
export interface Waiter {
  /** Resolves when it is time for the next pass; rejects when the signal aborts */
  wait(signal?: AbortSignal): Promise<void>;

  /** Tell the waiter that the last pass changed something */
  acted(): void;
}
