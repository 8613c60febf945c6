/**
 * Counting semaphore that bounds how many judge calls are in flight.
 * Waiters are served first-in, first-out.
 */
export class Semaphore {
  private slots: number;
  private readonly queue: Array<() => void> = [];

  constructor(limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new Error(`Semaphore limit must be a positive integer, got ${limit}`);
    }
    this.slots = limit;
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    if (this.slots > 0) {
      this.slots--;
    } else {
      await new Promise<void>(resolve => this.queue.push(resolve));
    }
    try {
      return await task();
    } finally {
      // Hand the slot straight to the next waiter, if any
      const next = this.queue.shift();
      if (next) next();
      else this.slots++;
    }
  }
}
