// src/channel.ts

type BlockedSend<T> = { value: T; resume: () => void };

/**
 * Bounded FIFO between async producers and consumers.
 *
 * `send` resolves once the value is buffered or handed to a waiting
 * receiver, and waits while the buffer is full. `receive` waits while it is
 * empty. Every value goes to exactly one receiver, in send order.
 */
export class Channel<T> {
  private readonly buffer: T[] = [];
  private readonly receivers: Array<(value: T) => void> = [];
  private readonly blocked: BlockedSend<T>[] = [];

  constructor(readonly capacity: number = Infinity) {
    if (!(capacity >= 1)) {
      throw new Error(`channel capacity must be at least 1, got ${capacity}`);
    }
  }

  get size(): number {
    return this.buffer.length;
  }

  send(value: T): Promise<void> {
    const receiver = this.receivers.shift();
    if (receiver) {
      receiver(value);
      return Promise.resolve();
    }
    if (this.buffer.length < this.capacity) {
      this.buffer.push(value);
      return Promise.resolve();
    }
    return new Promise((resume) => this.blocked.push({ value, resume }));
  }

  receive(): Promise<T> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1);
      // a slot just opened: admit the oldest blocked sender
      const next = this.blocked.shift();
      if (next) {
        this.buffer.push(next.value);
        next.resume();
      }
      return Promise.resolve(value);
    }
    return new Promise((resolve) => this.receivers.push(resolve));
  }
}
