/**
 * Unbounded FIFO mailbox with a single consumer.
 *
 * `send` never blocks. `receive` resolves with the oldest queued message, or with the next one
 * sent when the queue is empty. Only one receive may be outstanding at a time.
 */
export class ControlChannel<T extends object> {
  private readonly queue: T[] = [];
  private receiver: ((message: T) => void) | undefined;

  get pending(): number {
    return this.queue.length;
  }

  send(message: T): void {
    const receiver = this.receiver;
    if (receiver) {
      this.receiver = undefined;
      receiver(message);
      return;
    }
    this.queue.push(message);
  }

  receive(): Promise<T> {
    if (this.receiver) {
      throw new Error('ControlChannel already has a pending receive.');
    }

    const queued = this.queue.shift();
    if (queued !== undefined) {
      return Promise.resolve(queued);
    }

    return new Promise<T>((resolve) => {
      this.receiver = resolve;
    });
  }
}
