/**
 * Synchronous many-senders/one-receiver queue.
 *
 * Messages are delivered in send order. Receiving never blocks: a drain
 * returns what is queued at that moment.
 */

interface ChannelState<T> {
  queue: T[];
  receiverClosed: boolean;
}

export class Sender<T> {
  constructor(private readonly state: ChannelState<T>) {}

  /**
   * Queue `value` for the receiver.
   * @returns false when the receiver is closed and the value was dropped
   */
  send(value: T): boolean {
    if (this.state.receiverClosed) return false;
    this.state.queue.push(value);
    return true;
  }

  clone(): Sender<T> {
    return new Sender(this.state);
  }
}

export class Receiver<T> {
  constructor(private readonly state: ChannelState<T>) {}

  /** Take the oldest queued message, if any */
  tryRecv(): T | undefined {
    this.ensureOpen();
    return this.state.queue.shift();
  }

  /** Take every message queued so far, oldest first */
  tryDrain(): T[] {
    this.ensureOpen();
    return this.state.queue.splice(0, this.state.queue.length);
  }

  get pending(): number {
    return this.state.queue.length;
  }

  /** Stop receiving; later sends are dropped */
  close(): void {
    this.state.receiverClosed = true;
    this.state.queue.length = 0;
  }

  get closed(): boolean {
    return this.state.receiverClosed;
  }

  private ensureOpen(): void {
    if (this.state.receiverClosed) {
      throw new Error("Channel receiver is closed");
    }
  }
}

export function createChannel<T>(): [Sender<T>, Receiver<T>] {
  const state: ChannelState<T> = { queue: [], receiverClosed: false };
  return [new Sender(state), new Receiver(state)];
}
