interface PendingSend<T> {
  item: T;
  resolve: (accepted: boolean) => void;
}

/**
 * Single-producer, single-consumer async queue with a fixed buffer.
 *
 * `send` resolves once the item is buffered or handed to a waiting receiver;
 * while the buffer is full it stays pending, so a slow consumer stalls its
 * producer instead of losing messages. It resolves `false` when the consumer
 * has cancelled the channel.
 */
export class BoundedChannel<T> implements AsyncIterable<T> {
  private readonly buffer: { item: T }[] = [];
  private readonly receivers: ((result: IteratorResult<T>) => void)[] = [];
  private readonly blockedSenders: PendingSend<T>[] = [];
  private closed = false;
  private cancelled = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Channel capacity must be a positive integer, got ${capacity}`);
    }
  }

  /** Buffered messages, not counting senders blocked on a full buffer. */
  get buffered(): number {
    return this.buffer.length;
  }

  get waitingSenders(): number {
    return this.blockedSenders.length;
  }

  send(item: T): Promise<boolean> {
    if (this.closed || this.cancelled) {
      return Promise.resolve(false);
    }

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver({ value: item, done: false });
      return Promise.resolve(true);
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push({ item });
      return Promise.resolve(true);
    }

    return new Promise<boolean>((resolve) => {
      this.blockedSenders.push({ item, resolve });
    });
  }

  receive(): Promise<IteratorResult<T>> {
    const next = this.buffer.shift();
    if (next) {
      this.admitBlockedSender();
      return Promise.resolve({ value: next.item, done: false });
    }

    if (this.closed || this.cancelled) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise<IteratorResult<T>>((resolve) => {
      this.receivers.push(resolve);
    });
  }

  /** Producer is finished. Buffered messages still drain. */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    if (this.buffer.length === 0) {
      this.releaseReceivers();
    }
  }

  /** Consumer is gone. Drops buffered messages and unblocks the producer. */
  cancel(): void {
    if (this.cancelled) {
      return;
    }
    this.cancelled = true;
    this.buffer.length = 0;
    for (const sender of this.blockedSenders.splice(0)) {
      sender.resolve(false);
    }
    this.releaseReceivers();
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.receive(),
    };
  }

  private admitBlockedSender(): void {
    const sender = this.blockedSenders.shift();
    if (!sender) {
      return;
    }
    this.buffer.push({ item: sender.item });
    sender.resolve(true);
  }

  private releaseReceivers(): void {
    for (const receiver of this.receivers.splice(0)) {
      receiver({ value: undefined, done: true });
    }
  }
}
