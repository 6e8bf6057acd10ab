export const DEFAULT_HUB_CAPACITY = 10;

export type HubSubscription<T> = AsyncIterable<T> & {
  /** Next unread message, or null once the subscription is closed. */
  next(): Promise<T | null>;
  close(): void;
  readonly closed: boolean;
  /** Messages discarded because this subscriber fell behind. */
  readonly dropped: number;
};

class Subscriber<T extends object> implements HubSubscription<T> {
  private readonly backlog: T[] = [];
  private readonly waiting: Array<(message: T | null) => void> = [];
  private droppedCount = 0;
  private isClosed = false;

  constructor(
    private readonly capacity: number,
    private readonly onClose: (subscriber: Subscriber<T>) => void,
  ) {}

  get closed() {
    return this.isClosed;
  }

  get dropped() {
    return this.droppedCount;
  }

  deliver(message: T) {
    if (this.isClosed) {
      return;
    }

    const waiter = this.waiting.shift();
    if (waiter) {
      waiter(message);
      return;
    }

    this.backlog.push(message);
    if (this.backlog.length > this.capacity) {
      this.backlog.shift();
      this.droppedCount += 1;
    }
  }

  next(): Promise<T | null> {
    if (this.isClosed) {
      return Promise.resolve(null);
    }

    const message = this.backlog.shift();
    if (message !== undefined) {
      return Promise.resolve(message);
    }

    return new Promise((resolve) => {
      this.waiting.push(resolve);
    });
  }

  close() {
    if (this.isClosed) {
      return;
    }

    this.isClosed = true;
    this.backlog.length = 0;
    for (const waiter of this.waiting.splice(0)) {
      waiter(null);
    }
    this.onClose(this);
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    while (true) {
      const message = await this.next();
      if (message === null) {
        return;
      }
      yield message;
    }
  }
}

/**
 * In-process fan-out. Every subscription keeps its own bounded backlog;
 * publishing never waits on readers, and a reader that falls behind loses its
 * oldest unread messages without affecting anyone else.
 */
export class EventHub<T extends object> {
  private readonly subscribers = new Set<Subscriber<T>>();

  constructor(private readonly capacity: number = DEFAULT_HUB_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError("Event hub capacity must be a positive integer.");
    }
  }

  get subscriberCount() {
    return this.subscribers.size;
  }

  subscribe(): HubSubscription<T> {
    const subscriber = new Subscriber<T>(this.capacity, (closed) => {
      this.subscribers.delete(closed);
    });
    this.subscribers.add(subscriber);
    return subscriber;
  }

  /** Returns how many subscribers the message was handed to. */
  publish(message: T): number {
    let delivered = 0;
    for (const subscriber of [...this.subscribers]) {
      subscriber.deliver(message);
      delivered += 1;
    }

    return delivered;
  }

  close() {
    for (const subscriber of [...this.subscribers]) {
      subscriber.close();
    }
  }
}
