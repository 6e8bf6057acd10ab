/** Database channel the play_events trigger notifies on. */
export const PLAY_EVENTS_CHANNEL = "play_events";

/**
 * Raw committed-row notifications as delivered by the store. Iteration ends
 * after `close()`, and throws once the underlying channel has failed.
 */
export type NotificationStream = AsyncIterable<unknown> & {
  close(): Promise<void>;
};

export type NotificationSource = {
  listen(): Promise<NotificationStream>;
};

type Waiter = {
  resolve: (result: IteratorResult<unknown>) => void;
  reject: (error: unknown) => void;
};

/**
 * Turns callback-style channel deliveries into a NotificationStream.
 * Payloads pushed before a failure are still handed out before the failure.
 */
export class NotificationQueue
  implements NotificationStream, AsyncIterableIterator<unknown>
{
  private readonly buffered: unknown[] = [];
  private readonly waiting: Waiter[] = [];
  private failure: unknown = null;
  private failed = false;
  private ended = false;
  private closing: Promise<void> | null = null;

  constructor(private readonly onClose?: () => void | Promise<void>) {}

  push(payload: unknown) {
    if (this.ended || this.failed) {
      return;
    }

    const waiter = this.waiting.shift();
    if (waiter) {
      waiter.resolve({ value: payload, done: false });
      return;
    }

    this.buffered.push(payload);
  }

  fail(error: unknown) {
    if (this.ended || this.failed) {
      return;
    }

    this.failed = true;
    this.failure = error;
    for (const waiter of this.waiting.splice(0)) {
      waiter.reject(error);
    }
  }

  next(): Promise<IteratorResult<unknown>> {
    if (this.buffered.length > 0) {
      return Promise.resolve({ value: this.buffered.shift(), done: false });
    }

    if (this.ended) {
      return Promise.resolve({ value: undefined, done: true });
    }

    if (this.failed) {
      return Promise.reject(this.failure);
    }

    return new Promise((resolve, reject) => {
      this.waiting.push({ resolve, reject });
    });
  }

  async return(): Promise<IteratorResult<unknown>> {
    await this.close();
    return { value: undefined, done: true };
  }

  [Symbol.asyncIterator]() {
    return this;
  }

  close() {
    if (!this.closing) {
      this.ended = true;
      this.buffered.length = 0;
      for (const waiter of this.waiting.splice(0)) {
        waiter.resolve({ value: undefined, done: true });
      }
      this.closing = Promise.resolve(this.onClose?.());
    }

    return this.closing;
  }
}
