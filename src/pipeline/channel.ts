export class ChannelClosedError extends Error {
  constructor() {
    super("Send on closed channel");
    this.name = "ChannelClosedError";
  }
}

interface PendingSend<T> {
  value: T;
  resolve: () => void;
}

type Receiver<T> = (result: IteratorResult<T, undefined>) => void;

/**
 * Single-producer/single-consumer handoff between two pipeline stages.
 *
 * With capacity 0 a send resolves only once the consumer has taken the
 * value; with capacity n up to n values are buffered before `send` waits.
 * After `close()` every value already sent still drains in order, then
 * receivers see `done`.
 */
export class Channel<T> implements AsyncIterable<T> {
  private buffer: T[] = [];
  private pendingSends: PendingSend<T>[] = [];
  private receivers: Receiver<T>[] = [];
  private closed = false;

  constructor(private readonly capacity = 0) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new RangeError(`Channel capacity must be >= 0, got ${capacity}`);
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  send(value: T): Promise<void> {
    if (this.closed) {
      return Promise.reject(new ChannelClosedError());
    }

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver({ value, done: false });
      return Promise.resolve();
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push(value);
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      this.pendingSends.push({ value, resolve });
    });
  }

  receive(): Promise<IteratorResult<T, undefined>> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1);
      this.admitPendingSend();
      return Promise.resolve({ value, done: false });
    }

    const pending = this.pendingSends.shift();
    if (pending) {
      pending.resolve();
      return Promise.resolve({ value: pending.value, done: false });
    }

    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise((resolve) => {
      this.receivers.push(resolve);
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const receiver of this.receivers.splice(0)) {
      receiver({ value: undefined, done: true });
    }
  }

  /** Receives and discards values until the channel is closed and empty. */
  async drain(): Promise<number> {
    let dropped = 0;
    for await (const _ of this) dropped++;
    return dropped;
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    while (true) {
      const result = await this.receive();
      if (result.done) return;
      yield result.value;
    }
  }

  private admitPendingSend(): void {
    const pending = this.pendingSends.shift();
    if (pending) {
      this.buffer.push(pending.value);
      pending.resolve();
    }
  }
}
