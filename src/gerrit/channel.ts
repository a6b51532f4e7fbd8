export class ChannelClosedError extends Error {
  constructor(message = "channel closed") {
    super(message);
    this.name = "ChannelClosedError";
  }
}

interface PendingSend<T> {
  item: T;
  resolve: () => void;
  reject: (err: Error) => void;
}

type Receiver<T> = (result: IteratorResult<T, undefined>) => void;

/**
 * Bounded hand-off queue between one producer loop and its consumer.
 *
 * `send` resolves once the item is buffered or handed to a waiting receiver;
 * with the buffer full it waits, which is what throttles the producer.
 * Blocked senders are served in call order.
 */
export class Channel<T> implements AsyncIterable<T> {
  private buffer: T[] = [];
  private senders: PendingSend<T>[] = [];
  private receivers: Receiver<T>[] = [];
  private closed = false;

  constructor(private readonly capacity: number = 1) {
    if (capacity < 1) throw new Error("channel capacity must be at least 1");
  }

  get isClosed(): boolean {
    return this.closed;
  }

  send(item: T): Promise<void> {
    if (this.closed) return Promise.reject(new ChannelClosedError());

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver({ done: false, value: item });
      return Promise.resolve();
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push(item);
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      this.senders.push({ item, resolve, reject });
    });
  }

  receive(): Promise<IteratorResult<T, undefined>> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1);
      this.admitSender();
      return Promise.resolve({ done: false, value });
    }

    if (this.closed) return Promise.resolve({ done: true, value: undefined });

    return new Promise((resolve) => {
      this.receivers.push(resolve);
    });
  }

  /**
   * Stops the channel. Waiting receivers see end-of-stream, blocked senders
   * fail with ChannelClosedError. Items already buffered stay receivable.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const receiver of this.receivers.splice(0)) {
      receiver({ done: true, value: undefined });
    }
    for (const sender of this.senders.splice(0)) {
      sender.reject(new ChannelClosedError());
    }
  }

  /** Removes and returns every buffered item. */
  drain(): T[] {
    return this.buffer.splice(0);
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    while (true) {
      const result = await this.receive();
      if (result.done) return;
      yield result.value;
    }
  }

  private admitSender() {
    const sender = this.senders.shift();
    if (!sender) return;
    this.buffer.push(sender.item);
    sender.resolve();
  }
}
