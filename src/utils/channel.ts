interface PendingSend<T> {
  value: T;
  resolve: (accepted: boolean) => void;
}

/**
 * Bounded single-consumer channel.
 *
 * `send` resolves `true` once the value is buffered, waits while the buffer
 * is full and resolves `false` once the channel is closed. Iterating drains
 * buffered values and ends after `close()`.
 */
export class Channel<T> implements AsyncIterable<T> {
  private readonly buffer: Array<{ value: T }> = [];
  private readonly pendingSends: Array<PendingSend<T>> = [];
  private receiver: ((result: IteratorResult<T>) => void) | null = null;
  private closed = false;

  public constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
    }
  }

  public get isClosed(): boolean {
    return this.closed;
  }

  public get size(): number {
    return this.buffer.length;
  }

  public send(value: T): Promise<boolean> {
    if (this.closed) {
      return Promise.resolve(false);
    }

    if (this.receiver) {
      const deliver = this.receiver;
      this.receiver = null;
      deliver({ value, done: false });
      return Promise.resolve(true);
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push({ value });
      return Promise.resolve(true);
    }

    return new Promise<boolean>((resolve) => {
      this.pendingSends.push({ value, resolve });
    });
  }

  public close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    for (const pending of this.pendingSends.splice(0)) {
      pending.resolve(false);
    }

    if (this.receiver) {
      const deliver = this.receiver;
      this.receiver = null;
      deliver({ value: undefined, done: true });
    }
  }

  public receive(): Promise<IteratorResult<T>> {
    const next = this.buffer.shift();
    if (next) {
      this.admitPendingSend();
      return Promise.resolve({ value: next.value, done: false });
    }

    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise<IteratorResult<T>>((resolve) => {
      this.receiver = resolve;
    });
  }

  public [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.receive(),
      return: async () => {
        this.close();
        return { value: undefined, done: true };
      },
    };
  }

  private admitPendingSend(): void {
    const pending = this.pendingSends.shift();
    if (!pending) {
      return;
    }
    this.buffer.push({ value: pending.value });
    pending.resolve(true);
  }
}
