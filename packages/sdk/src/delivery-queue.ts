/**
 * Bounded delivery queue between the receive path and the consumer.
 *
 * Backed by a ring buffer so eviction under overflow is O(1). `push` never
 * blocks; `pop` suspends until a message arrives or the queue closes.
 */

export type DropPolicy = 'oldest' | 'newest';

/**
 * `discard` empties the buffer at once; `drain` keeps buffered messages
 * available to `pop()` and ends the stream after the last one.
 */
export type CloseMode = 'discard' | 'drain';

export interface DeliveryQueueOptions<T extends {}> {
  capacity: number;
  /** Which message to discard when full (default: 'oldest'). */
  dropPolicy?: DropPolicy;
  /** Occupancy ratio at which `onHighWater` fires (default: 0.8). */
  highWaterMark?: number;
  /** Called for every discarded message. */
  onDrop?: (dropped: T, policy: DropPolicy) => void;
  /** Called once each time occupancy reaches the high-water mark. */
  onHighWater?: (size: number, capacity: number) => void;
}

type Waiter<T extends {}> = (result: IteratorResult<T, undefined>) => void;

export class DeliveryQueue<T extends {}> implements AsyncIterable<T> {
  readonly capacity: number;
  readonly dropPolicy: DropPolicy;
  /** Size at which the backpressure warning fires. */
  readonly highWaterSize: number;

  private ring: Array<T | undefined>;
  private head = 0;
  private _size = 0;
  private waiters: Waiter<T>[] = [];
  private _closed = false;
  private aboveHighWater = false;
  private _dropped = 0;

  private readonly onDrop?: (dropped: T, policy: DropPolicy) => void;
  private readonly onHighWater?: (size: number, capacity: number) => void;

  constructor(options: DeliveryQueueOptions<T>) {
    if (!Number.isInteger(options.capacity) || options.capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${options.capacity}`);
    }
    const ratio = options.highWaterMark ?? 0.8;
    if (!(ratio > 0 && ratio <= 1)) {
      throw new RangeError(`High-water mark must be in (0, 1], got ${ratio}`);
    }

    this.capacity = options.capacity;
    this.dropPolicy = options.dropPolicy ?? 'oldest';
    this.highWaterSize = Math.max(1, Math.ceil(options.capacity * ratio));
    this.ring = new Array<T | undefined>(options.capacity);
    this.onDrop = options.onDrop;
    this.onHighWater = options.onHighWater;
  }

  get size(): number {
    return this._size;
  }

  get closed(): boolean {
    return this._closed;
  }

  /** Messages discarded by the drop policy so far. */
  get dropped(): number {
    return this._dropped;
  }

  /**
   * Enqueue a message. Returns false when the message itself was not kept
   * (queue closed, or discarded under the 'newest' policy).
   */
  push(item: T): boolean {
    if (this._closed) return false;

    // Hand straight to a blocked consumer; the buffer is empty in that case.
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ done: false, value: item });
      return true;
    }

    if (this._size === this.capacity) {
      if (this.dropPolicy === 'newest') {
        this.recordDrop(item);
        return false;
      }
      const oldest = this.takeHead();
      if (oldest !== undefined) {
        this.recordDrop(oldest);
      }
    }

    this.ring[(this.head + this._size) % this.capacity] = item;
    this._size++;
    this.checkHighWater();
    return true;
  }

  /** Dequeue without waiting. */
  tryPop(): T | undefined {
    if (this._size === 0) return undefined;
    const item = this.takeHead();
    this.checkHighWater();
    return item;
  }

  /**
   * Resolve with the next message in push order, or `{ done: true }` once the
   * queue has been closed.
   */
  pop(): Promise<IteratorResult<T, undefined>> {
    if (this._size > 0) {
      const item = this.takeHead();
      this.checkHighWater();
      if (item !== undefined) {
        return Promise.resolve({ done: false, value: item });
      }
    }
    if (this._closed) {
      return Promise.resolve({ done: true, value: undefined });
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Close the queue. Further pushes are refused and every waiting consumer
   * resolves with `{ done: true }`. A discarding close also empties a queue
   * that an earlier drain close left with messages.
   */
  close(mode: CloseMode = 'discard'): void {
    if (mode === 'discard') {
      this.ring = new Array<T | undefined>(this.capacity);
      this.head = 0;
      this._size = 0;
      this.aboveHighWater = false;
    }
    if (this._closed) return;
    this._closed = true;

    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter({ done: true, value: undefined });
    }
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    while (true) {
      const next = await this.pop();
      if (next.done) return;
      yield next.value;
    }
  }

  private takeHead(): T | undefined {
    const item = this.ring[this.head];
    this.ring[this.head] = undefined;
    this.head = (this.head + 1) % this.capacity;
    this._size--;
    return item;
  }

  private recordDrop(item: T): void {
    this._dropped++;
    this.onDrop?.(item, this.dropPolicy);
  }

  private checkHighWater(): void {
    if (this._size >= this.highWaterSize) {
      if (!this.aboveHighWater) {
        this.aboveHighWater = true;
        this.onHighWater?.(this._size, this.capacity);
      }
    } else {
      this.aboveHighWater = false;
    }
  }
}
