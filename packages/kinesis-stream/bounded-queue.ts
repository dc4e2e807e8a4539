import { BufferClosedError } from "./errors";

type Box<T> = { value: T };

type PendingOffer<T> = {
  item: T;
  resolve: () => void;
  reject: (error: unknown) => void;
};

type PendingTake<T> = {
  resolve: (result: IteratorResult<T, undefined>) => void;
  reject: (error: unknown) => void;
};

type QueueState = { type: "open" } | { type: "closed" } | { type: "failed"; error: unknown };

/**
 * Bounded multi-producer / single-consumer FIFO.
 *
 * `offer()` waits while the queue is full, which is what pushes back on
 * producers. Producers blocked at the same time are admitted in arrival
 * order, so each producer's own items keep their relative order.
 */
export class BoundedQueue<T> implements AsyncIterable<T> {
  readonly capacity: number;

  private readonly items: Array<Box<T>> = [];
  private readonly offers: Array<PendingOffer<T>> = [];
  private readonly takes: Array<PendingTake<T>> = [];
  private state: QueueState = { type: "open" };

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`BoundedQueue capacity must be a positive integer (got ${capacity})`);
    }
    this.capacity = capacity;
  }

  /** Items currently stored (excludes producers still waiting). */
  get size(): number {
    return this.items.length;
  }

  /** Producers currently waiting for space. */
  get waitingProducers(): number {
    return this.offers.length;
  }

  get closed(): boolean {
    return this.state.type !== "open";
  }

  /** Enqueue, waiting for space. Rejects with `BufferClosedError` once closed. */
  offer(item: T): Promise<void> {
    if (this.state.type !== "open") {
      return Promise.reject(new BufferClosedError());
    }

    const take = this.takes.shift();
    if (take) {
      take.resolve({ done: false, value: item });
      return Promise.resolve();
    }

    if (this.items.length < this.capacity) {
      this.items.push({ value: item });
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      this.offers.push({ item, resolve, reject });
    });
  }

  /**
   * Dequeue the oldest item, waiting while empty.
   *
   * Once closed, remaining items still drain; after that the result is
   * `done` (or the failure error, if the queue was failed).
   */
  next(): Promise<IteratorResult<T, undefined>> {
    const box = this.items.shift();
    if (box) {
      this.admitWaitingProducer();
      return Promise.resolve({ done: false, value: box.value });
    }

    switch (this.state.type) {
      case "closed":
        return Promise.resolve({ done: true, value: undefined });
      case "failed":
        return Promise.reject(this.state.error);
      case "open":
        return new Promise((resolve, reject) => {
          this.takes.push({ resolve, reject });
        });
    }
  }

  /** Like `next()`, but rejects with `BufferClosedError` instead of returning `done`. */
  async take(): Promise<T> {
    const result = await this.next();
    if (result.done) throw new BufferClosedError();
    return result.value;
  }

  /** Stop accepting items. Waiting producers are rejected; waiting consumers see `done`. */
  close(): void {
    this.finish({ type: "closed" });
  }

  /** Like `close()`, but consumers get `error` once the remaining items drain. */
  fail(error: unknown): void {
    this.finish({ type: "failed", error });
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.next(),
      return: async () => {
        this.close();
        return { done: true, value: undefined };
      },
    };
  }

  private admitWaitingProducer(): void {
    const offer = this.offers.shift();
    if (!offer) return;
    this.items.push({ value: offer.item });
    offer.resolve();
  }

  private finish(next: Exclude<QueueState, { type: "open" }>): void {
    if (this.state.type !== "open") return;
    this.state = next;

    const offers = this.offers.splice(0);
    for (const offer of offers) {
      offer.reject(new BufferClosedError());
    }

    // Takers only wait on an empty queue, so there is nothing left to drain.
    const takes = this.takes.splice(0);
    for (const take of takes) {
      if (next.type === "failed") {
        take.reject(next.error);
      } else {
        take.resolve({ done: true, value: undefined });
      }
    }
  }
}
