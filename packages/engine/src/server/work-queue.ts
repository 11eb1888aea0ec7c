export type TakeResult<T> = { done: false; value: T } | { done: true };

interface QueueNode<T> {
  value: T;
  next: QueueNode<T> | null;
}

/**
 * Unbounded multi-producer/multi-consumer hand-off. Each pushed item is
 * delivered to exactly one taker, oldest first. After `close()`, pushes are
 * refused and takers drain what is left before seeing `done`.
 */
export class WorkQueue<T> {
  private head: QueueNode<T> | null = null;
  private tail: QueueNode<T> | null = null;
  private size = 0;
  private takers: Array<(result: TakeResult<T>) => void> = [];
  private closed = false;

  get length(): number {
    return this.size;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Returns false, leaving the item with the caller, once closed. */
  push(item: T): boolean {
    if (this.closed) {
      return false;
    }

    const taker = this.takers.shift();
    if (taker) {
      taker({ done: false, value: item });
    } else {
      const node: QueueNode<T> = { value: item, next: null };
      if (this.tail) {
        this.tail.next = node;
      } else {
        this.head = node;
      }
      this.tail = node;
      this.size++;
    }
    return true;
  }

  take(): Promise<TakeResult<T>> {
    const node = this.head;
    if (node) {
      this.head = node.next;
      if (!this.head) {
        this.tail = null;
      }
      this.size--;
      const next: TakeResult<T> = { done: false, value: node.value };
      return Promise.resolve(next);
    }

    if (this.closed) {
      const end: TakeResult<T> = { done: true };
      return Promise.resolve(end);
    }

    return new Promise((resolve) => {
      this.takers.push(resolve);
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;

    // Takers only wait while the queue is empty, so none of them is owed an item.
    const takers = this.takers;
    this.takers = [];
    for (const taker of takers) {
      taker({ done: true });
    }
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    while (true) {
      const result = await this.take();
      if (result.done) return;
      yield result.value;
    }
  }
}
