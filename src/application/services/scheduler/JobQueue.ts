/**
 * Anything the queue can hold.
 */
export interface QueuedItem {
  readonly id: string;
}

/**
 * Bounded FIFO queue of pending jobs.
 * Items leave exactly once: dequeued for dispatch, removed on cancel, or drained at shutdown.
 */
export class JobQueue<T extends QueuedItem> {
  private items: T[] = [];
  private waiters: Array<() => void> = [];
  private spaceWaiters: Array<() => void> = [];

  constructor(private readonly maxDepth: number) {}

  /**
   * Append an item. Returns false when the queue is full or already holds the id.
   */
  enqueue(item: T): boolean {
    if (this.isFull() || this.has(item.id)) {
      return false;
    }
    this.items.push(item);
    this.notify();
    return true;
  }

  /**
   * Take the earliest item.
   */
  dequeue(): T | null {
    const item = this.items.shift() ?? null;
    if (item) {
      this.notifySpace();
    }
    return item;
  }

  peek(): T | null {
    return this.items[0] ?? null;
  }

  /**
   * Remove a specific item (e.g. on cancellation).
   */
  remove(id: string): T | null {
    const index = this.items.findIndex(item => item.id === id);
    if (index === -1) {
      return null;
    }
    const [removed] = this.items.splice(index, 1);
    this.notifySpace();
    return removed;
  }

  has(id: string): boolean {
    return this.items.some(item => item.id === id);
  }

  /**
   * Remove and return everything still queued.
   */
  drain(): T[] {
    const drained = this.items;
    this.items = [];
    this.notifySpace();
    return drained;
  }

  /**
   * Resolves once the queue is non-empty, or when the signal aborts.
   */
  waitForItem(signal?: AbortSignal): Promise<void> {
    if (this.items.length > 0 || signal?.aborted) {
      return Promise.resolve();
    }
    return new Promise(resolve => {
      const wake = (): void => {
        signal?.removeEventListener('abort', wake);
        this.waiters = this.waiters.filter(w => w !== wake);
        resolve();
      };
      this.waiters.push(wake);
      signal?.addEventListener('abort', wake, { once: true });
    });
  }

  /**
   * Resolves once the queue has room for another item.
   */
  waitForSpace(): Promise<void> {
    if (!this.isFull()) {
      return Promise.resolve();
    }
    return new Promise(resolve => {
      this.spaceWaiters.push(resolve);
    });
  }

  size(): number {
    return this.items.length;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  isFull(): boolean {
    return this.items.length >= this.maxDepth;
  }

  /**
   * Ids in dispatch order.
   */
  ids(): string[] {
    return this.items.map(item => item.id);
  }

  private notifySpace(): void {
    if (this.isFull()) {
      return;
    }
    const waiters = this.spaceWaiters;
    this.spaceWaiters = [];
    for (const wake of waiters) {
      wake();
    }
  }

  private notify(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const wake of waiters) {
      wake();
    }
  }
}
