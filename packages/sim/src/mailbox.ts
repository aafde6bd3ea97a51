/**
 * FIFO hand-off between two simulation tasks.
 *
 * `put()` suspends while a bounded mailbox is full; `get()` suspends while
 * it is empty. Items come out in the order they went in. One producer and
 * one consumer per mailbox.
 */
export class Mailbox<T> {
  // Boxed so that `T` may itself include undefined.
  private readonly _items: Array<{ item: T }> = [];
  private readonly _getters: Array<(item: T) => void> = [];
  private readonly _putters: Array<{ item: T; resolve: () => void }> = [];
  private readonly _bound: number;

  /** @param bound  Maximum queued items. Default: unbounded. */
  constructor(bound = Infinity) {
    if (!(bound >= 1)) {
      throw new RangeError(`Mailbox bound must be at least 1, got ${bound}`);
    }
    this._bound = bound;
  }

  /** Number of queued items not yet taken. */
  get size(): number {
    return this._items.length;
  }

  /** Enqueue an item, waiting for room if the mailbox is full. */
  put(item: T): Promise<void> {
    const getter = this._getters.shift();
    if (getter) {
      getter(item);
      return Promise.resolve();
    }
    if (this._items.length < this._bound) {
      this._items.push({ item });
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this._putters.push({ item, resolve });
    });
  }

  /** Dequeue the oldest item, waiting for one if the mailbox is empty. */
  get(): Promise<T> {
    const taken = this.tryGet();
    if (taken.ok) {
      return Promise.resolve(taken.item);
    }
    return new Promise<T>((resolve) => {
      this._getters.push(resolve);
    });
  }

  /** Dequeue without waiting. */
  tryGet(): { ok: true; item: T } | { ok: false } {
    const head = this._items.shift();
    if (!head) return { ok: false };
    const putter = this._putters.shift();
    if (putter) {
      this._items.push({ item: putter.item });
      putter.resolve();
    }
    return { ok: true, item: head.item };
  }
}
