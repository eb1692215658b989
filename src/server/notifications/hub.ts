/**
 * In-process 1:N fan-out of notification events, keyed by user.
 *
 * Each subscriber owns a bounded queue. publish() only ever appends to those
 * queues; it never awaits a consumer. When a queue is full the hub either
 * drops the oldest buffered event or disconnects that subscriber.
 */

import type { NotificationEvent } from '../../lib/types/generation';
import { createLogger, type Logger } from '../../lib/logger';

export type OverflowPolicy = 'drop-oldest' | 'disconnect';

export interface HubOptions {
  bufferSize?: number;
  overflow?: OverflowPolicy;
  logger?: Logger;
}

export class BoundedQueue<T> {
  private readonly items: T[] = [];
  private readonly waiters: Array<(result: IteratorResult<T>) => void> = [];
  private closed = false;
  dropped = 0;

  constructor(
    private readonly capacity: number,
    private readonly overflow: OverflowPolicy
  ) {}

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.items.length;
  }

  /** Returns false when the item was not accepted (closed, or disconnected on overflow). */
  push(item: T): boolean {
    if (this.closed) return false;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: item, done: false });
      return true;
    }
    if (this.items.length >= this.capacity) {
      this.dropped += 1;
      if (this.overflow === 'disconnect') {
        this.items.length = 0;
        this.close();
        return false;
      }
      this.items.shift();
    }
    this.items.push(item);
    return true;
  }

  next(): Promise<IteratorResult<T>> {
    const item = this.items.shift();
    if (item !== undefined) return Promise.resolve({ value: item, done: false });
    if (this.closed) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  /** Buffered items are still drained; pending readers see the end immediately. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) waiter({ value: undefined, done: true });
  }
}

export interface UserEventSubscription {
  readonly userId: string;
  readonly stream: AsyncIterableIterator<NotificationEvent>;
  /** Release the subscription. Safe to call more than once. */
  cancel(): void;
  readonly dropped: number;
}

type PublishListener = (userId: string, event: NotificationEvent) => void;

export class NotificationHub {
  private readonly subscribers = new Map<string, Set<BoundedQueue<NotificationEvent>>>();
  private readonly listeners = new Set<PublishListener>();
  private readonly bufferSize: number;
  private readonly overflow: OverflowPolicy;
  private readonly log: Logger;

  constructor(opts: HubOptions = {}) {
    this.bufferSize = Math.max(1, opts.bufferSize ?? 10);
    this.overflow = opts.overflow ?? 'drop-oldest';
    this.log = opts.logger ?? createLogger('notification-hub');
  }

  subscribeUserEvents(userId: string): UserEventSubscription {
    const queue = new BoundedQueue<NotificationEvent>(this.bufferSize, this.overflow);
    let set = this.subscribers.get(userId);
    if (!set) {
      set = new Set();
      this.subscribers.set(userId, set);
    }
    set.add(queue);

    const cancel = () => {
      queue.close();
      this.detach(userId, queue);
    };

    const stream: AsyncIterableIterator<NotificationEvent> = {
      next: () => queue.next(),
      return: async () => {
        cancel();
        return { value: undefined, done: true };
      },
      [Symbol.asyncIterator]() {
        return this;
      },
    };

    return {
      userId,
      stream,
      cancel,
      get dropped() {
        return queue.dropped;
      },
    };
  }

  /**
   * Deliver to local subscribers and to publish listeners (e.g. a cross-process relay).
   * Returns the number of local subscribers that accepted the event.
   */
  publish(userId: string, event: NotificationEvent): number {
    const delivered = this.deliverLocal(userId, event);
    for (const listener of this.listeners) {
      try {
        listener(userId, event);
      } catch (error) {
        this.log.warn('publish listener threw', { userId, error: String(error) });
      }
    }
    return delivered;
  }

  /** Deliver to subscribers on this process only. */
  deliverLocal(userId: string, event: NotificationEvent): number {
    const set = this.subscribers.get(userId);
    if (!set) return 0;
    let delivered = 0;
    for (const queue of [...set]) {
      if (queue.push(event)) {
        delivered += 1;
      } else if (queue.isClosed) {
        this.log.warn('slow subscriber disconnected', { userId, dropped: queue.dropped });
        this.detach(userId, queue);
      }
    }
    return delivered;
  }

  onPublish(listener: PublishListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  subscriberCount(userId?: string): number {
    if (userId) return this.subscribers.get(userId)?.size ?? 0;
    let total = 0;
    for (const set of this.subscribers.values()) total += set.size;
    return total;
  }

  /** End every stream of one user (server-side teardown). */
  closeUser(userId: string): void {
    const set = this.subscribers.get(userId);
    if (!set) return;
    for (const queue of set) queue.close();
    this.subscribers.delete(userId);
  }

  close(): void {
    for (const userId of [...this.subscribers.keys()]) this.closeUser(userId);
    this.listeners.clear();
  }

  private detach(userId: string, queue: BoundedQueue<NotificationEvent>): void {
    const set = this.subscribers.get(userId);
    if (!set) return;
    set.delete(queue);
    if (!set.size) this.subscribers.delete(userId);
  }
}
