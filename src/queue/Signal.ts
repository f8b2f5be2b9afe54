/**
 * Signal
 *
 * A single-event publish/subscribe primitive. The task queue composes three of
 * these: one delivers tasks to the bound consumer, one is the acknowledgment
 * gate, and one announces that the queue ran dry.
 *
 * Design:
 * - Listeners run synchronously, in registration order
 * - A throwing listener is isolated; its error is reported in the PublishResult
 * - wait() registers its waiter immediately and resolves on the next publish
 *
 * Example usage:
 * ```typescript
 * const signal = new Signal<string>();
 * signal.subscribe((value) => console.log(value));
 * signal.publish("hello");
 * ```
 */

/**
 * Listener function type
 */
export type SignalListener<T> = (value: T) => void;

/**
 * Subscription handle returned from subscribe()
 */
export interface Subscription {
  /** Unique subscription ID */
  id: string;
  /** Remove the listener; calling it twice is harmless */
  unsubscribe: () => void;
  /** Whether the listener is still registered */
  isConnected: () => boolean;
}

/**
 * Result of a publish operation
 */
export interface PublishResult {
  /** Number of listeners that were invoked */
  handlerCount: number;
  /** Number of listeners that returned without throwing */
  successCount: number;
  /** Errors thrown by listeners */
  errors: Error[];
}

/**
 * Internal subscription record
 */
interface SubscriptionRecord<T> {
  id: string;
  listener: SignalListener<T>;
  once: boolean;
  /** Set when the record leaves the list, so an in-progress publish skips it */
  removed: boolean;
}

export class Signal<T = void> {
  private subscriptions: SubscriptionRecord<T>[] = [];

  /** Counter for generating unique subscription IDs */
  private subscriptionCounter: number = 0;

  private generateSubscriptionId(): string {
    return `sub-${(++this.subscriptionCounter).toString(16)}`;
  }

  /**
   * Register a listener.
   *
   * @returns Subscription handle with unsubscribe function
   */
  subscribe(listener: SignalListener<T>): Subscription {
    return this.register(listener, false);
  }

  /**
   * Register a listener that is removed after its first invocation.
   */
  once(listener: SignalListener<T>): Subscription {
    return this.register(listener, true);
  }

  private register(listener: SignalListener<T>, once: boolean): Subscription {
    const id = this.generateSubscriptionId();
    const record: SubscriptionRecord<T> = { id, listener, once, removed: false };
    this.subscriptions.push(record);

    return {
      id,
      unsubscribe: () => {
        this.unsubscribe(id);
      },
      isConnected: () => !record.removed,
    };
  }

  /**
   * Remove a listener by subscription ID.
   *
   * @returns true if the subscription was found and removed
   */
  unsubscribe(subscriptionId: string): boolean {
    const index = this.subscriptions.findIndex((s) => s.id === subscriptionId);
    if (index === -1) {
      return false;
    }

    this.subscriptions[index].removed = true;
    this.subscriptions.splice(index, 1);
    return true;
  }

  /**
   * Fire the signal. Listeners registered while publishing are not invoked
   * until the next publish.
   */
  publish(value: T): PublishResult {
    const snapshot = [...this.subscriptions];
    const errors: Error[] = [];
    let successCount = 0;

    let consumedOnce = false;

    for (const sub of snapshot) {
      // Removed by an earlier listener, or already consumed by a re-entrant publish
      if (sub.removed) {
        continue;
      }
      if (sub.once) {
        sub.removed = true;
        consumedOnce = true;
      }
      try {
        sub.listener(value);
        successCount++;
      } catch (e) {
        errors.push(e instanceof Error ? e : new Error(String(e)));
      }
    }

    if (consumedOnce) {
      this.subscriptions = this.subscriptions.filter((s) => !s.removed);
    }

    return {
      handlerCount: successCount + errors.length,
      successCount,
      errors,
    };
  }

  /**
   * Wait for the next publish.
   * The waiter is registered before this method returns.
   *
   * @param options.signal - Aborting it removes the waiter and rejects with the abort reason
   * @returns Promise that resolves with the published value
   */
  wait(options: { signal?: AbortSignal } = {}): Promise<T> {
    const { signal } = options;

    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(signal.reason);
        return;
      }

      const onAbort = () => {
        subscription.unsubscribe();
        reject(signal?.reason);
      };

      const subscription = this.once((value) => {
        signal?.removeEventListener("abort", onAbort);
        resolve(value);
      });

      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  getSubscriberCount(): number {
    return this.subscriptions.filter((s) => !s.removed).length;
  }

  hasSubscribers(): boolean {
    return this.getSubscriberCount() > 0;
  }

  /**
   * Remove all listeners and pending waiters.
   * Pending wait() promises never settle afterwards.
   */
  clear(): void {
    for (const sub of this.subscriptions) {
      sub.removed = true;
    }
    this.subscriptions = [];
  }
}
