/**
 * TaskQueue
 *
 * Single-consumer hand-off queue. Producers enqueue opaque tasks; the one bound
 * consumer receives them one at a time and must call acknowledge() before the
 * next task is handed over. That acknowledgment is the backpressure point: a
 * consumer that never acknowledges stalls the queue.
 *
 * Architecture:
 * - Three Signals: task delivery, the acknowledgment gate, queue exhaustion
 * - A drain loop spawned on the inactive → active edge, at most one per queue
 * - Selection by SchedulingPolicy, consulted fresh for every task
 * - An optional filter evaluated lazily, right before a task would be delivered
 *
 * Drain loop:
 *   SELECT → (filter rejects → drop, SELECT)
 *          → DELIVER_WAIT → REMOVE → SELECT
 *          → (empty) exhaustion fires, loop exits
 */

import { Signal, Subscription } from "./Signal";
import { SchedulingPolicy, parsePolicy, selectIndex } from "./SchedulingPolicy";
import { SpawnedTask, spawn, deferToNextTurn } from "./CooperativeTask";
import { TaskQueueError } from "./errors";
import { Logger, createConsoleLogger } from "../logger";

/**
 * Receives each delivered task. Must eventually call acknowledge() on the queue.
 */
export type TaskConsumer<T> = (task: T) => void;

/**
 * Return false to drop a task without delivering it
 */
export type TaskFilter<T> = (task: T) => boolean;

export interface TaskQueueOptions {
  /** Initial scheduling policy (default: FIFO) */
  policy?: SchedulingPolicy;
  /** Logger for warnings and callback failures (default: console at "warn") */
  logger?: Logger;
}

/**
 * Queue statistics
 */
export interface TaskQueueStats {
  /** Whether a drain loop is running */
  isActive: boolean;
  /** Tasks waiting to be delivered, including the one in flight */
  pending: number;
  /** Tasks handed to the consumer */
  delivered: number;
  /** Tasks dropped by the filter */
  filtered: number;
  /** Drain loops started */
  drainCycles: number;
  /** Deliveries where the consumer threw */
  consumerErrors: number;
}

export class TaskQueue<T = unknown> {
  private pending: T[] = [];
  private policy: SchedulingPolicy;
  private filter?: TaskFilter<T>;
  private active: boolean = false;
  private consumerBinding?: Subscription;
  private drainHandle?: SpawnedTask;
  private cancelDelivery?: () => void;
  private destroyed: boolean = false;

  private readonly newTaskSignal = new Signal<T>();
  private readonly handledTaskSignal = new Signal<void>();
  private readonly queueEmptySignal = new Signal<void>();
  private readonly logger: Logger;

  private stats = {
    delivered: 0,
    filtered: 0,
    drainCycles: 0,
    consumerErrors: 0,
  };

  /**
   * @param policyOrOptions - Initial policy, or full options
   */
  constructor(policyOrOptions: SchedulingPolicy | TaskQueueOptions = {}) {
    const options: TaskQueueOptions =
      typeof policyOrOptions === "string" ? { policy: policyOrOptions } : policyOrOptions;

    this.policy = parsePolicy(options.policy ?? SchedulingPolicy.FIFO);
    this.logger = options.logger ?? createConsoleLogger("warn");
  }

  /**
   * Change the scheduling policy. Applies from the next selection onward,
   * including while a drain loop is running.
   */
  setPolicy(policy: SchedulingPolicy): void {
    this.assertUsable();
    this.policy = parsePolicy(policy);
  }

  getPolicy(): SchedulingPolicy {
    this.assertUsable();
    return this.policy;
  }

  /**
   * Bind the consumer that receives tasks. Must be called before addTasks().
   * If a consumer is already bound, this logs a warning and keeps the existing one.
   */
  bindConsumer(consumer: TaskConsumer<T>): void {
    this.assertUsable();

    if (this.consumerBinding) {
      this.logger.warn("[TaskQueue] A consumer is already bound; ignoring bindConsumer()");
      return;
    }
    assertCallable(consumer, "Consumer");

    this.consumerBinding = this.newTaskSignal.subscribe(consumer);
  }

  /**
   * Unbind the consumer. Stops the drain loop, including one waiting for an
   * acknowledgment, and clears every pending task. A late acknowledge() from
   * the old consumer has no effect.
   */
  unbindConsumer(): void {
    this.assertUsable();

    if (!this.consumerBinding) {
      return;
    }

    this.consumerBinding.unsubscribe();
    this.consumerBinding = undefined;
    this.stopDrainLoop("consumer unbound");
    this.pending = [];
  }

  isBound(): boolean {
    this.assertUsable();
    return this.consumerBinding !== undefined;
  }

  /**
   * Attach the filter, replacing any previous one.
   * Tasks already pending are subject to it when they are selected.
   */
  attachFilter(filter: TaskFilter<T>): void {
    this.assertUsable();
    assertCallable(filter, "Filter");
    this.filter = filter;
  }

  detachFilter(): void {
    this.assertUsable();
    this.filter = undefined;
  }

  /**
   * Tell the queue the consumer is done with the current task.
   * Only releases a drain loop that is waiting right now; calls made while
   * nothing is waiting are not remembered.
   */
  acknowledge(): void {
    this.assertUsable();
    this.handledTaskSignal.publish();
  }

  /**
   * Append tasks in the order given and start draining if the queue was idle.
   *
   * @throws TaskQueueError NO_CONSUMER_BOUND when no consumer is bound
   */
  addTasks(...tasks: T[]): void {
    this.assertUsable();

    if (!this.consumerBinding) {
      throw new TaskQueueError(
        "NO_CONSUMER_BOUND",
        "No consumer has been bound to the queue; call bindConsumer() first"
      );
    }

    if (tasks.length === 0) {
      return;
    }

    this.pending.push(...tasks);

    if (!this.active) {
      this.startDrainLoop();
    }
  }

  /**
   * Number of tasks in the queue, including one delivered but not yet acknowledged
   */
  size(): number {
    this.assertUsable();
    return this.pending.length;
  }

  /**
   * Listen for the queue running dry. Fires once per drain cycle.
   */
  onQueueEmpty(listener: () => void): Subscription {
    this.assertUsable();
    assertCallable(listener, "Queue empty listener");
    return this.queueEmptySignal.subscribe(listener);
  }

  isActive(): boolean {
    this.assertUsable();
    return this.active;
  }

  getStats(): TaskQueueStats {
    this.assertUsable();
    return {
      isActive: this.active,
      pending: this.pending.length,
      ...this.stats,
    };
  }

  isDestroyed(): boolean {
    return this.destroyed;
  }

  /**
   * Halt the queue immediately and release everything it holds.
   * An in-flight delivery may never happen. Every other method throws afterwards.
   */
  destroy(): void {
    if (this.destroyed) {
      return;
    }
    this.destroyed = true;

    this.stopDrainLoop("queue destroyed");
    this.consumerBinding?.unsubscribe();
    this.consumerBinding = undefined;
    this.filter = undefined;
    this.pending = [];

    this.newTaskSignal.clear();
    this.handledTaskSignal.clear();
    this.queueEmptySignal.clear();
  }

  private assertUsable(): void {
    if (this.destroyed) {
      throw new TaskQueueError("DESTROYED", "TaskQueue has been destroyed");
    }
  }

  private startDrainLoop(): void {
    this.active = true;
    this.stats.drainCycles++;

    this.drainHandle = spawn((signal) => this.drain(signal), {
      onError: (error) => {
        this.logger.error("[TaskQueue] Drain loop failed:", error);
      },
    });
  }

  private stopDrainLoop(reason: string): void {
    this.cancelDelivery?.();
    this.cancelDelivery = undefined;
    this.drainHandle?.cancel(reason);
    this.drainHandle = undefined;
    this.active = false;
  }

  /**
   * Mark the loop owning `signal` as finished, unless it was already replaced.
   */
  private releaseDrainLoop(signal: AbortSignal): void {
    if (this.drainHandle?.signal === signal) {
      this.drainHandle = undefined;
      this.active = false;
    }
  }

  private async drain(signal: AbortSignal): Promise<void> {
    this.logger.info(
      `[TaskQueue] Drain loop started (pending=${this.pending.length}, policy=${this.policy})`
    );

    // unbindConsumer() and destroy() abort the signal, so this is the only exit check
    while (!signal.aborted) {
      const index = selectIndex(this.pending.length, this.policy);

      if (index === undefined) {
        this.releaseDrainLoop(signal);
        this.logger.info("[TaskQueue] Queue drained");
        this.notifyQueueEmpty();
        return;
      }

      const candidate = this.pending[index];

      const accepted = this.passesFilter(candidate);

      // The filter may have unbound the consumer or destroyed the queue
      if (signal.aborted) {
        return;
      }

      if (!accepted) {
        this.pending.splice(index, 1);
        this.stats.filtered++;
        continue;
      }

      // Arm the acknowledgment waiter before the consumer can see the task
      const acknowledged = this.handledTaskSignal.wait({ signal });
      const cancel = deferToNextTurn(() => {
        if (this.cancelDelivery === cancel) {
          this.cancelDelivery = undefined;
        }
        this.deliver(candidate);
      });
      this.cancelDelivery = cancel;

      await acknowledged;

      // Acknowledged before the consumer ever saw it: retire the task undelivered
      if (this.cancelDelivery === cancel) {
        cancel();
        this.cancelDelivery = undefined;
      }

      // Acknowledged and then unbound within the same turn
      if (signal.aborted) {
        return;
      }

      // Only appends happen while waiting, so the index still points at the candidate
      this.pending.splice(index, 1);
    }
  }

  private passesFilter(task: T): boolean {
    if (!this.filter) {
      return true;
    }

    try {
      return this.filter(task);
    } catch (error) {
      this.logger.error("[TaskQueue] Filter threw; dropping task:", error);
      return false;
    }
  }

  private deliver(task: T): void {
    const result = this.newTaskSignal.publish(task);
    this.stats.delivered += result.handlerCount > 0 ? 1 : 0;

    if (result.errors.length > 0) {
      this.stats.consumerErrors++;
      this.logger.error(
        "[TaskQueue] Consumer threw while handling a task; treating it as acknowledged:",
        result.errors[0]
      );
      // Releases the waiter armed for this task, if the consumer had not already acknowledged
      this.handledTaskSignal.publish();
    }
  }

  private notifyQueueEmpty(): void {
    const result = this.queueEmptySignal.publish();
    for (const error of result.errors) {
      this.logger.error("[TaskQueue] Queue empty listener threw:", error);
    }
  }
}

function assertCallable(value: unknown, label: string): void {
  if (typeof value !== "function") {
    throw new TaskQueueError("INVALID_CALLBACK", `${label} must be a function`);
  }
}
