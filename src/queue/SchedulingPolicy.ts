/**
 * SchedulingPolicy Enum
 *
 * The ordering rule the drain loop uses to pick the next pending task.
 * The policy can change at any time; only the next selection sees it.
 *
 *   pending: [A, B, C]
 *   FIFO → A (oldest)
 *   LIFO → C (newest)
 */

import { TaskQueueError } from "./errors";

export enum SchedulingPolicy {
  /**
   * First in, first out. Default for new queues.
   */
  FIFO = "FIFO",

  /**
   * Last in, first out.
   */
  LIFO = "LIFO",
}

/**
 * Check if a value is one of the known policies
 */
export function isSchedulingPolicy(value: unknown): value is SchedulingPolicy {
  return value === SchedulingPolicy.FIFO || value === SchedulingPolicy.LIFO;
}

/**
 * Narrow an untrusted value to a policy, throwing INVALID_POLICY otherwise
 */
export function parsePolicy(value: unknown): SchedulingPolicy {
  if (!isSchedulingPolicy(value)) {
    throw new TaskQueueError(
      "INVALID_POLICY",
      `Unexpected scheduling policy: ${String(value)} (expected FIFO or LIFO)`
    );
  }
  return value;
}

/**
 * Index of the next task to select from a pending sequence of the given length.
 *
 * @returns undefined when nothing is pending
 */
export function selectIndex(pendingLength: number, policy: SchedulingPolicy): number | undefined {
  if (pendingLength <= 0) {
    return undefined;
  }

  switch (policy) {
    case SchedulingPolicy.FIFO:
      return 0;
    case SchedulingPolicy.LIFO:
      return pendingLength - 1;
    default:
      return undefined;
  }
}
