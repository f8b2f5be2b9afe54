/**
 * Test helpers for driving a TaskQueue step by step.
 */

import { TaskQueue } from "./TaskQueue";
import { Logger } from "../logger";

/**
 * Let the event loop run `turns` full turns so deferred deliveries can happen.
 */
export async function settle(turns: number = 3): Promise<void> {
  for (let i = 0; i < turns; i++) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}

/**
 * Consumer that records deliveries and lets a test await them one at a time.
 */
export function createRecordingConsumer<T>() {
  const received: T[] = [];
  const buffered: T[] = [];
  const waiters: Array<(task: T) => void> = [];

  return {
    received,
    consumer: (task: T): void => {
      received.push(task);
      const waiter = waiters.shift();
      if (waiter) {
        waiter(task);
      } else {
        buffered.push(task);
      }
    },
    /** Resolves with the next delivered task not yet taken */
    next: (): Promise<T> => {
      if (buffered.length > 0) {
        const [task] = buffered.splice(0, 1);
        return Promise.resolve(task);
      }
      return new Promise<T>((resolve) => waiters.push(resolve));
    },
  };
}

/**
 * Bind a consumer that acknowledges every task as soon as it arrives.
 */
export function bindAutoAck<T>(queue: TaskQueue<T>): T[] {
  const received: T[] = [];
  queue.bindConsumer((task) => {
    received.push(task);
    queue.acknowledge();
  });
  return received;
}

/**
 * Resolves the next time the queue runs dry.
 */
export function nextEmpty<T>(queue: TaskQueue<T>): Promise<void> {
  return new Promise<void>((resolve) => {
    const subscription = queue.onQueueEmpty(() => {
      subscription.unsubscribe();
      resolve();
    });
  });
}

/**
 * Logger that keeps every line for assertions
 */
export function createMemoryLogger() {
  const lines: { level: "info" | "warn" | "error"; message: string; args: unknown[] }[] = [];
  const logger: Logger = {
    info: (message, ...args) => lines.push({ level: "info", message, args }),
    warn: (message, ...args) => lines.push({ level: "warn", message, args }),
    error: (message, ...args) => lines.push({ level: "error", message, args }),
  };
  return { logger, lines };
}
