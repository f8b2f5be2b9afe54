/**
 * Errors raised by the task queue.
 *
 * Every TaskQueueError is thrown synchronously from the call that caused it;
 * none of them cross the drain loop's suspension points. Binding a second
 * consumer is not an error: it is logged and ignored.
 */

export type TaskQueueErrorCode =
  | "INVALID_POLICY"
  | "NO_CONSUMER_BOUND"
  | "INVALID_CALLBACK"
  | "DESTROYED";

export class TaskQueueError extends Error {
  readonly code: TaskQueueErrorCode;

  constructor(code: TaskQueueErrorCode, message: string) {
    super(message);
    this.name = "TaskQueueError";
    this.code = code;
  }
}

/**
 * Raised inside a spawned task when its handle is cancelled.
 * Used to unwind a drain loop that is parked on a wait.
 */
export class TaskCancelledError extends Error {
  constructor(reason?: string) {
    super(reason ? `Task cancelled: ${reason}` : "Task cancelled");
    this.name = "TaskCancelledError";
  }
}
