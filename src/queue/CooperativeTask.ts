/**
 * CooperativeTask
 *
 * Minimal cooperative task primitives on top of the Node event loop:
 * spawn a cancellable async unit of work, and defer a call to the next turn.
 *
 * Cancellation follows the AbortController convention. A spawned function is
 * handed an AbortSignal; cancel() aborts it with a TaskCancelledError, and any
 * wait that honours the signal unwinds the function with that error.
 */

import { TaskCancelledError } from "./errors";

/**
 * Handle for a spawned unit of work
 */
export interface SpawnedTask {
  /** Aborted when the task is cancelled */
  readonly signal: AbortSignal;
  /** Settles when the function returns, fails or unwinds after cancellation. Never rejects. */
  readonly done: Promise<void>;
  /** Request cancellation; no-op if already cancelled */
  cancel: (reason?: string) => void;
  isCancelled: () => boolean;
}

export interface SpawnOptions {
  /** Receives failures other than cancellation */
  onError?: (error: Error) => void;
}

/**
 * Start `fn` as an independent unit of work.
 *
 * The function begins once the caller's synchronous code has unwound, so the
 * handle is always in the caller's hands before the first line of `fn` runs.
 * A task cancelled before that point never starts.
 */
export function spawn(
  fn: (signal: AbortSignal) => Promise<void>,
  options: SpawnOptions = {}
): SpawnedTask {
  const controller = new AbortController();

  const run = async (): Promise<void> => {
    await Promise.resolve();
    if (controller.signal.aborted) {
      return;
    }
    await fn(controller.signal);
  };

  const done = run().catch((error: unknown) => {
    if (error instanceof TaskCancelledError) {
      return;
    }
    options.onError?.(error instanceof Error ? error : new Error(String(error)));
  });

  return {
    signal: controller.signal,
    done,
    cancel: (reason?: string) => {
      if (!controller.signal.aborted) {
        controller.abort(new TaskCancelledError(reason));
      }
    },
    isCancelled: () => controller.signal.aborted,
  };
}

/**
 * Run `fn` after the current turn of the event loop completes.
 *
 * @returns Function that cancels the call if it has not run yet
 */
export function deferToNextTurn(fn: () => void): () => void {
  const handle = setImmediate(fn);
  return () => {
    clearImmediate(handle);
  };
}
