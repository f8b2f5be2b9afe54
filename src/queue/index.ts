/**
 * Task Queue Module
 *
 * Single-consumer hand-off queue with acknowledgment-driven backpressure.
 */

export { TaskQueue } from "./TaskQueue";
export type { TaskConsumer, TaskFilter, TaskQueueOptions, TaskQueueStats } from "./TaskQueue";
export { SchedulingPolicy, isSchedulingPolicy, parsePolicy, selectIndex } from "./SchedulingPolicy";
export { Signal } from "./Signal";
export type { SignalListener, Subscription, PublishResult } from "./Signal";
export { spawn, deferToNextTurn } from "./CooperativeTask";
export type { SpawnedTask, SpawnOptions } from "./CooperativeTask";
export { TaskQueueError, TaskCancelledError } from "./errors";
export type { TaskQueueErrorCode } from "./errors";
