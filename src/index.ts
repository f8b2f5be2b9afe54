/**
 * Hand-off task queue
 *
 * Public entry point: the queue, its primitives, configuration and logging.
 */

export * from "./queue";
export { loadQueueConfig, createTaskQueueFromConfig, QueueConfigSchema } from "./config/QueueConfig";
export type { QueueConfig, LoadQueueConfigOptions } from "./config/QueueConfig";
export { createConsoleLogger, isLogLevel, LOG_LEVELS } from "./logger";
export type { Logger, LogLevel, LogSink } from "./logger";
