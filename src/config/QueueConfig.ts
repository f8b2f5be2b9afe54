/**
 * QueueConfig
 *
 * Loads task queue settings from an optional YAML file and the environment.
 * Environment variables win over the file; both are validated with zod.
 *
 * File format (snake_case, like the rest of our YAML configs):
 * ```yaml
 * policy: LIFO
 * log_level: info
 * ```
 *
 * Environment:
 * - TASK_QUEUE_POLICY: FIFO | LIFO
 * - TASK_QUEUE_LOG_LEVEL: silent | error | warn | info
 */

import * as fs from "fs";
import { parse as yamlParse } from "yaml";
import { z } from "zod";
import { SchedulingPolicy } from "../queue/SchedulingPolicy";
import { TaskQueue } from "../queue/TaskQueue";
import { LOG_LEVELS, createConsoleLogger } from "../logger";

export const QueueConfigSchema = z.object({
  policy: z.nativeEnum(SchedulingPolicy).default(SchedulingPolicy.FIFO),
  logLevel: z.enum(LOG_LEVELS).default("warn"),
});

export type QueueConfig = z.infer<typeof QueueConfigSchema>;

/**
 * Shape of the YAML file before normalization
 */
const QueueConfigFileSchema = z
  .object({
    policy: z.string().optional(),
    log_level: z.string().optional(),
  })
  .strict();

type QueueConfigFile = z.infer<typeof QueueConfigFileSchema>;

export interface LoadQueueConfigOptions {
  /** YAML file to read; when omitted only the environment is consulted */
  configPath?: string;
  /** Environment to read overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

/**
 * Resolve the effective queue configuration.
 *
 * @throws Error if the file is missing or malformed, or a value is invalid
 */
export function loadQueueConfig(options: LoadQueueConfigOptions = {}): QueueConfig {
  const env = options.env ?? process.env;
  const fileConfig: QueueConfigFile = options.configPath ? readConfigFile(options.configPath) : {};

  const policy = env.TASK_QUEUE_POLICY || fileConfig.policy;
  const logLevel = env.TASK_QUEUE_LOG_LEVEL || fileConfig.log_level;

  const parsed = QueueConfigSchema.safeParse({
    policy: policy?.trim().toUpperCase(),
    logLevel: logLevel?.trim().toLowerCase(),
  });

  if (!parsed.success) {
    throw new Error(`Invalid task queue config: ${formatIssues(parsed.error)}`);
  }

  return parsed.data;
}

/**
 * Build a queue configured from a resolved QueueConfig
 */
export function createTaskQueueFromConfig<T = unknown>(config: QueueConfig): TaskQueue<T> {
  return new TaskQueue<T>({
    policy: config.policy,
    logger: createConsoleLogger(config.logLevel),
  });
}

function readConfigFile(configPath: string): QueueConfigFile {
  if (!fs.existsSync(configPath)) {
    throw new Error(`Task queue config not found: ${configPath}`);
  }

  const content = fs.readFileSync(configPath, "utf-8");

  let raw: unknown;
  try {
    raw = yamlParse(content);
  } catch {
    throw new Error(`Invalid YAML in task queue config: ${configPath}`);
  }

  // An empty file parses to null
  if (raw === null || raw === undefined) {
    return {};
  }

  const parsed = QueueConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid task queue config in ${configPath}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}
