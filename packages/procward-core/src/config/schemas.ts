/**
 * Configuration schemas with Zod validation
 */

import { z } from 'zod';

const INFINITE_TIMEOUT = -1;

export const WatchdogConfigSchema = z.object({
  // -1 never times out but keeps the process killable on demand
  timeoutMs: z.union([z.number().int().positive(), z.literal(INFINITE_TIMEOUT)]),
});

export const StreamsConfigSchema = z.object({
  stopTimeoutMs: z.number().int().nonnegative().default(0),
});

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default('info'),
  logDir: z.string().optional(),
});

export const ExecutorConfigSchema = z.object({
  workingDirectory: z.string().min(1).default('.'),
  // [] defers to the launcher's convention, null accepts every exit value
  exitValues: z.array(z.number().int()).nullable().default([]),
  watchdog: WatchdogConfigSchema.optional(),
  destroyOnShutdown: z.boolean().default(true),
  streams: StreamsConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type LogLevel = z.infer<typeof LogLevelSchema>;
export type ExecutorConfig = z.infer<typeof ExecutorConfigSchema>;

/**
 * Loosely typed config as read from files, env vars or overrides
 */
export type ExecutorConfigInput = z.input<typeof ExecutorConfigSchema>;
