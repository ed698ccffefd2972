import { z } from 'zod';
import { MAX_TIMER_DELAY_MS } from '../../domain/shared/Timers';

/** Delays handed to timers */
const delayMs = () => z.number().int().max(MAX_TIMER_DELAY_MS);

export const PoolSchema = z.object({
  capacity: z.number().int().positive().default(4),
  acquireTimeoutMs: delayMs().nonnegative().default(30000),
  creationRetries: z.number().int().nonnegative().default(2),
  maxJobsPerContext: z.number().int().nonnegative().default(0),
  idleTimeoutMs: z.number().int().nonnegative().default(300000),
  terminateTimeoutMs: delayMs().positive().default(5000),
});

export const SchedulerSchema = z.object({
  defaultJobTimeoutMs: delayMs().positive().default(30000),
  maxQueueDepth: z.number().int().positive().default(100),
  shutdownGraceMs: delayMs().nonnegative().default(30000),
});

export const HealthSchema = z.object({
  checkIntervalMs: delayMs().positive().default(5000),
  failureThreshold: z.number().int().positive().default(5),
  failureWindowMs: z.number().int().positive().default(60000),
  resetTimeoutMs: z.number().int().positive().default(30000),
  successThreshold: z.number().int().positive().default(2),
  // Zero would leave a half-open circuit with nothing to prove recovery on
  degradedCapacity: z.number().int().positive().default(1),
});

export const BrowserSchema = z.object({
  headless: z.boolean().default(true),
  width: z.number().int().positive().default(1280),
  height: z.number().int().positive().default(720),
  executablePath: z.string().min(1).optional(),
  actionTimeoutMs: delayMs().positive().default(15000),
  launchArgs: z.array(z.string()).default([]),
});

export const LoggingSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  json: z.boolean().default(false),
});

export const AppConfigSchema = z.object({
  pool: PoolSchema.default({}),
  scheduler: SchedulerSchema.default({}),
  health: HealthSchema.default({}),
  browser: BrowserSchema.default({}),
  logging: LoggingSchema.default({}),
});
