import { AppConfigSchema } from './ConfigSchema';
import { AppConfig } from '../../domain/config/AppConfig';
import { ConfigurationError } from '../../domain/errors/OrchestratorErrors';
import * as dotenv from 'dotenv';

// Load env vars
dotenv.config();

type Env = Record<string, string | undefined>;

function readInt(env: Env, key: string): number | undefined {
  const raw = env[key];
  return raw ? parseInt(raw, 10) : undefined;
}

function readList(env: Env, key: string): string[] | undefined {
  const raw = env[key];
  return raw
    ? raw
        .split(',')
        .map(item => item.trim())
        .filter(Boolean)
    : undefined;
}

export class ConfigFactory {
  /**
   * Build and validate configuration from environment variables.
   */
  static load(env: Env = process.env): AppConfig {
    const rawConfig = {
      pool: {
        capacity: readInt(env, 'POOL_CAPACITY'),
        acquireTimeoutMs: readInt(env, 'ACQUIRE_TIMEOUT_MS'),
        creationRetries: readInt(env, 'CONTEXT_CREATION_RETRIES'),
        maxJobsPerContext: readInt(env, 'MAX_JOBS_PER_CONTEXT'),
        idleTimeoutMs: readInt(env, 'CONTEXT_IDLE_TIMEOUT_MS'),
        terminateTimeoutMs: readInt(env, 'CONTEXT_TERMINATE_TIMEOUT_MS'),
      },
      scheduler: {
        defaultJobTimeoutMs: readInt(env, 'DEFAULT_JOB_TIMEOUT_MS'),
        maxQueueDepth: readInt(env, 'MAX_QUEUE_DEPTH'),
        shutdownGraceMs: readInt(env, 'SHUTDOWN_GRACE_MS'),
      },
      health: {
        checkIntervalMs: readInt(env, 'HEALTH_CHECK_INTERVAL_MS'),
        failureThreshold: readInt(env, 'FAILURE_THRESHOLD'),
        failureWindowMs: readInt(env, 'FAILURE_WINDOW_MS'),
        resetTimeoutMs: readInt(env, 'CIRCUIT_RESET_TIMEOUT_MS'),
        successThreshold: readInt(env, 'CIRCUIT_SUCCESS_THRESHOLD'),
        degradedCapacity: readInt(env, 'DEGRADED_CAPACITY'),
      },
      browser: {
        headless: env.HEADLESS !== 'false',
        width: readInt(env, 'VIEWPORT_WIDTH'),
        height: readInt(env, 'VIEWPORT_HEIGHT'),
        executablePath: env.CHROMIUM_PATH || undefined,
        actionTimeoutMs: readInt(env, 'ACTION_TIMEOUT_MS'),
        launchArgs: readList(env, 'BROWSER_LAUNCH_ARGS'),
      },
      logging: {
        level: env.LOG_LEVEL?.toLowerCase(),
        json: env.LOG_JSON === 'true',
      },
    };

    // Parse and validate
    const result = AppConfigSchema.safeParse(rawConfig);

    if (!result.success) {
      const issues = result.error.issues
        .map(issue => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new ConfigurationError(issues);
    }

    return result.data;
  }
}
