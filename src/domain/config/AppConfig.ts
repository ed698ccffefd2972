/**
 * Domain Configuration Interfaces
 */

export interface PoolSettings {
  capacity: number;
  acquireTimeoutMs: number;
  creationRetries: number;
  /** 0 = unlimited */
  maxJobsPerContext: number;
  /** 0 = never close idle contexts */
  idleTimeoutMs: number;
  terminateTimeoutMs: number;
}

export interface SchedulerSettings {
  defaultJobTimeoutMs: number;
  maxQueueDepth: number;
  shutdownGraceMs: number;
}

export interface HealthSettings {
  checkIntervalMs: number;
  failureThreshold: number;
  failureWindowMs: number;
  resetTimeoutMs: number;
  successThreshold: number;
  degradedCapacity: number;
}

export interface BrowserSettings {
  headless: boolean;
  width: number;
  height: number;
  executablePath?: string;
  actionTimeoutMs: number;
  launchArgs: string[];
}

export interface LoggingSettings {
  level: 'debug' | 'info' | 'warn' | 'error';
  json: boolean;
}

export interface AppConfig {
  pool: PoolSettings;
  scheduler: SchedulerSettings;
  health: HealthSettings;
  browser: BrowserSettings;
  logging: LoggingSettings;
}
