import { EventBus } from '../../../domain/events/DomainEvent';
import {
  ContextCreationFailedEvent,
  ContextReleasedEvent,
  ContextUnhealthyEvent,
} from '../../../domain/events/OrchestratorEvents';
import { describeError } from '../../../domain/errors/OrchestratorErrors';
import { PoolMaintenance } from '../pool/ContextPool';
import { CapacityCircuitBreaker, CircuitState } from './CapacityCircuitBreaker';
import { Logger, getLogger } from '../../../infrastructure/logging';

export interface HealthMonitorConfig {
  /** Interval between periodic checks (default: 5000) */
  checkIntervalMs: number;
  /** Close ready contexts idle this long; 0 disables (default: 300000) */
  idleTimeoutMs: number;
}

export const DEFAULT_HEALTH_MONITOR_CONFIG: HealthMonitorConfig = {
  checkIntervalMs: 5000,
  idleTimeoutMs: 300000,
};

export interface HealthCheckReport {
  reaped: number;
  shrunk: number;
  circuit: CircuitState;
}

/**
 * Watches context failures and keeps the pool healthy.
 *
 * Unhealthy contexts are torn down as soon as they are reported; a periodic check
 * catches anything left over, closes idle contexts and lets the breaker half-open.
 * Replacements are created lazily by the pool on the next acquire.
 */
export class HealthMonitor {
  private readonly config: HealthMonitorConfig;
  private readonly logger: Logger;
  private timer: NodeJS.Timeout | null = null;
  private checking: Promise<HealthCheckReport> | null = null;

  constructor(
    private readonly pool: PoolMaintenance,
    private readonly breaker: CapacityCircuitBreaker,
    private readonly events: EventBus,
    config: Partial<HealthMonitorConfig> = {}
  ) {
    this.config = { ...DEFAULT_HEALTH_MONITOR_CONFIG, ...config };
    this.logger = getLogger('Health');
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.events.subscribe(ContextUnhealthyEvent.TYPE, this.onContextUnhealthy);
    this.events.subscribe(ContextCreationFailedEvent.TYPE, this.onCreationFailed);
    this.events.subscribe(ContextReleasedEvent.TYPE, this.onContextReleased);

    this.timer = setInterval(() => {
      void this.runScheduledCheck();
    }, this.config.checkIntervalMs);
    this.timer.unref();
    this.logger.debug('Health monitor started', { intervalMs: this.config.checkIntervalMs });
  }

  stop(): void {
    if (!this.timer) {
      return;
    }
    clearInterval(this.timer);
    this.timer = null;
    this.events.unsubscribe(ContextUnhealthyEvent.TYPE, this.onContextUnhealthy);
    this.events.unsubscribe(ContextCreationFailedEvent.TYPE, this.onCreationFailed);
    this.events.unsubscribe(ContextReleasedEvent.TYPE, this.onContextReleased);
    this.logger.debug('Health monitor stopped');
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * Run one check now. Concurrent calls share the check in progress.
   */
  check(): Promise<HealthCheckReport> {
    if (!this.checking) {
      this.checking = this.performCheck().finally(() => {
        this.checking = null;
      });
    }
    return this.checking;
  }

  private async performCheck(): Promise<HealthCheckReport> {
    this.breaker.tick();
    const reaped = await this.pool.reapUnhealthy();
    const shrunk =
      this.config.idleTimeoutMs > 0 ? await this.pool.shrinkIdle(this.config.idleTimeoutMs) : 0;

    if (reaped > 0 || shrunk > 0) {
      this.logger.info('Health check closed contexts', { reaped, shrunk });
    }
    return { reaped, shrunk, circuit: this.breaker.state };
  }

  private async runScheduledCheck(): Promise<void> {
    try {
      await this.check();
    } catch (error) {
      this.logger.error('Health check failed', { error: describeError(error) });
    }
  }

  private onContextUnhealthy = async (event: ContextUnhealthyEvent): Promise<void> => {
    if (event.cause !== 'cancelled') {
      this.breaker.recordFailure(event.slot);
    }
    await this.pool.reap(event.aggregateId);
  };

  private onCreationFailed = (event: ContextCreationFailedEvent): void => {
    this.breaker.recordFailure(event.slot);
  };

  private onContextReleased = (event: ContextReleasedEvent): void => {
    this.breaker.recordSuccess(event.slot);
  };
}
