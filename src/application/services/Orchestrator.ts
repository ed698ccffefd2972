import { BrowserEnginePort } from '../ports/BrowserEnginePort';
import { EventBus } from '../../domain/events/DomainEvent';
import { JobState } from '../../domain/jobs/Job';
import { ExecutionContextSnapshot } from '../../domain/context/ExecutionContext';
import { ContextPool, ContextPoolConfig, PoolStats } from './pool/ContextPool';
import { ContextRunner } from './context/ContextRunner';
import { JobHandle, JobSpec, Scheduler, SchedulerConfig, SchedulerStats } from './scheduler/Scheduler';
import {
  CapacityCircuitBreaker,
  CircuitBreakerConfig,
  CircuitBreakerSnapshot,
} from './health/CapacityCircuitBreaker';
import { HealthMonitor, HealthMonitorConfig } from './health/HealthMonitor';
import { Logger, getLogger } from '../../infrastructure/logging';

export interface OrchestratorOptions {
  pool?: Partial<ContextPoolConfig>;
  scheduler?: Partial<SchedulerConfig>;
  circuitBreaker?: Partial<CircuitBreakerConfig>;
  healthMonitor?: Partial<HealthMonitorConfig>;
}

export type OrchestratorHealth = 'healthy' | 'degraded';

/**
 * Point-in-time view for the hosting service.
 */
export interface OrchestratorStatus {
  health: OrchestratorHealth;
  pool: PoolStats;
  contexts: ExecutionContextSnapshot[];
  queue: { depth: number; maxDepth: number };
  running: number;
  breaker: CircuitBreakerSnapshot;
  stopping: boolean;
}

/**
 * Entry point for the hosting service: wires pool, scheduler and health monitor
 * over one browser engine.
 */
export class Orchestrator {
  readonly pool: ContextPool;
  readonly scheduler: Scheduler;
  readonly breaker: CapacityCircuitBreaker;
  readonly monitor: HealthMonitor;
  private readonly logger: Logger;
  private started = false;
  private stopPromise: Promise<void> | null = null;

  constructor(engine: BrowserEnginePort, events: EventBus, options: OrchestratorOptions = {}) {
    this.logger = getLogger('Scheduler').child('Orchestrator');
    this.pool = new ContextPool(engine, events, options.pool);
    this.breaker = new CapacityCircuitBreaker(this.pool, events, options.circuitBreaker);
    this.monitor = new HealthMonitor(this.pool, this.breaker, events, options.healthMonitor);
    this.scheduler = new Scheduler(
      this.pool,
      new ContextRunner(engine),
      events,
      options.scheduler,
      this.breaker
    );
  }

  start(): void {
    if (this.started) {
      return;
    }
    this.started = true;
    this.monitor.start();
    this.scheduler.start();
    this.logger.info('Orchestrator started', { capacity: this.pool.capacity });
  }

  submit<T>(spec: JobSpec<T>): JobHandle<T> {
    return this.scheduler.submit(spec);
  }

  cancel(jobId: string, reason?: string): boolean {
    return this.scheduler.cancel(jobId, reason);
  }

  waitForQueueSpace(): Promise<void> {
    return this.scheduler.waitForQueueSpace();
  }

  getJobState(jobId: string): JobState | undefined {
    return this.scheduler.getJobState(jobId);
  }

  status(): OrchestratorStatus {
    const scheduler: SchedulerStats = this.scheduler.stats();
    const breaker = this.breaker.snapshot();
    return {
      health: breaker.state === 'closed' ? 'healthy' : 'degraded',
      pool: this.pool.stats(),
      contexts: this.pool.snapshot(),
      queue: { depth: scheduler.queued, maxDepth: scheduler.maxQueueDepth },
      running: scheduler.running,
      breaker,
      stopping: scheduler.stopping,
    };
  }

  /**
   * Resolve every job, then close every context. Idempotent.
   */
  drainAndStop(reason?: string): Promise<void> {
    if (!this.stopPromise) {
      this.stopPromise = this.performStop(reason);
    }
    return this.stopPromise;
  }

  private async performStop(reason?: string): Promise<void> {
    await this.scheduler.drainAndStop(reason);
    this.monitor.stop();
    await this.pool.drain();
    this.logger.info('Orchestrator stopped');
  }
}
