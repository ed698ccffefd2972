import { EventBus } from '../../../domain/events/DomainEvent';
import { PoolDegradedEvent, PoolRecoveredEvent } from '../../../domain/events/OrchestratorEvents';
import { PoolDegradedError } from '../../../domain/errors/OrchestratorErrors';
import { PoolMaintenance } from '../pool/ContextPool';
import { Logger, getLogger } from '../../../infrastructure/logging';

/**
 * Circuit breaker state for the context pool.
 */
export type CircuitState = 'closed' | 'open' | 'half_open';

/**
 * Configuration for circuit breaker behavior.
 */
export interface CircuitBreakerConfig {
  /** Failures within the window before opening the circuit (default: 5) */
  failureThreshold: number;
  /** Sliding window for counting failures (default: 60000) */
  failureWindowMs: number;
  /** Time spent open before probing again (default: 30000) */
  resetTimeoutMs: number;
  /** Successes in half-open state before closing (default: 2) */
  successThreshold: number;
  /** Effective pool capacity while open or half-open (default: 1) */
  degradedCapacity: number;
}

export const DEFAULT_CIRCUIT_BREAKER_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  failureWindowMs: 60000,
  resetTimeoutMs: 30000,
  successThreshold: 2,
  degradedCapacity: 1,
};

/**
 * Decides whether new jobs may be admitted.
 */
export interface AdmissionPolicy {
  assertAdmitting(now?: number): void;
}

export interface CircuitBreakerSnapshot {
  state: CircuitState;
  failuresInWindow: number;
  /** Consecutive failures per pool slot, reset by a success in that slot */
  consecutiveFailures: Record<number, number>;
  openedAt: string | null;
  retryAfterMs: number;
}

/**
 * Reduces pool capacity after repeated context failures.
 *
 * closed: full capacity. open: degraded capacity, submissions refused.
 * half_open: degraded capacity, submissions accepted; enough successes close the
 * circuit, any failure opens it again.
 */
export class CapacityCircuitBreaker implements AdmissionPolicy {
  private readonly config: CircuitBreakerConfig;
  private readonly logger: Logger;
  private circuit: CircuitState = 'closed';
  private failureTimes: number[] = [];
  private readonly slotFailures: Map<number, number> = new Map();
  private halfOpenSuccesses = 0;
  private openedAt: number | null = null;

  constructor(
    private readonly pool: PoolMaintenance,
    private readonly events: EventBus,
    config: Partial<CircuitBreakerConfig> = {}
  ) {
    this.config = { ...DEFAULT_CIRCUIT_BREAKER_CONFIG, ...config };
    this.logger = getLogger('Health');
  }

  get state(): CircuitState {
    return this.circuit;
  }

  isDegraded(): boolean {
    return this.circuit !== 'closed';
  }

  /**
   * Throws PoolDegradedError while the circuit is open.
   */
  assertAdmitting(now: number = Date.now()): void {
    this.tick(now);
    if (this.circuit === 'open') {
      throw new PoolDegradedError(this.retryAfterMs(now));
    }
  }

  recordFailure(slot: number, now: number = Date.now()): void {
    this.tick(now);
    this.slotFailures.set(slot, (this.slotFailures.get(slot) ?? 0) + 1);
    this.failureTimes.push(now);
    this.prune(now);

    if (this.circuit === 'half_open') {
      this.logger.warn('Failure while half-open, reopening circuit', { slot });
      this.open(now);
      return;
    }

    if (this.circuit === 'closed' && this.failureTimes.length >= this.config.failureThreshold) {
      this.open(now);
    }
  }

  recordSuccess(slot: number, now: number = Date.now()): void {
    this.tick(now);
    this.slotFailures.delete(slot);

    if (this.circuit === 'half_open') {
      this.halfOpenSuccesses++;
      if (this.halfOpenSuccesses >= this.config.successThreshold) {
        this.close();
      }
    }
  }

  /**
   * Move an open circuit to half-open once the reset timeout has passed.
   */
  tick(now: number = Date.now()): void {
    if (
      this.circuit === 'open' &&
      this.openedAt !== null &&
      now - this.openedAt >= this.config.resetTimeoutMs
    ) {
      this.circuit = 'half_open';
      this.halfOpenSuccesses = 0;
      this.logger.info('Circuit half-open, admitting jobs at reduced capacity');
    }
  }

  snapshot(now: number = Date.now()): CircuitBreakerSnapshot {
    this.prune(now);
    return {
      state: this.circuit,
      failuresInWindow: this.failureTimes.length,
      consecutiveFailures: Object.fromEntries(this.slotFailures),
      openedAt: this.openedAt === null ? null : new Date(this.openedAt).toISOString(),
      retryAfterMs: this.circuit === 'open' ? this.retryAfterMs(now) : 0,
    };
  }

  private retryAfterMs(now: number): number {
    if (this.openedAt === null) {
      return 0;
    }
    return Math.max(0, this.openedAt + this.config.resetTimeoutMs - now);
  }

  private prune(now: number): void {
    const cutoff = now - this.config.failureWindowMs;
    this.failureTimes = this.failureTimes.filter(time => time > cutoff);
  }

  private open(now: number): void {
    this.circuit = 'open';
    this.openedAt = now;
    this.halfOpenSuccesses = 0;

    const effective = Math.min(this.config.degradedCapacity, this.pool.capacity);
    this.pool.setEffectiveCapacity(effective);
    this.logger.warn('Circuit opened, pool degraded', {
      failuresInWindow: this.failureTimes.length,
      effectiveCapacity: effective,
    });
    void this.events.publish(
      new PoolDegradedEvent(this.failureTimes.length, effective, this.config.resetTimeoutMs)
    );
  }

  private close(): void {
    this.circuit = 'closed';
    this.openedAt = null;
    this.halfOpenSuccesses = 0;
    this.failureTimes = [];

    this.pool.setEffectiveCapacity(this.pool.capacity);
    this.logger.info('Circuit closed, pool recovered', { effectiveCapacity: this.pool.capacity });
    void this.events.publish(new PoolRecoveredEvent(this.pool.capacity));
  }
}
