import { BrowserEnginePort, EngineHandle } from '../../ports/BrowserEnginePort';
import { EventBus, DomainEvent } from '../../../domain/events/DomainEvent';
import {
  ContextClosedEvent,
  ContextCreatedEvent,
  ContextCreationFailedEvent,
  ContextReleasedEvent,
  ContextUnhealthyEvent,
  UnhealthyCause,
} from '../../../domain/events/OrchestratorEvents';
import {
  ExecutionContext,
  ExecutionContextSnapshot,
} from '../../../domain/context/ExecutionContext';
import {
  AcquireTimeoutError,
  ContextCreationFailedError,
  InvalidStateTransitionError,
  JobCancelledError,
  PoolDrainingError,
  describeError,
} from '../../../domain/errors/OrchestratorErrors';
import { withTimeout } from '../../utils/timing';
import { MAX_TIMER_DELAY_MS } from '../../../domain/shared/Timers';
import { Logger, getLogger } from '../../../infrastructure/logging';

/**
 * Configuration for the context pool.
 */
export interface ContextPoolConfig {
  /** Maximum number of live contexts */
  capacity: number;
  /** Default wait for a free context; 0 waits indefinitely */
  acquireTimeoutMs: number;
  /** Immediate retries after a failed engine launch */
  creationRetries: number;
  /** Retire a context after this many jobs; 0 disables */
  maxJobsPerContext: number;
  /** Upper bound on engine teardown and reset */
  terminateTimeoutMs: number;
}

export const DEFAULT_POOL_CONFIG: ContextPoolConfig = {
  capacity: 4,
  acquireTimeoutMs: 30000,
  creationRetries: 2,
  maxJobsPerContext: 0,
  terminateTimeoutMs: 5000,
};

export interface AcquireOptions {
  /** Job (or other caller) the context is loaned to */
  holder?: string;
  /** Overrides the configured acquire timeout; 0 waits indefinitely */
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * A context loaned out for exactly one job.
 */
export interface ContextLease {
  readonly contextId: string;
  readonly slot: number;
  readonly holder: string;
  readonly handle: EngineHandle;
}

export interface ReleaseDetail {
  cause: UnhealthyCause;
  reason: string;
}

/**
 * The capability the scheduler depends on. It never reaches into pool internals.
 */
export interface ContextProvider {
  acquire(options?: AcquireOptions): Promise<ContextLease>;
  release(lease: ContextLease, healthy: boolean, detail?: ReleaseDetail): Promise<void>;
}

/**
 * Maintenance operations driven by the health monitor and circuit breaker.
 */
export interface PoolMaintenance {
  readonly capacity: number;
  reap(contextId: string): Promise<boolean>;
  reapUnhealthy(): Promise<number>;
  shrinkIdle(idleMs: number): Promise<number>;
  setEffectiveCapacity(capacity: number): void;
}

export interface PoolStats {
  capacity: number;
  effectiveCapacity: number;
  ready: number;
  busy: number;
  creating: number;
  unhealthy: number;
  waiters: number;
  draining: boolean;
}

type CloseReason = ContextClosedEvent['reason'];

interface PooledContext {
  context: ExecutionContext;
  handle: EngineHandle;
  lease: ContextLease | null;
}

interface Waiter {
  holder: string;
  resolve: (lease: ContextLease) => void;
  reject: (error: unknown) => void;
  dispose: () => void;
}

/**
 * Owns a bounded set of execution contexts.
 *
 * Every context occupies a logical slot from creation until it is closed, so the
 * number of live engine instances never exceeds `capacity`. Unhealthy contexts keep
 * their slot until torn down. The effective capacity (lowered by the circuit breaker)
 * bounds how many contexts may be busy or in creation at once.
 */
export class ContextPool implements ContextProvider, PoolMaintenance {
  private readonly config: ContextPoolConfig;
  private readonly logger: Logger;
  private readonly contexts: Map<string, PooledContext> = new Map();
  private readonly occupiedSlots: Set<number> = new Set();
  private readonly closing: Map<string, Promise<void>> = new Map();
  private waiters: Waiter[] = [];
  private idleWatchers: Array<() => void> = [];
  private creating = 0;
  private effective: number;
  private draining = false;
  private drainPromise: Promise<void> | null = null;

  constructor(
    private readonly engine: BrowserEnginePort,
    private readonly events: EventBus,
    config: Partial<ContextPoolConfig> = {}
  ) {
    this.config = { ...DEFAULT_POOL_CONFIG, ...config };
    if (!Number.isInteger(this.config.capacity) || this.config.capacity < 1) {
      throw new RangeError(`Pool capacity must be a positive integer, got ${this.config.capacity}`);
    }
    assertTimerDelay('acquireTimeoutMs', this.config.acquireTimeoutMs);
    assertTimerDelay('terminateTimeoutMs', this.config.terminateTimeoutMs);
    this.effective = this.config.capacity;
    this.logger = getLogger('Pool');
  }

  get capacity(): number {
    return this.config.capacity;
  }

  get effectiveCapacity(): number {
    return this.effective;
  }

  /**
   * Loan a context. Reuses a ready one, creates one while capacity allows,
   * otherwise waits (FIFO) for a release or teardown.
   */
  async acquire(options: AcquireOptions = {}): Promise<ContextLease> {
    if (this.draining) {
      throw new PoolDrainingError();
    }
    if (options.signal?.aborted) {
      throw new JobCancelledError(describeError(options.signal.reason));
    }

    const holder = options.holder ?? 'anonymous';
    const timeoutMs = options.timeoutMs ?? this.config.acquireTimeoutMs;
    assertTimerDelay('timeoutMs', timeoutMs);

    // Waiting callers go first
    if (this.waiters.length === 0) {
      const lease = this.takeReady(holder);
      if (lease) {
        return lease;
      }
      if (this.canCreate()) {
        return this.createContext(holder);
      }
    }

    return this.waitForContext(holder, timeoutMs, options.signal);
  }

  /**
   * Return a loaned context. Healthy contexts are reset and made ready again;
   * unhealthy ones are marked for teardown by the health monitor.
   */
  async release(lease: ContextLease, healthy: boolean, detail?: ReleaseDetail): Promise<void> {
    const pooled = this.contexts.get(lease.contextId);
    if (!pooled || pooled.lease !== lease) {
      throw new InvalidStateTransitionError('ContextLease', 'released', 'released');
    }
    pooled.lease = null;

    if (!healthy) {
      this.markUnhealthy(pooled, detail ?? { cause: 'unspecified', reason: 'released unhealthy' });
      return;
    }

    const { context } = pooled;
    const { maxJobsPerContext } = this.config;
    if (maxJobsPerContext > 0 && context.jobsServed + 1 >= maxJobsPerContext) {
      context.markReady();
      const teardown = this.beginDestroy(pooled, 'retired');
      this.logger.debug('Retiring context', { contextId: context.id, jobsServed: context.jobsServed });
      this.emit(new ContextReleasedEvent(context.id, context.slot, context.jobsServed));
      this.checkIdle();
      await teardown;
      return;
    }

    try {
      await withTimeout(
        this.engine.reset(pooled.handle),
        this.config.terminateTimeoutMs,
        () => new Error(`reset exceeded ${this.config.terminateTimeoutMs}ms`)
      );
    } catch (error) {
      this.markUnhealthy(pooled, { cause: 'reset_failed', reason: describeError(error) });
      return;
    }

    context.markReady();
    this.emit(new ContextReleasedEvent(context.id, context.slot, context.jobsServed));
    this.wakeWaiters();
    this.checkIdle();
  }

  /**
   * Tear down one unhealthy context and free its slot.
   */
  async reap(contextId: string): Promise<boolean> {
    const pooled = this.contexts.get(contextId);
    if (!pooled || pooled.context.state !== 'unhealthy' || this.closing.has(contextId)) {
      return false;
    }
    await this.beginDestroy(pooled, 'unhealthy');
    return true;
  }

  async reapUnhealthy(): Promise<number> {
    const ids = Array.from(this.contexts.values())
      .filter(p => p.context.state === 'unhealthy')
      .map(p => p.context.id);
    const results = await Promise.all(ids.map(id => this.reap(id)));
    return results.filter(Boolean).length;
  }

  /**
   * Close ready contexts that have been idle for at least `idleMs`.
   */
  async shrinkIdle(idleMs: number): Promise<number> {
    const now = Date.now();
    const idle = Array.from(this.contexts.values()).filter(
      p => !this.closing.has(p.context.id) && p.context.isIdleFor(idleMs, now)
    );
    await Promise.all(idle.map(p => this.beginDestroy(p, 'idle')));
    return idle.length;
  }

  /**
   * Clamp and apply a new effective capacity.
   */
  setEffectiveCapacity(capacity: number): void {
    const next = Math.max(0, Math.min(this.config.capacity, Math.floor(capacity)));
    if (next === this.effective) {
      return;
    }
    this.logger.info('Effective capacity changed', { from: this.effective, to: next });
    this.effective = next;
    this.wakeWaiters();
  }

  /**
   * Stop handing out contexts, wait for loans to come back, then close everything.
   */
  drain(): Promise<void> {
    if (!this.drainPromise) {
      this.draining = true;
      const waiters = this.waiters;
      this.waiters = [];
      for (const waiter of waiters) {
        waiter.dispose();
        waiter.reject(new PoolDrainingError());
      }
      this.drainPromise = this.performDrain();
    }
    return this.drainPromise;
  }

  isDraining(): boolean {
    return this.draining;
  }

  stats(): PoolStats {
    const counts = { ready: 0, busy: 0, unhealthy: 0 };
    for (const { context } of this.contexts.values()) {
      if (context.state === 'ready') counts.ready++;
      else if (context.state === 'busy') counts.busy++;
      else if (context.state === 'unhealthy') counts.unhealthy++;
    }
    return {
      capacity: this.config.capacity,
      effectiveCapacity: this.effective,
      ...counts,
      creating: this.creating,
      waiters: this.waiters.length,
      draining: this.draining,
    };
  }

  snapshot(): ExecutionContextSnapshot[] {
    return Array.from(this.contexts.values()).map(p => p.context.toJSON());
  }

  private async performDrain(): Promise<void> {
    this.logger.info('Draining context pool', { ...this.stats() });
    await this.waitForIdle();

    const remaining = Array.from(this.contexts.values()).filter(
      p => !this.closing.has(p.context.id)
    );
    for (const pooled of remaining) {
      void this.beginDestroy(pooled, pooled.context.state === 'unhealthy' ? 'unhealthy' : 'drained');
    }
    // Includes teardowns the health monitor started before the drain
    await Promise.all(Array.from(this.closing.values()));
    this.logger.info('Context pool drained');
  }

  private activeCount(): number {
    let busy = 0;
    for (const { context } of this.contexts.values()) {
      if (context.state === 'busy') busy++;
    }
    return busy + this.creating;
  }

  private canCreate(): boolean {
    return (
      !this.draining &&
      this.activeCount() < this.effective &&
      this.occupiedSlots.size < this.config.capacity
    );
  }

  /**
   * Hand out the most recently released ready context, leaving older ones to age out.
   */
  private takeReady(holder: string): ContextLease | null {
    if (this.draining || this.activeCount() >= this.effective) {
      return null;
    }

    let candidate: PooledContext | null = null;
    for (const pooled of this.contexts.values()) {
      if (pooled.context.state !== 'ready' || this.closing.has(pooled.context.id)) {
        continue;
      }
      const releasedAt = pooled.context.lastReleasedAt?.getTime() ?? 0;
      const best = candidate?.context.lastReleasedAt?.getTime() ?? -1;
      if (!candidate || releasedAt > best) {
        candidate = pooled;
      }
    }

    return candidate ? this.lend(candidate, holder) : null;
  }

  private lend(pooled: PooledContext, holder: string): ContextLease {
    pooled.context.markBusy(holder);
    const lease: ContextLease = {
      contextId: pooled.context.id,
      slot: pooled.context.slot,
      holder,
      handle: pooled.handle,
    };
    pooled.lease = lease;
    return lease;
  }

  private lowestFreeSlot(): number {
    let slot = 0;
    while (this.occupiedSlots.has(slot)) {
      slot++;
    }
    return slot;
  }

  /**
   * Launch a new context. The slot is reserved before the first await.
   */
  private async createContext(holder: string): Promise<ContextLease> {
    const slot = this.lowestFreeSlot();
    this.occupiedSlots.add(slot);
    this.creating++;

    const context = ExecutionContext.create(slot);
    const maxAttempts = this.config.creationRetries + 1;
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        const handle = await this.engine.launch();
        this.creating--;
        context.markReady();
        const pooled: PooledContext = { context, handle, lease: null };
        this.contexts.set(context.id, pooled);
        this.logger.debug('Context created', { contextId: context.id, slot, attempt });
        this.emit(new ContextCreatedEvent(context.id, slot, attempt));
        return this.lend(pooled, holder);
      } catch (error) {
        lastError = error;
        this.logger.warn('Context launch failed', {
          slot,
          attempt,
          maxAttempts,
          error: describeError(error),
        });
      }
    }

    this.creating--;
    this.occupiedSlots.delete(slot);
    context.markClosed();
    this.emit(
      new ContextCreationFailedEvent(context.id, slot, maxAttempts, describeError(lastError))
    );
    this.wakeWaiters();
    this.checkIdle();
    throw new ContextCreationFailedError(maxAttempts, lastError);
  }

  private waitForContext(
    holder: string,
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<ContextLease> {
    return new Promise<ContextLease>((resolve, reject) => {
      let timer: NodeJS.Timeout | null = null;

      const onAbort = (): void => {
        this.removeWaiter(waiter);
        reject(new JobCancelledError(describeError(signal?.reason)));
      };

      const waiter: Waiter = {
        holder,
        resolve,
        reject,
        dispose: () => {
          if (timer) clearTimeout(timer);
          signal?.removeEventListener('abort', onAbort);
        },
      };

      if (timeoutMs > 0) {
        timer = setTimeout(() => {
          this.removeWaiter(waiter);
          reject(new AcquireTimeoutError(timeoutMs));
        }, timeoutMs);
      }
      signal?.addEventListener('abort', onAbort, { once: true });

      this.waiters.push(waiter);
    });
  }

  private removeWaiter(waiter: Waiter): void {
    waiter.dispose();
    this.waiters = this.waiters.filter(w => w !== waiter);
  }

  /**
   * Serve waiting callers, oldest first, while capacity allows.
   */
  private wakeWaiters(): void {
    while (this.waiters.length > 0 && !this.draining) {
      const waiter = this.waiters[0];
      const lease = this.takeReady(waiter.holder);
      if (lease) {
        this.waiters.shift();
        waiter.dispose();
        waiter.resolve(lease);
        continue;
      }
      if (this.canCreate()) {
        this.waiters.shift();
        waiter.dispose();
        void this.createContext(waiter.holder).then(waiter.resolve, waiter.reject);
        continue;
      }
      break;
    }
  }

  private markUnhealthy(pooled: PooledContext, detail: ReleaseDetail): void {
    const { context } = pooled;
    context.markUnhealthy(detail.reason);
    this.logger.warn('Context marked unhealthy', {
      contextId: context.id,
      slot: context.slot,
      cause: detail.cause,
      reason: detail.reason,
    });
    this.checkIdle();
    this.emit(new ContextUnhealthyEvent(context.id, context.slot, detail.cause, detail.reason));
  }

  /**
   * Start tearing a context down, at most once per context.
   */
  private beginDestroy(pooled: PooledContext, reason: CloseReason): Promise<void> {
    const existing = this.closing.get(pooled.context.id);
    if (existing) {
      return existing;
    }
    const teardown = this.destroy(pooled, reason);
    this.closing.set(pooled.context.id, teardown);
    return teardown;
  }

  /**
   * Terminate the engine instance (bounded), close the context and free its slot.
   */
  private async destroy(pooled: PooledContext, reason: CloseReason): Promise<void> {
    const { context, handle } = pooled;
    try {
      await withTimeout(
        this.engine.terminate(handle),
        this.config.terminateTimeoutMs,
        () => new Error(`terminate exceeded ${this.config.terminateTimeoutMs}ms`)
      );
    } catch (error) {
      this.logger.warn('Context teardown did not complete cleanly', {
        contextId: context.id,
        error: describeError(error),
      });
    }

    context.markClosed();
    this.contexts.delete(context.id);
    this.closing.delete(context.id);
    this.occupiedSlots.delete(context.slot);
    this.logger.debug('Context closed', { contextId: context.id, slot: context.slot, reason });
    this.emit(new ContextClosedEvent(context.id, context.slot, reason));
    this.wakeWaiters();
    this.checkIdle();
  }

  private waitForIdle(): Promise<void> {
    if (this.activeCount() === 0) {
      return Promise.resolve();
    }
    return new Promise(resolve => {
      this.idleWatchers.push(resolve);
    });
  }

  private checkIdle(): void {
    if (this.idleWatchers.length === 0 || this.activeCount() > 0) {
      return;
    }
    const watchers = this.idleWatchers;
    this.idleWatchers = [];
    for (const resolve of watchers) {
      resolve();
    }
  }

  private emit(event: DomainEvent): void {
    void this.events.publish(event);
  }
}

function assertTimerDelay(name: string, ms: number): void {
  if (ms > MAX_TIMER_DELAY_MS) {
    throw new RangeError(`${name} must not exceed ${MAX_TIMER_DELAY_MS}ms, got ${ms}`);
  }
}
