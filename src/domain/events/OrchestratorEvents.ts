import { BaseDomainEvent } from './DomainEvent';
import { JobStatus } from '../jobs/JobOutcome';
import { JobFault } from '../errors/OrchestratorErrors';

/**
 * Event raised when a job is accepted into the queue.
 */
export class JobSubmittedEvent extends BaseDomainEvent {
  static readonly TYPE = 'job.submitted';

  constructor(
    jobId: string,
    public readonly queueDepth: number,
    public readonly label?: string
  ) {
    super(JobSubmittedEvent.TYPE, jobId);
  }
}

/**
 * Event raised when a job starts running on a context.
 */
export class JobStartedEvent extends BaseDomainEvent {
  static readonly TYPE = 'job.started';

  constructor(
    jobId: string,
    public readonly contextId: string,
    public readonly waitedMs: number
  ) {
    super(JobStartedEvent.TYPE, jobId);
  }
}

/**
 * Event raised when a job reaches its terminal state.
 */
export class JobCompletedEvent extends BaseDomainEvent {
  static readonly TYPE = 'job.completed';

  constructor(
    jobId: string,
    public readonly status: JobStatus,
    public readonly durationMs: number,
    public readonly contextId: string | null,
    public readonly fault?: JobFault
  ) {
    super(JobCompletedEvent.TYPE, jobId);
  }
}

export class ContextCreatedEvent extends BaseDomainEvent {
  static readonly TYPE = 'context.created';

  constructor(
    contextId: string,
    public readonly slot: number,
    public readonly attempts: number
  ) {
    super(ContextCreatedEvent.TYPE, contextId);
  }
}

export class ContextCreationFailedEvent extends BaseDomainEvent {
  static readonly TYPE = 'context.creation_failed';

  constructor(
    contextId: string,
    public readonly slot: number,
    public readonly attempts: number,
    public readonly error: string
  ) {
    super(ContextCreationFailedEvent.TYPE, contextId);
  }
}

/**
 * Why a context was marked unhealthy.
 * Only `cancelled` is not treated as a context failure.
 */
export type UnhealthyCause = 'timeout' | 'fault' | 'reset_failed' | 'cancelled' | 'unspecified';

/**
 * Event raised when a context is marked unhealthy and awaits teardown.
 */
export class ContextUnhealthyEvent extends BaseDomainEvent {
  static readonly TYPE = 'context.unhealthy';

  constructor(
    contextId: string,
    public readonly slot: number,
    public readonly cause: UnhealthyCause,
    public readonly reason: string
  ) {
    super(ContextUnhealthyEvent.TYPE, contextId);
  }
}

/**
 * Event raised when a context is released healthy after a job.
 */
export class ContextReleasedEvent extends BaseDomainEvent {
  static readonly TYPE = 'context.released';

  constructor(
    contextId: string,
    public readonly slot: number,
    public readonly jobsServed: number
  ) {
    super(ContextReleasedEvent.TYPE, contextId);
  }
}

export class ContextClosedEvent extends BaseDomainEvent {
  static readonly TYPE = 'context.closed';

  constructor(
    contextId: string,
    public readonly slot: number,
    public readonly reason: 'unhealthy' | 'retired' | 'idle' | 'drained'
  ) {
    super(ContextClosedEvent.TYPE, contextId);
  }
}

/**
 * Event raised when the circuit breaker opens and capacity is reduced.
 */
export class PoolDegradedEvent extends BaseDomainEvent {
  static readonly TYPE = 'pool.degraded';

  constructor(
    public readonly failuresInWindow: number,
    public readonly effectiveCapacity: number,
    public readonly retryAfterMs: number
  ) {
    super(PoolDegradedEvent.TYPE, 'pool');
  }
}

export class PoolRecoveredEvent extends BaseDomainEvent {
  static readonly TYPE = 'pool.recovered';

  constructor(public readonly effectiveCapacity: number) {
    super(PoolRecoveredEvent.TYPE, 'pool');
  }
}
