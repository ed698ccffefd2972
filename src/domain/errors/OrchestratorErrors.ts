/**
 * Stable error codes surfaced to callers in job faults.
 */
export type ErrorCode =
  | 'CAPACITY_EXCEEDED'
  | 'CONTEXT_CREATION_FAILED'
  | 'EXECUTION_FAULT'
  | 'TIMEOUT'
  | 'CANCELLED'
  | 'POOL_DEGRADED'
  | 'ACQUIRE_TIMEOUT'
  | 'POOL_DRAINING'
  | 'ORCHESTRATOR_STOPPED'
  | 'INVALID_JOB'
  | 'INVALID_STATE_TRANSITION'
  | 'CONFIGURATION';

/**
 * Plain-data fault delivered with a job outcome.
 */
export interface JobFault {
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Base class for all orchestrator errors.
 */
export class OrchestratorError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toFault(): JobFault {
    return this.details
      ? { code: this.code, message: this.message, details: this.details }
      : { code: this.code, message: this.message };
  }
}

/**
 * The scheduler queue is at its depth ceiling.
 */
export class CapacityExceededError extends OrchestratorError {
  constructor(maxQueueDepth: number) {
    super('CAPACITY_EXCEEDED', `Job queue is full (max depth ${maxQueueDepth})`, {
      maxQueueDepth,
    });
  }
}

/**
 * The browser engine could not launch a context after bounded retries.
 */
export class ContextCreationFailedError extends OrchestratorError {
  constructor(
    attempts: number,
    public readonly originalError?: unknown
  ) {
    super(
      'CONTEXT_CREATION_FAILED',
      `Failed to create execution context after ${attempts} attempt(s): ${describeError(originalError)}`,
      { attempts }
    );
  }
}

/**
 * An automation step failed (navigation, script error, engine crash).
 */
export class ExecutionFaultError extends OrchestratorError {
  constructor(
    message: string,
    public readonly originalError?: unknown,
    details?: Record<string, unknown>
  ) {
    super(
      'EXECUTION_FAULT',
      message,
      originalError instanceof Error ? { errorName: originalError.name, ...details } : details
    );
  }
}

/**
 * A declarative step failed; carries its position in the script.
 */
export class StepExecutionError extends ExecutionFaultError {
  constructor(
    public readonly stepIndex: number,
    public readonly stepType: string,
    originalError: unknown
  ) {
    super(`Step ${stepIndex} (${stepType}) failed: ${describeError(originalError)}`, originalError, {
      stepIndex,
      stepType,
    });
  }
}

/**
 * The job exceeded its deadline.
 */
export class JobTimeoutError extends OrchestratorError {
  constructor(timeoutMs: number) {
    super('TIMEOUT', `Job exceeded its deadline of ${timeoutMs}ms`, { timeoutMs });
  }
}

export class JobCancelledError extends OrchestratorError {
  constructor(public readonly reason: string) {
    super('CANCELLED', `Job cancelled: ${reason}`, { reason });
  }
}

/**
 * The circuit breaker is open and new submissions are refused.
 */
export class PoolDegradedError extends OrchestratorError {
  constructor(retryAfterMs: number) {
    super('POOL_DEGRADED', 'Context pool is degraded after repeated failures', { retryAfterMs });
  }
}

export class AcquireTimeoutError extends OrchestratorError {
  constructor(timeoutMs: number) {
    super('ACQUIRE_TIMEOUT', `No execution context became available within ${timeoutMs}ms`, {
      timeoutMs,
    });
  }
}

export class PoolDrainingError extends OrchestratorError {
  constructor() {
    super('POOL_DRAINING', 'Context pool is draining and no longer hands out contexts');
  }
}

export class OrchestratorStoppedError extends OrchestratorError {
  constructor() {
    super('ORCHESTRATOR_STOPPED', 'Orchestrator is shutting down and accepts no new jobs');
  }
}

export class InvalidJobError extends OrchestratorError {
  constructor(message: string) {
    super('INVALID_JOB', `Invalid job: ${message}`);
  }
}

export class InvalidStateTransitionError extends OrchestratorError {
  constructor(entity: string, from: string, to: string) {
    super('INVALID_STATE_TRANSITION', `${entity} cannot transition from '${from}' to '${to}'`, {
      from,
      to,
    });
  }
}

/**
 * Error thrown when configuration is invalid.
 */
export class ConfigurationError extends OrchestratorError {
  constructor(message: string) {
    super('CONFIGURATION', `Configuration Error: ${message}`);
  }
}

/**
 * Render an unknown thrown value as a message.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return error === undefined ? 'unknown error' : String(error);
}

/**
 * Fault for an error raised by automation steps or the engine while a job ran.
 * Execution faults raised by the steps themselves are reported as they are.
 */
export function toExecutionFault(error: unknown): JobFault {
  if (error instanceof OrchestratorError && error.code === 'EXECUTION_FAULT') {
    return error.toFault();
  }
  return new ExecutionFaultError(describeError(error), error).toFault();
}

/**
 * Convert any thrown value into a job fault.
 * Errors outside the taxonomy are reported as execution faults.
 */
export function toJobFault(error: unknown): JobFault {
  if (error instanceof OrchestratorError) {
    return error.toFault();
  }
  return { code: 'EXECUTION_FAULT', message: describeError(error) };
}
