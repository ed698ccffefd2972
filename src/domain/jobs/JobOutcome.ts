import { JobFault } from '../errors/OrchestratorErrors';

/**
 * Terminal status reported to callers.
 */
export type JobStatus = 'succeeded' | 'failed' | 'timed_out' | 'cancelled';

interface OutcomeTiming {
  jobId: string;
  label?: string;
  submittedAt: string;
  startedAt?: string;
  finishedAt: string;
  /** Time from submission to the terminal state */
  durationMs: number;
}

export interface SucceededOutcome<T> extends OutcomeTiming {
  status: 'succeeded';
  result: T;
}

export interface FaultedOutcome extends OutcomeTiming {
  status: Exclude<JobStatus, 'succeeded'>;
  fault: JobFault;
}

/**
 * Exactly one of these is delivered per submitted job.
 */
export type JobOutcome<T = unknown> = SucceededOutcome<T> | FaultedOutcome;

export function isSucceeded<T>(outcome: JobOutcome<T>): outcome is SucceededOutcome<T> {
  return outcome.status === 'succeeded';
}
