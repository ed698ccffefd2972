import { Entity } from '../shared/Entity';
import { InvalidStateTransitionError, JobFault } from '../errors/OrchestratorErrors';
import { JobOutcome } from './JobOutcome';

/**
 * Job lifecycle state.
 */
export type JobState =
  | 'queued'
  | 'assigned'
  | 'running'
  | 'succeeded'
  | 'failed'
  | 'timed_out'
  | 'cancelled';

const ALLOWED_TRANSITIONS: Record<JobState, readonly JobState[]> = {
  queued: ['assigned', 'failed', 'cancelled'],
  assigned: ['running', 'failed', 'cancelled'],
  running: ['succeeded', 'failed', 'timed_out', 'cancelled'],
  succeeded: [],
  failed: [],
  timed_out: [],
  cancelled: [],
};

const TERMINAL_STATES: ReadonlySet<JobState> = new Set<JobState>([
  'succeeded',
  'failed',
  'timed_out',
  'cancelled',
]);

/**
 * Parameters accepted when creating a job.
 */
export interface JobParams {
  /** Caller payload; opaque to the orchestrator */
  payload?: unknown;
  timeoutMs: number;
  label?: string;
}

type JobSettlement<T> = { kind: 'result'; value: T } | { kind: 'fault'; fault: JobFault };

export interface JobProps<T> {
  payload: unknown;
  timeoutMs: number;
  label?: string;
  state: JobState;
  contextId: string | null;
  settlement: JobSettlement<T> | null;
  startedAt: Date | null;
  finishedAt: Date | null;
}

/**
 * A unit of automation work with a deadline and exactly one terminal outcome.
 */
export class Job<T = unknown> extends Entity<JobProps<T>> {
  private constructor(props: JobProps<T>, id?: string, submittedAt?: Date) {
    super(props, id, submittedAt);
  }

  static create<T = unknown>(params: JobParams, id?: string, submittedAt?: Date): Job<T> {
    return new Job<T>(
      {
        payload: params.payload,
        timeoutMs: params.timeoutMs,
        label: params.label,
        state: 'queued',
        contextId: null,
        settlement: null,
        startedAt: null,
        finishedAt: null,
      },
      id,
      submittedAt
    );
  }

  get state(): JobState {
    return this.props.state;
  }

  get payload(): unknown {
    return this.props.payload;
  }

  get timeoutMs(): number {
    return this.props.timeoutMs;
  }

  get label(): string | undefined {
    return this.props.label;
  }

  get contextId(): string | null {
    return this.props.contextId;
  }

  get submittedAt(): Date {
    return this._createdAt;
  }

  get result(): T | undefined {
    const settlement = this.props.settlement;
    return settlement?.kind === 'result' ? settlement.value : undefined;
  }

  get fault(): JobFault | undefined {
    const settlement = this.props.settlement;
    return settlement?.kind === 'fault' ? settlement.fault : undefined;
  }

  isTerminal(): boolean {
    return TERMINAL_STATES.has(this.props.state);
  }

  assign(contextId: string): void {
    this.transition('assigned');
    this.props.contextId = contextId;
  }

  start(at: Date = new Date()): void {
    this.transition('running');
    this.props.startedAt = at;
  }

  succeed(result: T, at: Date = new Date()): void {
    this.transition('succeeded');
    this.props.settlement = { kind: 'result', value: result };
    this.props.finishedAt = at;
  }

  fail(fault: JobFault, at: Date = new Date()): void {
    this.finishWithFault('failed', fault, at);
  }

  timeOut(fault: JobFault, at: Date = new Date()): void {
    this.finishWithFault('timed_out', fault, at);
  }

  cancel(fault: JobFault, at: Date = new Date()): void {
    this.finishWithFault('cancelled', fault, at);
  }

  /**
   * Build the caller-facing outcome. Only valid once terminal.
   */
  toOutcome(): JobOutcome<T> {
    const { state, finishedAt, startedAt, settlement } = this.props;
    if (!finishedAt || !settlement) {
      throw new InvalidStateTransitionError('Job', state, 'outcome');
    }

    const timing = {
      jobId: this._id,
      label: this.props.label,
      submittedAt: this._createdAt.toISOString(),
      startedAt: startedAt?.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - this._createdAt.getTime(),
    };

    switch (state) {
      case 'succeeded':
        if (settlement.kind === 'result') {
          return { ...timing, status: 'succeeded', result: settlement.value };
        }
        break;
      case 'failed':
      case 'timed_out':
      case 'cancelled':
        if (settlement.kind === 'fault') {
          return { ...timing, status: state, fault: settlement.fault };
        }
        break;
      default:
        break;
    }
    throw new InvalidStateTransitionError('Job', state, 'outcome');
  }

  private finishWithFault(next: JobState, fault: JobFault, at: Date): void {
    this.transition(next);
    this.props.settlement = { kind: 'fault', fault };
    this.props.finishedAt = at;
  }

  private transition(next: JobState): void {
    if (!ALLOWED_TRANSITIONS[this.props.state].includes(next)) {
      throw new InvalidStateTransitionError('Job', this.props.state, next);
    }
    this.props.state = next;
  }
}
