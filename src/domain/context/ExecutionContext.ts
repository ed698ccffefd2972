import { Entity } from '../shared/Entity';
import { InvalidStateTransitionError } from '../errors/OrchestratorErrors';

/**
 * Lifecycle state of an execution context.
 */
export type ContextState = 'cold' | 'ready' | 'busy' | 'unhealthy' | 'closed';

const ALLOWED_TRANSITIONS: Record<ContextState, readonly ContextState[]> = {
  cold: ['ready', 'closed'],
  ready: ['busy', 'unhealthy', 'closed'],
  busy: ['ready', 'unhealthy'],
  unhealthy: ['closed'],
  closed: [],
};

/**
 * Properties for ExecutionContext.
 */
export interface ExecutionContextProps {
  /** Logical pool slot this context occupies */
  slot: number;
  state: ContextState;
  jobsServed: number;
  lastError?: string;
  /** Job currently holding the context, if any */
  holder: string | null;
  lastReleasedAt: Date | null;
  closedAt: Date | null;
}

/**
 * Serialized view of a context for status reporting.
 */
export interface ExecutionContextSnapshot {
  id: string;
  slot: number;
  state: ContextState;
  jobsServed: number;
  lastError?: string;
  holder: string | null;
  createdAt: string;
}

/**
 * A single isolated browser environment.
 * The pool is the only component that drives these transitions.
 */
export class ExecutionContext extends Entity<ExecutionContextProps> {
  private constructor(props: ExecutionContextProps, id?: string) {
    super(props, id);
  }

  static create(slot: number, id?: string): ExecutionContext {
    return new ExecutionContext(
      {
        slot,
        state: 'cold',
        jobsServed: 0,
        holder: null,
        lastReleasedAt: null,
        closedAt: null,
      },
      id
    );
  }

  get slot(): number {
    return this.props.slot;
  }

  get state(): ContextState {
    return this.props.state;
  }

  get jobsServed(): number {
    return this.props.jobsServed;
  }

  get lastError(): string | undefined {
    return this.props.lastError;
  }

  get holder(): string | null {
    return this.props.holder;
  }

  get lastReleasedAt(): Date | null {
    return this.props.lastReleasedAt;
  }

  /**
   * Engine handle is up; the context can take work.
   * From busy this also counts the finished job.
   */
  markReady(at: Date = new Date()): void {
    const wasBusy = this.props.state === 'busy';
    this.transition('ready');
    if (wasBusy) {
      this.props.jobsServed++;
      this.props.holder = null;
    }
    this.props.lastReleasedAt = at;
  }

  markBusy(holder: string): void {
    this.transition('busy');
    this.props.holder = holder;
  }

  markUnhealthy(reason: string): void {
    const wasBusy = this.props.state === 'busy';
    this.transition('unhealthy');
    if (wasBusy) {
      this.props.jobsServed++;
      this.props.holder = null;
    }
    this.props.lastError = reason;
  }

  markClosed(at: Date = new Date()): void {
    this.transition('closed');
    this.props.closedAt = at;
  }

  /**
   * Whether the context has sat in `ready` for at least `idleMs`.
   */
  isIdleFor(idleMs: number, now: number = Date.now()): boolean {
    if (this.props.state !== 'ready') {
      return false;
    }
    const since = (this.props.lastReleasedAt ?? this._createdAt).getTime();
    return now - since >= idleMs;
  }

  canTransitionTo(next: ContextState): boolean {
    return ALLOWED_TRANSITIONS[this.props.state].includes(next);
  }

  private transition(next: ContextState): void {
    if (!this.canTransitionTo(next)) {
      throw new InvalidStateTransitionError('ExecutionContext', this.props.state, next);
    }
    this.props.state = next;
  }

  toJSON(): ExecutionContextSnapshot {
    return {
      id: this._id,
      slot: this.props.slot,
      state: this.props.state,
      jobsServed: this.props.jobsServed,
      lastError: this.props.lastError,
      holder: this.props.holder,
      createdAt: this._createdAt.toISOString(),
    };
  }
}
