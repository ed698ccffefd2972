import { Job, JobState } from '../../../domain/jobs/Job';
import { JobOutcome } from '../../../domain/jobs/JobOutcome';
import { EventBus, DomainEvent } from '../../../domain/events/DomainEvent';
import {
  JobCompletedEvent,
  JobStartedEvent,
  JobSubmittedEvent,
} from '../../../domain/events/OrchestratorEvents';
import {
  CapacityExceededError,
  InvalidJobError,
  JobCancelledError,
  JobTimeoutError,
  OrchestratorStoppedError,
  describeError,
  toExecutionFault,
  toJobFault,
} from '../../../domain/errors/OrchestratorErrors';
import { AutomationSteps } from '../../ports/BrowserEnginePort';
import { ContextLease, ContextProvider, ReleaseDetail } from '../pool/ContextPool';
import { ContextRunner } from '../context/ContextRunner';
import { AdmissionPolicy } from '../health/CapacityCircuitBreaker';
import { JobQueue } from './JobQueue';
import { MAX_TIMER_DELAY_MS } from '../../../domain/shared/Timers';
import { createDeferred, settlesWithin } from '../../utils/timing';
import { Logger, getLogger } from '../../../infrastructure/logging';

/**
 * Configuration for the scheduler.
 */
export interface SchedulerConfig {
  /** Deadline applied when a job names none (default: 30000) */
  defaultJobTimeoutMs: number;
  /** Queue depth ceiling; submissions beyond it fail fast (default: 100) */
  maxQueueDepth: number;
  /** How long drainAndStop waits for running jobs before cancelling them (default: 30000) */
  shutdownGraceMs: number;
}

export const DEFAULT_SCHEDULER_CONFIG: SchedulerConfig = {
  defaultJobTimeoutMs: 30000,
  maxQueueDepth: 100,
  shutdownGraceMs: 30000,
};

/**
 * What a caller submits.
 */
export interface JobSpec<T> {
  steps: AutomationSteps<T>;
  timeoutMs?: number;
  payload?: unknown;
  label?: string;
  /** Caller-chosen id; must be unique among known jobs */
  id?: string;
}

/**
 * Returned by submit. `outcome` always resolves, never rejects.
 */
export interface JobHandle<T> {
  readonly id: string;
  readonly state: JobState;
  readonly outcome: Promise<JobOutcome<T>>;
  cancel(reason?: string): boolean;
}

export interface SchedulerStats {
  queued: number;
  maxQueueDepth: number;
  running: number;
  stopping: boolean;
}

interface JobRecord {
  readonly id: string;
  readonly job: Job<unknown>;
  readonly steps: AutomationSteps<unknown>;
  readonly deliver: () => void;
  controller: AbortController | null;
  execution: Promise<void> | null;
}

/**
 * Finished job states kept for lookups after delivery.
 */
const FINISHED_HISTORY_SIZE = 1000;

/**
 * Matches queued jobs to contexts and enforces their deadlines.
 *
 * A single dispatch loop waits for work, acquires a context for the head of the
 * queue and only then pops it, so dispatch start follows submission order and a
 * job cancelled while queued never holds a context.
 */
export class Scheduler {
  private readonly config: SchedulerConfig;
  private readonly logger: Logger;
  private readonly queue: JobQueue<JobRecord>;
  private readonly records: Map<string, JobRecord> = new Map();
  private readonly running: Map<string, JobRecord> = new Map();
  private readonly finished: Map<string, JobState> = new Map();
  private loop: Promise<void> | null = null;
  private loopController: AbortController | null = null;
  private stopping = false;
  private stopPromise: Promise<void> | null = null;

  constructor(
    private readonly pool: ContextProvider,
    private readonly runner: ContextRunner,
    private readonly events: EventBus,
    config: Partial<SchedulerConfig> = {},
    private readonly admission?: AdmissionPolicy
  ) {
    this.config = { ...DEFAULT_SCHEDULER_CONFIG, ...config };
    this.queue = new JobQueue<JobRecord>(this.config.maxQueueDepth);
    this.logger = getLogger('Scheduler');
  }

  /**
   * Start the dispatch loop. Jobs submitted before this wait in the queue.
   */
  start(): void {
    if (this.loop || this.stopping) {
      return;
    }
    const controller = new AbortController();
    this.loopController = controller;
    this.loop = this.runDispatchLoop(controller.signal);
    this.logger.debug('Dispatch loop started');
  }

  /**
   * Accept a job. Never blocks: the job is queued or the call throws.
   */
  submit<T>(spec: JobSpec<T>): JobHandle<T> {
    if (this.stopping) {
      throw new OrchestratorStoppedError();
    }
    this.admission?.assertAdmitting();

    const timeoutMs = spec.timeoutMs ?? this.config.defaultJobTimeoutMs;
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new InvalidJobError(`timeout must be a positive number of milliseconds, got ${timeoutMs}`);
    }
    if (timeoutMs > MAX_TIMER_DELAY_MS) {
      throw new InvalidJobError(`timeout must not exceed ${MAX_TIMER_DELAY_MS}ms, got ${timeoutMs}`);
    }
    if (typeof spec.steps !== 'function') {
      throw new InvalidJobError('steps must be a function');
    }
    if (spec.id !== undefined && (this.records.has(spec.id) || this.finished.has(spec.id))) {
      throw new InvalidJobError(`duplicate job id '${spec.id}'`);
    }
    if (this.queue.isFull()) {
      throw new CapacityExceededError(this.config.maxQueueDepth);
    }

    const job = Job.create<T>({ payload: spec.payload, timeoutMs, label: spec.label }, spec.id);
    const outcome = createDeferred<JobOutcome<T>>();
    const record: JobRecord = {
      id: job.id,
      job,
      steps: spec.steps,
      deliver: () => outcome.resolve(job.toOutcome()),
      controller: null,
      execution: null,
    };

    this.queue.enqueue(record);
    this.records.set(job.id, record);
    this.emit(new JobSubmittedEvent(job.id, this.queue.size(), job.label));

    return {
      id: job.id,
      get state(): JobState {
        return job.state;
      },
      outcome: outcome.promise,
      cancel: (reason?: string) => this.cancel(job.id, reason),
    };
  }

  /**
   * Cancel a job. Queued jobs are removed at once; running jobs are aborted and
   * their context is torn down. Returns false for unknown or finished jobs.
   */
  cancel(jobId: string, reason = 'cancelled by caller'): boolean {
    const record = this.records.get(jobId);
    if (!record || record.job.isTerminal()) {
      return false;
    }

    if (this.queue.remove(jobId)) {
      record.job.cancel(new JobCancelledError(reason).toFault());
      this.settle(record);
      return true;
    }

    const controller = record.controller;
    if (!controller || controller.signal.aborted) {
      return false;
    }
    this.logger.info('Cancelling running job', { jobId, reason });
    controller.abort(reason);
    return true;
  }

  /**
   * Resolves once a submission would no longer hit the queue ceiling.
   */
  waitForQueueSpace(): Promise<void> {
    return this.queue.waitForSpace();
  }

  getJobState(jobId: string): JobState | undefined {
    return this.records.get(jobId)?.job.state ?? this.finished.get(jobId);
  }

  stats(): SchedulerStats {
    return {
      queued: this.queue.size(),
      maxQueueDepth: this.config.maxQueueDepth,
      running: this.running.size,
      stopping: this.stopping,
    };
  }

  /**
   * Stop admission, cancel queued jobs, give running jobs the grace period and
   * cancel whatever is left. Every job has an outcome once this resolves.
   */
  drainAndStop(reason = 'shutdown requested'): Promise<void> {
    if (!this.stopPromise) {
      this.stopping = true;
      this.stopPromise = this.performStop(`shutdown: ${reason}`);
    }
    return this.stopPromise;
  }

  private async performStop(reason: string): Promise<void> {
    const queued = this.queue.drain();
    for (const record of queued) {
      record.job.cancel(new JobCancelledError(reason).toFault());
      this.settle(record);
    }
    this.logger.info('Stopping scheduler', { cancelledQueued: queued.length, running: this.running.size });

    this.loopController?.abort(reason);
    if (this.loop) {
      await this.loop;
    }

    const inFlight = this.inFlightExecutions();
    if (inFlight.length === 0) {
      return;
    }

    const finished = await settlesWithin(Promise.all(inFlight), this.config.shutdownGraceMs);
    if (!finished) {
      this.logger.warn('Grace period elapsed, cancelling running jobs', {
        running: this.running.size,
        graceMs: this.config.shutdownGraceMs,
      });
      for (const record of this.running.values()) {
        record.controller?.abort(reason);
      }
      await Promise.all(this.inFlightExecutions());
    }
  }

  private inFlightExecutions(): Promise<void>[] {
    const executions: Promise<void>[] = [];
    for (const record of this.running.values()) {
      if (record.execution) {
        executions.push(record.execution);
      }
    }
    return executions;
  }

  private async runDispatchLoop(signal: AbortSignal): Promise<void> {
    try {
      while (!signal.aborted) {
        await this.queue.waitForItem(signal);
        const head = this.queue.peek();
        if (signal.aborted || !head) {
          continue;
        }

        let lease: ContextLease;
        try {
          lease = await this.pool.acquire({ holder: head.id, timeoutMs: 0, signal });
        } catch (error) {
          if (signal.aborted) {
            break;
          }
          this.failHead(error);
          continue;
        }

        const record = this.queue.dequeue();
        if (!record) {
          // Everything queued was cancelled while the context was being acquired
          await this.releaseLease(lease, true);
          continue;
        }
        this.running.set(record.id, record);
        record.execution = this.execute(record, lease);
      }
    } catch (error) {
      this.logger.error('Dispatch loop stopped unexpectedly', { error: describeError(error) });
    }
    this.logger.debug('Dispatch loop exited');
  }

  /**
   * The pool could not supply a context; the job at the head of the queue takes the fault.
   */
  private failHead(error: unknown): void {
    const record = this.queue.dequeue();
    if (!record) {
      return;
    }
    this.logger.warn('Could not acquire a context for job', {
      jobId: record.id,
      error: describeError(error),
    });
    record.job.fail(toJobFault(error));
    this.settle(record);
  }

  /**
   * Run one job on its leased context. Never rejects.
   */
  private async execute(record: JobRecord, lease: ContextLease): Promise<void> {
    const { job } = record;
    const controller = new AbortController();
    record.controller = controller;

    let healthy = true;
    let detail: ReleaseDetail | undefined;

    try {
      job.assign(lease.contextId);
      job.start();
      this.emit(new JobStartedEvent(job.id, lease.contextId, Date.now() - job.submittedAt.getTime()));

      const outcome = await this.runner.run(lease, record.steps, {
        deadline: Date.now() + job.timeoutMs,
        signal: controller.signal,
      });

      switch (outcome.kind) {
        case 'succeeded':
          job.succeed(outcome.result);
          break;
        case 'failed':
          job.fail(toExecutionFault(outcome.error));
          if (!outcome.clean) {
            healthy = false;
            detail = { cause: 'fault', reason: describeError(outcome.error) };
          }
          break;
        case 'timed_out':
          job.timeOut(new JobTimeoutError(job.timeoutMs).toFault());
          healthy = false;
          detail = { cause: 'timeout', reason: `deadline of ${job.timeoutMs}ms exceeded` };
          break;
        case 'cancelled':
          job.cancel(new JobCancelledError(outcome.reason).toFault());
          healthy = false;
          detail = { cause: 'cancelled', reason: outcome.reason };
          break;
      }
    } catch (error) {
      this.logger.error('Job execution failed unexpectedly', {
        jobId: job.id,
        error: describeError(error),
      });
      healthy = false;
      detail = { cause: 'fault', reason: describeError(error) };
      if (!job.isTerminal()) {
        job.fail(toJobFault(error));
      }
    }

    this.running.delete(record.id);
    this.settle(record);
    await this.releaseLease(lease, healthy, detail);
  }

  private async releaseLease(lease: ContextLease, healthy: boolean, detail?: ReleaseDetail): Promise<void> {
    try {
      await this.pool.release(lease, healthy, detail);
    } catch (error) {
      this.logger.error('Failed to release context', {
        contextId: lease.contextId,
        error: describeError(error),
      });
    }
  }

  /**
   * Deliver the outcome of a job that just became terminal.
   */
  private settle(record: JobRecord): void {
    const { job } = record;
    this.records.delete(record.id);
    this.finished.set(record.id, job.state);
    if (this.finished.size > FINISHED_HISTORY_SIZE) {
      const oldest = this.finished.keys().next();
      if (!oldest.done) {
        this.finished.delete(oldest.value);
      }
    }

    record.deliver();
    const outcome = job.toOutcome();
    this.emit(
      new JobCompletedEvent(
        job.id,
        outcome.status,
        outcome.durationMs,
        job.contextId,
        outcome.status === 'succeeded' ? undefined : outcome.fault
      )
    );
  }

  private emit(event: DomainEvent): void {
    void this.events.publish(event);
  }
}
