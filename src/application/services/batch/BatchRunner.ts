import { BatchFile } from '../../../domain/automation/StepScript';
import { JobStatus, JobOutcome } from '../../../domain/jobs/JobOutcome';
import {
  CapacityExceededError,
  JobFault,
  toJobFault,
} from '../../../domain/errors/OrchestratorErrors';
import { JobHandle, JobSpec } from '../scheduler/Scheduler';
import { ExtractionResult, StepScriptCompiler } from '../automation/StepScriptCompiler';
import { sleep } from '../../utils/timing';
import { Logger, getLogger } from '../../../infrastructure/logging';

/**
 * What the batch runner needs from the orchestrator.
 */
export interface JobSubmitter {
  submit<T>(spec: JobSpec<T>): JobHandle<T>;
  /** Resolves once the queue has room again */
  waitForQueueSpace(): Promise<void>;
}

/**
 * `rejected` means the job was never admitted.
 */
export type BatchJobStatus = JobStatus | 'rejected';

export interface BatchJobReport {
  index: number;
  id?: string;
  label?: string;
  status: BatchJobStatus;
  result?: ExtractionResult;
  fault?: JobFault;
  durationMs?: number;
}

export interface BatchReport {
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  summary: Record<BatchJobStatus, number>;
  jobs: BatchJobReport[];
}

/**
 * Submits every job of a batch file and collects one report entry per job.
 *
 * A failing job never stops the rest. When the queue is full while its own jobs are
 * in flight the runner waits for queue space and tries again; execution itself is
 * never retried. `defaults.delayMs` spaces out submissions.
 */
export class BatchRunner {
  private readonly logger: Logger;

  constructor(
    private readonly submitter: JobSubmitter,
    private readonly compiler: StepScriptCompiler = new StepScriptCompiler()
  ) {
    this.logger = getLogger('Batch');
  }

  async run(batch: BatchFile): Promise<BatchReport> {
    const started = Date.now();
    const reports = new Array<BatchJobReport>(batch.jobs.length);
    const inFlight: Set<Promise<void>> = new Set();
    const delayMs = batch.defaults?.delayMs ?? 0;

    this.logger.info('Starting batch', { jobs: batch.jobs.length });

    for (let index = 0; index < batch.jobs.length; index++) {
      if (index > 0 && delayMs > 0) {
        await sleep(delayMs);
      }
      const entry = batch.jobs[index];
      const spec: JobSpec<ExtractionResult> = {
        id: entry.id,
        label: entry.label ?? entry.id,
        timeoutMs: entry.timeoutMs ?? batch.defaults?.timeoutMs,
        steps: this.compiler.compile(entry.steps),
      };

      const handle = await this.admit(spec, inFlight, index, reports);
      if (!handle) {
        continue;
      }

      const tracked = handle.outcome.then(outcome => {
        reports[index] = this.toReport(index, outcome);
        this.logger.info(`Job ${outcome.status}`, { jobId: outcome.jobId, label: outcome.label });
        inFlight.delete(tracked);
      });
      inFlight.add(tracked);
    }

    await Promise.all(inFlight);

    const finished = Date.now();
    const report: BatchReport = {
      startedAt: new Date(started).toISOString(),
      finishedAt: new Date(finished).toISOString(),
      durationMs: finished - started,
      summary: summarize(reports),
      jobs: reports,
    };
    this.logger.info('Batch finished', { ...report.summary, durationMs: report.durationMs });
    return report;
  }

  /**
   * Submit, backing off on a full queue while other jobs are still running.
   */
  private async admit(
    spec: JobSpec<ExtractionResult>,
    inFlight: Set<Promise<void>>,
    index: number,
    reports: BatchJobReport[]
  ): Promise<JobHandle<ExtractionResult> | null> {
    for (;;) {
      try {
        return this.submitter.submit(spec);
      } catch (error) {
        if (error instanceof CapacityExceededError && inFlight.size > 0) {
          this.logger.debug('Queue full, waiting for space', { index });
          await this.submitter.waitForQueueSpace();
          continue;
        }
        const fault = toJobFault(error);
        this.logger.warn('Job rejected', { index, code: fault.code, message: fault.message });
        reports[index] = { index, id: spec.id, label: spec.label, status: 'rejected', fault };
        return null;
      }
    }
  }

  private toReport(index: number, outcome: JobOutcome<ExtractionResult>): BatchJobReport {
    const base = {
      index,
      id: outcome.jobId,
      label: outcome.label,
      durationMs: outcome.durationMs,
    };
    return outcome.status === 'succeeded'
      ? { ...base, status: outcome.status, result: outcome.result }
      : { ...base, status: outcome.status, fault: outcome.fault };
  }
}

function summarize(reports: BatchJobReport[]): Record<BatchJobStatus, number> {
  const summary: Record<BatchJobStatus, number> = {
    succeeded: 0,
    failed: 0,
    timed_out: 0,
    cancelled: 0,
    rejected: 0,
  };
  for (const report of reports) {
    summary[report.status]++;
  }
  return summary;
}
