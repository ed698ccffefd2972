import { AutomationSteps, BrowserEnginePort } from '../../ports/BrowserEnginePort';
import { ContextLease } from '../pool/ContextPool';
import { describeError } from '../../../domain/errors/OrchestratorErrors';
import { withTimeout } from '../../utils/timing';
import { Logger, getLogger } from '../../../infrastructure/logging';

/**
 * Result of running steps on a context. `clean` reports whether the engine
 * confirmed the context is still usable after a step error.
 */
export type RunOutcome<T> =
  | { kind: 'succeeded'; result: T }
  | { kind: 'failed'; error: unknown; clean: boolean }
  | { kind: 'timed_out' }
  | { kind: 'cancelled'; reason: string };

export interface RunOptions {
  /** Absolute deadline (epoch ms) */
  deadline: number;
  /** Aborting this cancels the run immediately */
  signal?: AbortSignal;
}

/**
 * Upper bound on the post-fault health probe.
 */
const HEALTH_PROBE_TIMEOUT_MS = 2000;

/**
 * Runs automation steps against a loaned context under a deadline.
 *
 * Never retries. Once the deadline passes or the run is cancelled the outcome is
 * fixed; the engine's own promise is still observed so its eventual rejection
 * (typically caused by teardown) is not left unhandled. Steps that reject before
 * the deadline always report `failed`, however long the health probe takes.
 */
export class ContextRunner {
  private logger: Logger;

  constructor(private readonly engine: BrowserEnginePort) {
    this.logger = getLogger('Engine');
  }

  run<T>(lease: ContextLease, steps: AutomationSteps<T>, options: RunOptions): Promise<RunOutcome<T>> {
    const { signal } = options;
    if (signal?.aborted) {
      return Promise.resolve({ kind: 'cancelled', reason: describeError(signal.reason) });
    }

    const remaining = options.deadline - Date.now();
    if (remaining <= 0) {
      return Promise.resolve({ kind: 'timed_out' });
    }

    return new Promise<RunOutcome<T>>(resolve => {
      const controller = new AbortController();
      let settled = false;

      const disarm = (): void => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
      };

      const finish = (outcome: RunOutcome<T>): void => {
        if (settled) {
          return;
        }
        settled = true;
        disarm();
        resolve(outcome);
      };

      const onAbort = (): void => {
        const reason = describeError(signal?.reason);
        controller.abort(reason);
        finish({ kind: 'cancelled', reason });
      };

      const timer = setTimeout(() => {
        controller.abort('deadline exceeded');
        finish({ kind: 'timed_out' });
      }, remaining);

      signal?.addEventListener('abort', onAbort, { once: true });

      const execution = Promise.resolve().then(() =>
        this.engine.execute(lease.handle, steps, controller.signal)
      );

      void execution.then(
        result => finish({ kind: 'succeeded', result }),
        async (error: unknown) => {
          if (settled) {
            this.logger.debug('Steps rejected after the run was settled', {
              contextId: lease.contextId,
              error: describeError(error),
            });
            return;
          }
          // Ended before the deadline: the outcome is failed however long the health check takes
          disarm();
          const clean = await this.confirmClean(lease);
          finish({ kind: 'failed', error, clean });
        }
      );
    });
  }

  /**
   * Ask the engine whether the context survived a step error.
   * A probe that fails or hangs counts as unclean.
   */
  private async confirmClean(lease: ContextLease): Promise<boolean> {
    try {
      return await withTimeout(
        this.engine.isHealthy(lease.handle),
        HEALTH_PROBE_TIMEOUT_MS,
        () => new Error('health probe timed out')
      );
    } catch (error) {
      this.logger.warn('Health probe failed', {
        contextId: lease.contextId,
        error: describeError(error),
      });
      return false;
    }
  }
}
