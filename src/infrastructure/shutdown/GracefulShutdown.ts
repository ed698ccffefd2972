/**
 * GracefulShutdown
 *
 * Turns process signals and fatal errors into one orderly shutdown:
 * registered handlers run last-in first-out, each bounded by a timeout,
 * then the process exits.
 */

import { Logger, getLogger } from '../../infrastructure/logging';
import { describeError } from '../../domain/errors/OrchestratorErrors';
import { withTimeout } from '../../application/utils/timing';

export type ShutdownHandler = (reason: string) => Promise<void>;

export interface GracefulShutdownOptions {
  /** Upper bound per handler (default: 60000) */
  handlerTimeoutMs?: number;
  /** Replaces process.exit, mainly for tests */
  exit?: (code: number) => void;
}

interface NamedHandler {
  name: string;
  handler: ShutdownHandler;
}

/**
 * Manages graceful shutdown of the application.
 */
export class GracefulShutdown {
  private static instance: GracefulShutdown | null = null;
  private logger: Logger;
  private handlers: NamedHandler[] = [];
  private isShuttingDown = false;
  private listeners: Array<{ event: string; listener: (...args: unknown[]) => void }> = [];
  private handlerTimeoutMs: number;
  private exit: (code: number) => void;

  private constructor(options: GracefulShutdownOptions = {}) {
    this.logger = getLogger('Shutdown');
    this.handlerTimeoutMs = options.handlerTimeoutMs ?? 60000;
    this.exit = options.exit ?? ((code: number) => process.exit(code));
  }

  /**
   * Get singleton instance. Options apply only when the instance is first created.
   */
  static getInstance(options?: GracefulShutdownOptions): GracefulShutdown {
    if (!GracefulShutdown.instance) {
      GracefulShutdown.instance = new GracefulShutdown(options);
    }
    return GracefulShutdown.instance;
  }

  /**
   * Register a cleanup handler to run during shutdown.
   * Handlers are called in LIFO order (last registered first).
   */
  registerHandler(name: string, handler: ShutdownHandler): void {
    this.handlers.push({ name, handler });
  }

  removeHandler(name: string): void {
    this.handlers = this.handlers.filter(entry => entry.name !== name);
  }

  /**
   * Register process event listeners.
   */
  register(): void {
    if (this.listeners.length > 0) {
      return;
    }

    this.listen('SIGINT', () => {
      this.logger.info('Received SIGINT signal');
      void this.shutdown('SIGINT');
    });

    this.listen('SIGTERM', () => {
      this.logger.info('Received SIGTERM signal');
      void this.shutdown('SIGTERM');
    });

    this.listen('uncaughtException', (error: unknown) => {
      this.logger.error('Uncaught exception', {
        error: describeError(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
      void this.shutdown('uncaughtException');
    });

    this.listen('unhandledRejection', (reason: unknown) => {
      this.logger.error('Unhandled rejection', { reason: describeError(reason) });
      void this.shutdown('unhandledRejection');
    });

    this.logger.debug('Graceful shutdown handlers registered');
  }

  /**
   * Remove the process listeners added by register().
   */
  unregister(): void {
    for (const { event, listener } of this.listeners) {
      process.removeListener(event, listener);
    }
    this.listeners = [];
  }

  /**
   * Execute shutdown sequence.
   */
  async shutdown(reason: string): Promise<void> {
    if (this.isShuttingDown) {
      this.logger.warn('Shutdown already in progress');
      return;
    }

    this.isShuttingDown = true;
    this.logger.info(`Starting graceful shutdown (reason: ${reason})`);

    const handlersToRun = [...this.handlers].reverse();

    for (const { name, handler } of handlersToRun) {
      try {
        this.logger.debug(`Running shutdown handler '${name}'`);
        await withTimeout(
          handler(reason),
          this.handlerTimeoutMs,
          () => new Error(`handler exceeded ${this.handlerTimeoutMs}ms`)
        );
      } catch (error) {
        this.logger.error(`Shutdown handler '${name}' failed`, { error: describeError(error) });
      }
    }

    this.logger.info('Graceful shutdown complete');

    const exitCode = reason === 'SIGINT' || reason === 'SIGTERM' || reason === 'completed' ? 0 : 1;
    this.exit(exitCode);
  }

  isInProgress(): boolean {
    return this.isShuttingDown;
  }

  /**
   * Reset instance (for testing).
   */
  static reset(): void {
    if (GracefulShutdown.instance) {
      GracefulShutdown.instance.unregister();
      GracefulShutdown.instance.handlers = [];
      GracefulShutdown.instance.isShuttingDown = false;
    }
    GracefulShutdown.instance = null;
  }

  private listen(event: string, listener: (...args: unknown[]) => void): void {
    process.on(event, listener);
    this.listeners.push({ event, listener });
  }
}

/**
 * Convenience function to register a shutdown handler.
 */
export function onShutdown(name: string, handler: ShutdownHandler): void {
  GracefulShutdown.getInstance().registerHandler(name, handler);
}

/**
 * Initialize graceful shutdown handling.
 */
export function initGracefulShutdown(options?: GracefulShutdownOptions): GracefulShutdown {
  const shutdown = GracefulShutdown.getInstance(options);
  shutdown.register();
  return shutdown;
}
