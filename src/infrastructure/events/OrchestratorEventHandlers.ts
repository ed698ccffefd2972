import { EventBus, EventHandler, DomainEvent } from '../../domain/events/DomainEvent';
import {
  ContextClosedEvent,
  ContextCreatedEvent,
  ContextCreationFailedEvent,
  ContextUnhealthyEvent,
  JobCompletedEvent,
  JobStartedEvent,
  JobSubmittedEvent,
  PoolDegradedEvent,
  PoolRecoveredEvent,
} from '../../domain/events/OrchestratorEvents';
import { loggers } from '../logging';

/**
 * Event handlers for orchestrator events.
 * Connects domain events to log output; lifecycle chatter only when verbose.
 */
export class OrchestratorEventHandlers {
  private subscriptions: Array<() => void> = [];

  constructor(
    private readonly eventBus: EventBus,
    private readonly verbose: boolean = false
  ) {}

  /**
   * Register all event handlers.
   */
  register(): void {
    if (this.subscriptions.length > 0) {
      return;
    }
    this.registerHandler(JobSubmittedEvent.TYPE, this.handleJobSubmitted.bind(this));
    this.registerHandler(JobStartedEvent.TYPE, this.handleJobStarted.bind(this));
    this.registerHandler(JobCompletedEvent.TYPE, this.handleJobCompleted.bind(this));
    this.registerHandler(ContextCreatedEvent.TYPE, this.handleContextCreated.bind(this));
    this.registerHandler(ContextCreationFailedEvent.TYPE, this.handleCreationFailed.bind(this));
    this.registerHandler(ContextUnhealthyEvent.TYPE, this.handleContextUnhealthy.bind(this));
    this.registerHandler(ContextClosedEvent.TYPE, this.handleContextClosed.bind(this));
    this.registerHandler(PoolDegradedEvent.TYPE, this.handlePoolDegraded.bind(this));
    this.registerHandler(PoolRecoveredEvent.TYPE, this.handlePoolRecovered.bind(this));
  }

  /**
   * Unregister all event handlers.
   */
  unregister(): void {
    for (const unsubscribe of this.subscriptions) {
      unsubscribe();
    }
    this.subscriptions = [];
  }

  private registerHandler<T extends DomainEvent>(eventType: string, handler: EventHandler<T>): void {
    this.eventBus.subscribe(eventType, handler);
    this.subscriptions.push(() => this.eventBus.unsubscribe(eventType, handler));
  }

  private handleJobSubmitted(event: JobSubmittedEvent): void {
    if (this.verbose) {
      loggers.event.info(`Job ${event.aggregateId} queued`, {
        label: event.label,
        queueDepth: event.queueDepth,
      });
    }
  }

  private handleJobStarted(event: JobStartedEvent): void {
    if (this.verbose) {
      loggers.event.info(`Job ${event.aggregateId} started`, {
        contextId: event.contextId,
        waitedMs: event.waitedMs,
      });
    }
  }

  private handleJobCompleted(event: JobCompletedEvent): void {
    if (event.status === 'succeeded') {
      if (this.verbose) {
        loggers.event.info(`Job ${event.aggregateId} succeeded`, { durationMs: event.durationMs });
      }
      return;
    }
    loggers.event.warn(`Job ${event.aggregateId} ${event.status}`, {
      durationMs: event.durationMs,
      code: event.fault?.code,
      message: event.fault?.message,
    });
  }

  private handleContextCreated(event: ContextCreatedEvent): void {
    if (this.verbose) {
      loggers.event.info(`Context ${event.aggregateId} created`, {
        slot: event.slot,
        attempts: event.attempts,
      });
    }
  }

  private handleCreationFailed(event: ContextCreationFailedEvent): void {
    loggers.event.error(`Context creation failed in slot ${event.slot}`, {
      attempts: event.attempts,
      error: event.error,
    });
  }

  private handleContextUnhealthy(event: ContextUnhealthyEvent): void {
    if (this.verbose) {
      loggers.event.info(`Context ${event.aggregateId} unhealthy`, {
        cause: event.cause,
        reason: event.reason,
      });
    }
  }

  private handleContextClosed(event: ContextClosedEvent): void {
    if (this.verbose) {
      loggers.event.info(`Context ${event.aggregateId} closed`, {
        slot: event.slot,
        reason: event.reason,
      });
    }
  }

  private handlePoolDegraded(event: PoolDegradedEvent): void {
    loggers.event.warn('Pool degraded', {
      failuresInWindow: event.failuresInWindow,
      effectiveCapacity: event.effectiveCapacity,
      retryAfterMs: event.retryAfterMs,
    });
  }

  private handlePoolRecovered(event: PoolRecoveredEvent): void {
    loggers.event.info('Pool recovered', { effectiveCapacity: event.effectiveCapacity });
  }
}
