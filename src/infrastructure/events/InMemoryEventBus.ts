import { EventBus, DomainEvent, EventHandler } from '../../domain/events/DomainEvent';
import { loggers } from '../logging';

/**
 * In-memory implementation of EventBus.
 * Suitable for single-process applications.
 */
export class InMemoryEventBus implements EventBus {
  private handlers: Map<string, Set<EventHandler>> = new Map();
  private eventHistory: DomainEvent[] = [];
  private maxHistorySize: number;

  constructor(options?: { maxHistorySize?: number }) {
    this.maxHistorySize = options?.maxHistorySize ?? 1000;
  }

  async publish<T extends DomainEvent>(event: T): Promise<void> {
    this.eventHistory.push(event);
    if (this.eventHistory.length > this.maxHistorySize) {
      this.eventHistory.shift();
    }

    const typeHandlers = this.handlers.get(event.type);
    if (!typeHandlers || typeHandlers.size === 0) {
      return;
    }

    // Handlers run in parallel; one failing handler never blocks the others
    const handlerPromises = Array.from(typeHandlers).map(async handler => {
      try {
        await handler(event);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        loggers.event.error(`Error in event handler for ${event.type}`, { error: message });
      }
    });

    await Promise.all(handlerPromises);
  }

  subscribe<T extends DomainEvent>(eventType: string, handler: EventHandler<T>): void {
    let typeHandlers = this.handlers.get(eventType);
    if (!typeHandlers) {
      typeHandlers = new Set();
      this.handlers.set(eventType, typeHandlers);
    }
    typeHandlers.add(handler as EventHandler);
  }

  unsubscribe<T extends DomainEvent>(eventType: string, handler: EventHandler<T>): void {
    const typeHandlers = this.handlers.get(eventType);
    if (typeHandlers) {
      typeHandlers.delete(handler as EventHandler);
    }
  }

  clear(): void {
    this.handlers.clear();
    this.eventHistory = [];
  }

  /**
   * Get event history (for debugging/testing).
   * Optionally filter by event type.
   */
  getHistory(eventType?: string): ReadonlyArray<DomainEvent> {
    if (eventType) {
      return this.eventHistory.filter(e => e.type === eventType);
    }
    return [...this.eventHistory];
  }

  clearHistory(): void {
    this.eventHistory = [];
  }

  /**
   * Number of handlers subscribed to an event type.
   */
  handlerCount(eventType: string): number {
    return this.handlers.get(eventType)?.size ?? 0;
  }
}
