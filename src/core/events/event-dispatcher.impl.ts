import { Logger } from '@nestjs/common';
import {
  EventDispatcher,
  EventHandler,
  EventSubscription,
  ReconciliationEventPayload,
} from '../interfaces';
import { ReconciliationEventType } from '../domain/enums';

/**
 * Default implementation of the EventDispatcher
 *
 * Supports multiple handlers per event type with error isolation.
 */
export class EventDispatcherImpl implements EventDispatcher {
  private readonly logger = new Logger(EventDispatcherImpl.name);
  private handlers: Map<string, Set<EventHandler>> = new Map();
  private globalHandlers: Set<EventHandler> = new Set();
  private subscriptionIdCounter = 0;

  on(
    eventType: ReconciliationEventType | string,
    handler: EventHandler,
  ): EventSubscription {
    let handlers = this.handlers.get(eventType);
    if (!handlers) {
      handlers = new Set();
      this.handlers.set(eventType, handlers);
    }
    handlers.add(handler);

    return {
      id: `sub_${++this.subscriptionIdCounter}`,
      unsubscribe: () => this.off(eventType, handler),
    };
  }

  onAll(handler: EventHandler): EventSubscription {
    this.globalHandlers.add(handler);

    return {
      id: `sub_${++this.subscriptionIdCounter}`,
      unsubscribe: () => {
        this.globalHandlers.delete(handler);
      },
    };
  }

  off(eventType: ReconciliationEventType | string, handler: EventHandler): void {
    const handlers = this.handlers.get(eventType);
    if (handlers) {
      handlers.delete(handler);
      if (handlers.size === 0) {
        this.handlers.delete(eventType);
      }
    }
  }

  /**
   * Dispatch an event to all registered handlers
   */
  async dispatch(
    eventType: ReconciliationEventType | string,
    payload: ReconciliationEventPayload,
  ): Promise<void> {
    const errors: Array<{ handler: string; error: Error }> = [];
    const handlers = this.getHandlers(eventType);

    const results = await Promise.allSettled(
      handlers.map(async (handler) => handler(eventType, payload)),
    );

    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        errors.push({
          handler: handlers[index]?.name || 'anonymous',
          error:
            result.reason instanceof Error
              ? result.reason
              : new Error(String(result.reason)),
        });
      }
    });

    // Log errors if any (but don't throw)
    for (const { handler, error } of errors) {
      this.logger.error(
        `Handler ${handler} failed for ${eventType}: ${error.message}`,
        error.stack,
      );
    }
  }

  getHandlers(eventType: ReconciliationEventType | string): EventHandler[] {
    const specificHandlers = Array.from(this.handlers.get(eventType) || []);
    return [...specificHandlers, ...this.globalHandlers];
  }

  hasHandlers(eventType: ReconciliationEventType | string): boolean {
    return this.getHandlers(eventType).length > 0;
  }

  removeAllHandlers(): void {
    this.handlers.clear();
    this.globalHandlers.clear();
  }
}
