import { ReconciliationEventType } from '../domain/enums';

/**
 * Payload sent with every reconciliation event
 */
export interface ReconciliationEventPayload {
  runId?: string;
  checkoutId?: string;
  paymentId?: string;
  orderId?: string;
  error?: string;
  details?: Record<string, unknown>;
}

/**
 * Event handler function signature
 */
export type EventHandler = (
  eventType: string,
  payload: ReconciliationEventPayload,
) => Promise<void> | void;

export interface EventSubscription {
  id: string;
  unsubscribe(): void;
}

/**
 * Event dispatcher interface - handles event emission to registered handlers
 */
export interface EventDispatcher {
  /**
   * Register an event handler
   */
  on(eventType: ReconciliationEventType | string, handler: EventHandler): EventSubscription;

  /**
   * Register a handler for all event types
   */
  onAll(handler: EventHandler): EventSubscription;

  off(eventType: ReconciliationEventType | string, handler: EventHandler): void;

  /**
   * Dispatch an event; handler failures never reach the caller
   */
  dispatch(
    eventType: ReconciliationEventType | string,
    payload: ReconciliationEventPayload,
  ): Promise<void>;

  getHandlers(eventType: ReconciliationEventType | string): EventHandler[];
}
