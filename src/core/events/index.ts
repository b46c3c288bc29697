/**
 * Reconciliation event system
 */

export { EventDispatcherImpl } from './event-dispatcher.impl';

// Built-in event handlers
export { LoggingEventHandler } from './handlers/logging.handler';
export type { EventLogLevel, EventLogger } from './handlers/logging.handler';
