import { Logger } from '@nestjs/common';
import { EventHandler, ReconciliationEventPayload } from '../../interfaces';
import { ReconciliationEventType } from '../../domain/enums';

export type EventLogLevel = 'verbose' | 'normal' | 'minimal';

/**
 * Minimal logger surface, satisfied by Nest's Logger
 */
export interface EventLogger {
  log(message: string): void;
  warn(message: string): void;
}

const WARNING_EVENTS: ReadonlySet<string> = new Set([
  ReconciliationEventType.CHECKOUT_REFRESH_FAILED,
  ReconciliationEventType.CHECKOUT_STATUS_UNRECOGNIZED,
  ReconciliationEventType.ORDER_RECOVERY_FAILED,
]);

/**
 * Logging event handler
 * Logs all reconciliation events for debugging and monitoring
 */
export class LoggingEventHandler {
  constructor(
    private readonly logger: EventLogger = new Logger('ReconciliationEvents'),
    private readonly logLevel: EventLogLevel = 'normal',
  ) {}

  /**
   * Create the event handler function
   */
  getHandler(): EventHandler {
    return (eventType: string, payload: ReconciliationEventPayload) => {
      const line = `[${eventType}] ${JSON.stringify(
        this.prepareLogData(payload),
      )}`;

      if (WARNING_EVENTS.has(eventType)) {
        this.logger.warn(line);
      } else {
        this.logger.log(line);
      }
    };
  }

  /**
   * Prepare log data based on log level
   */
  prepareLogData(payload: ReconciliationEventPayload): Record<string, unknown> {
    switch (this.logLevel) {
      case 'verbose':
        return { ...payload };

      case 'minimal':
        return {
          checkoutId: payload.checkoutId,
          orderId: payload.orderId,
        };

      case 'normal':
      default:
        return {
          runId: payload.runId,
          checkoutId: payload.checkoutId,
          paymentId: payload.paymentId,
          orderId: payload.orderId,
          error: payload.error,
        };
    }
  }
}
