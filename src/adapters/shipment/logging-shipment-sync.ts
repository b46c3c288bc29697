import { Logger } from '@nestjs/common';
import { Order, ShipmentSync } from '../../core';

/**
 * Used when no shipment service is configured: records the request only
 */
export class LoggingShipmentSync implements ShipmentSync {
  private readonly logger = new Logger('ShipmentSync');

  async resync(order: Order): Promise<void> {
    this.logger.log(`Shipment resync requested for order ${order.number}`);
  }
}
