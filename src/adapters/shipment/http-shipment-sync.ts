import { Logger } from '@nestjs/common';
import { Order, ShipmentSync, ShipmentSyncError } from '../../core';

export interface HttpShipmentSyncOptions {
  timeout?: number;
  headers?: Record<string, string>;
}

/**
 * Asks the order service to rebuild shipments for an order.
 * POSTs `{ orderId, orderNumber }` to the configured URL.
 */
export class HttpShipmentSync implements ShipmentSync {
  private readonly logger = new Logger(HttpShipmentSync.name);
  private readonly timeout: number;

  constructor(
    private readonly url: string,
    private readonly options: HttpShipmentSyncOptions = {},
  ) {
    this.timeout = options.timeout || 10000;
  }

  async resync(order: Order): Promise<void> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    let response: Response;
    try {
      response = await fetch(this.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          ...this.options.headers,
        },
        body: JSON.stringify({ orderId: order.id, orderNumber: order.number }),
        signal: controller.signal,
      });
    } catch (error) {
      throw new ShipmentSyncError(
        `Shipment resync request failed for order ${order.number}: ${error instanceof Error ? error.message : String(error)}`,
        order.id,
      );
    } finally {
      clearTimeout(timeoutId);
    }

    if (!response.ok) {
      throw new ShipmentSyncError(
        `Shipment resync rejected for order ${order.number}: ${response.status} ${response.statusText}`,
        order.id,
        response.status,
      );
    }

    this.logger.debug(`Shipments resynchronized for order ${order.number}`);
  }
}
