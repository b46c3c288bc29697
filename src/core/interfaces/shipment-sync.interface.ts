import { Order } from '../domain/models';

/**
 * Order shipment subsystem - asked to resynchronize shipments after a
 * payment was repaired. Failures must propagate to the caller.
 */
export interface ShipmentSync {
  resync(order: Order): Promise<void>;
}

export class ShipmentSyncError extends Error {
  constructor(
    message: string,
    public readonly orderId: string,
    public readonly statusCode?: number,
  ) {
    super(message);
    this.name = 'ShipmentSyncError';
  }
}
