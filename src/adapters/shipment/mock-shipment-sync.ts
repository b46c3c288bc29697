import { Order, ShipmentSync, ShipmentSyncError } from '../../core';

/**
 * Mock shipment sync for testing
 */
export class MockShipmentSync implements ShipmentSync {
  readonly resynced: string[] = [];
  private failing: Set<string> = new Set();

  async resync(order: Order): Promise<void> {
    if (this.failing.has(order.id)) {
      throw new ShipmentSyncError(
        `Simulated shipment failure for order ${order.number}`,
        order.id,
        503,
      );
    }
    this.resynced.push(order.id);
  }

  failFor(orderId: string): void {
    this.failing.add(orderId);
  }

  reset(): void {
    this.resynced.length = 0;
    this.failing.clear();
  }
}
