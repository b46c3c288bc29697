export * from './payment-state-reconciler';
export * from './failed-order-recovery.service';
export * from './checkout-reconciliation.service';
export * from './checkout.service';
