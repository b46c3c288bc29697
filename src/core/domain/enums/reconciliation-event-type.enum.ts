/**
 * Events emitted by the reconciliation engine
 */
export enum ReconciliationEventType {
  /**
   * A checkout state change was persisted
   */
  CHECKOUT_STATE_CHANGED = 'checkout.state_changed',

  /**
   * Refreshing a single checkout failed (gateway or persistence)
   */
  CHECKOUT_REFRESH_FAILED = 'checkout.refresh_failed',

  /**
   * Gateway returned a status outside the known vocabulary
   */
  CHECKOUT_STATUS_UNRECOGNIZED = 'checkout.status_unrecognized',

  PAYMENT_ACTION_APPLIED = 'payment.action_applied',

  /**
   * A failed order with a settled checkout was repaired
   */
  ORDER_RECOVERED = 'order.recovered',

  ORDER_RECOVERY_FAILED = 'order.recovery_failed',

  RECONCILIATION_COMPLETED = 'reconciliation.completed',
}
