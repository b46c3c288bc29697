/**
 * Local payment lifecycle states
 * Independent of any gateway vocabulary
 */
export enum PaymentState {
  /**
   * Created during checkout, nothing sent to the gateway yet
   */
  CHECKOUT = 'checkout',

  PROCESSING = 'processing',

  /**
   * Authorized, awaiting capture or settlement
   */
  PENDING = 'pending',

  /**
   * Funds captured
   */
  COMPLETED = 'completed',

  FAILED = 'failed',

  VOID = 'void',

  INVALID = 'invalid',
}
