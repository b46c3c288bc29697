/**
 * Operation applied to a payment in response to an observed
 * checkout state transition
 */
export enum PaymentAction {
  PEND = 'pend',
  VOID = 'void',
  COMPLETE = 'complete',
  FAILURE = 'failure',
}
