/**
 * Operator actions that may be issued against the gateway for a checkout
 * Eligibility is decided by the action guards, never enforced here
 */
export enum CheckoutAction {
  VOID = 'void',
  SETTLE = 'settle',
  CREDIT = 'credit',
}
