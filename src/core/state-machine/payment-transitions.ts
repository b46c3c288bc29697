import { PaymentAction, PaymentState } from '../domain/enums';

/**
 * Payment lifecycle rules: for each action, the states it may fire from
 * and the state it leads to
 */
export const PAYMENT_TRANSITIONS: Record<
  PaymentAction,
  { from: readonly PaymentState[]; to: PaymentState }
> = {
  [PaymentAction.PEND]: {
    from: [PaymentState.CHECKOUT, PaymentState.PROCESSING],
    to: PaymentState.PENDING,
  },
  [PaymentAction.COMPLETE]: {
    from: [PaymentState.CHECKOUT, PaymentState.PROCESSING, PaymentState.PENDING],
    to: PaymentState.COMPLETED,
  },
  [PaymentAction.VOID]: {
    from: [
      PaymentState.CHECKOUT,
      PaymentState.PROCESSING,
      PaymentState.PENDING,
      PaymentState.COMPLETED,
    ],
    to: PaymentState.VOID,
  },
  [PaymentAction.FAILURE]: {
    from: [PaymentState.CHECKOUT, PaymentState.PROCESSING, PaymentState.PENDING],
    to: PaymentState.FAILED,
  },
};

/**
 * Resulting payment state, or null when the action cannot fire
 */
export function targetStateFor(
  current: PaymentState,
  action: PaymentAction,
): PaymentState | null {
  const rule = PAYMENT_TRANSITIONS[action];
  return rule.from.includes(current) ? rule.to : null;
}
