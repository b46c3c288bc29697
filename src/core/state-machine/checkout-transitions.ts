import { CheckoutState, PaymentAction } from '../domain/enums';
import { CheckoutStateChange } from '../domain/models';
import {
  mapCheckoutStateToPaymentState,
  mapStatusToAction,
} from '../mapping/state-mapper';

/**
 * Payment action owed for a persisted checkout state change.
 *
 * Returns null when the write did not actually change the state, so a
 * re-save of the same value never produces a side effect.
 */
export function resolvePaymentAction(
  change: CheckoutStateChange,
): PaymentAction | null {
  if (change.previousState === change.state) {
    return null;
  }
  return paymentActionForState(change.state);
}

/**
 * Two-stage mapping: checkout state -> payment state -> action
 */
export function paymentActionForState(state: CheckoutState): PaymentAction {
  return mapStatusToAction(mapCheckoutStateToPaymentState(state));
}
