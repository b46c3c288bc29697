import { CheckoutState, PaymentAction, PaymentState } from '../domain/enums';

/**
 * Gateway card brand labels with a non-trivial local name.
 * Lookup is case-sensitive; any other label is lower-cased.
 */
const CARD_TYPE_LABELS: Readonly<Record<string, string>> = {
  AmericanExpress: 'american_express',
  'Diners Club': 'diners_club',
  MasterCard: 'master',
};

export function mapCardType(rawLabel?: string | null): string {
  if (!rawLabel) {
    return '';
  }
  if (Object.prototype.hasOwnProperty.call(CARD_TYPE_LABELS, rawLabel)) {
    return CARD_TYPE_LABELS[rawLabel];
  }
  return rawLabel.toLowerCase();
}

/**
 * Payment status -> payment action.
 * Anything not explicitly listed (unknown or error statuses included)
 * becomes a failure that needs investigation.
 */
export function mapStatusToAction(status: string): PaymentAction {
  switch (status) {
    case PaymentState.PENDING:
      return PaymentAction.PEND;
    case PaymentState.VOID:
      return PaymentAction.VOID;
    case PaymentState.COMPLETED:
      return PaymentAction.COMPLETE;
    default:
      return PaymentAction.FAILURE;
  }
}

/**
 * Checkout (gateway) state -> local payment state
 */
export function mapCheckoutStateToPaymentState(
  state: CheckoutState,
): PaymentState {
  switch (state) {
    case CheckoutState.AUTHORIZING:
    case CheckoutState.AUTHORIZED:
    case CheckoutState.SETTLEMENT_PENDING:
      return PaymentState.PENDING;
    case CheckoutState.VOIDED:
      return PaymentState.VOID;
    case CheckoutState.SUBMITTED_FOR_SETTLEMENT:
    case CheckoutState.SETTLING:
    case CheckoutState.SETTLEMENT_CONFIRMED:
    case CheckoutState.SETTLED:
      return PaymentState.COMPLETED;
    default:
      return PaymentState.FAILED;
  }
}
