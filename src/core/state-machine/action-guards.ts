import { CheckoutAction, CheckoutState } from '../domain/enums';

/**
 * Advisory guards consulted before an operator action is issued against
 * the gateway. Nothing in the reconciliation engine calls these actions.
 */

const VOIDABLE_STATES: readonly CheckoutState[] = [
  CheckoutState.AUTHORIZED,
  CheckoutState.SUBMITTED_FOR_SETTLEMENT,
];

const SETTLEABLE_STATES: readonly CheckoutState[] = [CheckoutState.AUTHORIZED];

const CREDITABLE_STATES: readonly CheckoutState[] = [
  CheckoutState.SETTLED,
  CheckoutState.SETTLING,
];

export function canVoid(state: CheckoutState): boolean {
  return VOIDABLE_STATES.includes(state);
}

export function canSettle(state: CheckoutState): boolean {
  return SETTLEABLE_STATES.includes(state);
}

export function canCredit(state: CheckoutState): boolean {
  return CREDITABLE_STATES.includes(state);
}

export function isActionAllowed(
  action: CheckoutAction,
  state: CheckoutState,
): boolean {
  switch (action) {
    case CheckoutAction.VOID:
      return canVoid(state);
    case CheckoutAction.SETTLE:
      return canSettle(state);
    case CheckoutAction.CREDIT:
      return canCredit(state);
  }
}

/**
 * Actions currently eligible for a checkout in the given state
 */
export function availableActions(state: CheckoutState): CheckoutAction[] {
  return Object.values(CheckoutAction).filter((action) =>
    isActionAllowed(action, state),
  );
}
