import {
  canVoid,
  canSettle,
  canCredit,
  isActionAllowed,
  availableActions,
  isFinalState,
  parseCheckoutState,
  CheckoutAction,
  CheckoutState,
  FINAL_STATES,
} from '../../src';

describe('Action Guards', () => {
  const allStates = Object.values(CheckoutState);

  it('should allow void only when authorized or submitted for settlement', () => {
    const voidable = allStates.filter((state) => canVoid(state));
    expect(voidable).toEqual([
      CheckoutState.AUTHORIZED,
      CheckoutState.SUBMITTED_FOR_SETTLEMENT,
    ]);
  });

  it('should allow settle only when authorized', () => {
    const settleable = allStates.filter((state) => canSettle(state));
    expect(settleable).toEqual([CheckoutState.AUTHORIZED]);
  });

  it('should allow credit only when settling or settled', () => {
    const creditable = allStates.filter((state) => canCredit(state));
    expect(creditable).toEqual([CheckoutState.SETTLING, CheckoutState.SETTLED]);
  });

  it('should dispatch isActionAllowed to the matching guard', () => {
    expect(isActionAllowed(CheckoutAction.SETTLE, CheckoutState.AUTHORIZED)).toBe(true);
    expect(isActionAllowed(CheckoutAction.SETTLE, CheckoutState.SETTLING)).toBe(false);
    expect(isActionAllowed(CheckoutAction.CREDIT, CheckoutState.SETTLED)).toBe(true);
    expect(isActionAllowed(CheckoutAction.VOID, CheckoutState.SETTLED)).toBe(false);
  });

  it('should list available actions per state', () => {
    expect(availableActions(CheckoutState.AUTHORIZED)).toEqual([
      CheckoutAction.VOID,
      CheckoutAction.SETTLE,
    ]);
    expect(availableActions(CheckoutState.SUBMITTED_FOR_SETTLEMENT)).toEqual([
      CheckoutAction.VOID,
    ]);
    expect(availableActions(CheckoutState.SETTLED)).toEqual([
      CheckoutAction.CREDIT,
    ]);
    expect(availableActions(CheckoutState.AUTHORIZING)).toEqual([]);
    expect(availableActions(CheckoutState.VOIDED)).toEqual([]);
  });
});

describe('Checkout States', () => {
  it('should treat exactly the terminal states as final', () => {
    expect(FINAL_STATES).toHaveLength(9);
    expect(isFinalState(CheckoutState.SETTLED)).toBe(true);
    expect(isFinalState(CheckoutState.VOIDED)).toBe(true);
    expect(isFinalState(CheckoutState.RELEASED)).toBe(true);
    expect(isFinalState(CheckoutState.AUTHORIZED)).toBe(false);
    expect(isFinalState(CheckoutState.SETTLEMENT_PENDING)).toBe(false);
    expect(isFinalState(CheckoutState.SETTLING)).toBe(false);
  });

  it('should parse gateway statuses', () => {
    expect(parseCheckoutState('settled')).toBe(CheckoutState.SETTLED);
    expect(parseCheckoutState(' SUBMITTED_FOR_SETTLEMENT ')).toBe(
      CheckoutState.SUBMITTED_FOR_SETTLEMENT,
    );
  });

  it('should reject unknown or empty statuses', () => {
    expect(parseCheckoutState('unrecognized')).toBeNull();
    expect(parseCheckoutState('')).toBeNull();
    expect(parseCheckoutState(null)).toBeNull();
    expect(parseCheckoutState(undefined)).toBeNull();
  });
});
