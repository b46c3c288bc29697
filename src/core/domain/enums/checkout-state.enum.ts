/**
 * Gateway-mirrored checkout states
 * Values match the gateway's transaction status vocabulary (lower-cased)
 */
export enum CheckoutState {
  /**
   * Authorization request in flight
   */
  AUTHORIZING = 'authorizing',

  /**
   * Funds authorized, not yet submitted for settlement
   */
  AUTHORIZED = 'authorized',

  SUBMITTED_FOR_SETTLEMENT = 'submitted_for_settlement',

  SETTLING = 'settling',

  /**
   * Settlement accepted by the processor but not yet funded
   */
  SETTLEMENT_PENDING = 'settlement_pending',

  SETTLEMENT_CONFIRMED = 'settlement_confirmed',

  // Terminal states below

  AUTHORIZATION_EXPIRED = 'authorization_expired',

  PROCESSOR_DECLINED = 'processor_declined',

  GATEWAY_REJECTED = 'gateway_rejected',

  FAILED = 'failed',

  VOIDED = 'voided',

  /**
   * Funds captured (terminal)
   */
  SETTLED = 'settled',

  SETTLEMENT_DECLINED = 'settlement_declined',

  REFUNDED = 'refunded',

  RELEASED = 'released',
}

/**
 * Terminal checkout states - a checkout in one of these is never rescanned
 * and never mutated again
 */
export const FINAL_STATES: readonly CheckoutState[] = [
  CheckoutState.AUTHORIZATION_EXPIRED,
  CheckoutState.PROCESSOR_DECLINED,
  CheckoutState.GATEWAY_REJECTED,
  CheckoutState.FAILED,
  CheckoutState.VOIDED,
  CheckoutState.SETTLED,
  CheckoutState.SETTLEMENT_DECLINED,
  CheckoutState.REFUNDED,
  CheckoutState.RELEASED,
];

export function isFinalState(state: CheckoutState): boolean {
  return FINAL_STATES.includes(state);
}

const knownStates = new Set<string>(Object.values(CheckoutState));

function isCheckoutState(value: string): value is CheckoutState {
  return knownStates.has(value);
}

/**
 * Narrow a raw gateway status to a checkout state
 * Returns null for statuses outside the known vocabulary
 */
export function parseCheckoutState(
  raw: string | null | undefined,
): CheckoutState | null {
  if (!raw) {
    return null;
  }
  const normalized = raw.trim().toLowerCase();
  return isCheckoutState(normalized) ? normalized : null;
}
