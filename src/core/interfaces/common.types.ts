import { CheckoutState } from '../domain/enums';
import { Money } from '../domain/value-objects/money.vo';

/**
 * Common types used across adapters
 */

/**
 * Keyset pagination - results are ordered by id, page starts after `afterId`
 */
export interface KeysetPage {
  limit: number;
  afterId?: string;
}

/**
 * Checkout query options
 * Every field narrows the selection; omitted fields do not filter
 */
export interface CheckoutQuery {
  states?: readonly CheckoutState[];
  statesNotIn?: readonly CheckoutState[];
  createdAfter?: Date;
  createdBefore?: Date;
  hasPaypalEmail?: boolean;
}

export interface CreateCheckoutDto {
  state?: CheckoutState;
  transactionId?: string | null;
  paypalEmail?: string | null;
  cardType: string;
  lastDigits?: string | null;
}

/**
 * Gateway view of a transaction
 */
export interface GatewayTransaction {
  id: string;
  status: string;
  amount: Money;
}

/**
 * Vaulted payment method details; every field may be missing
 */
export interface VaultedPaymentMethod {
  cardType?: string | null;
  email?: string | null;
  last4?: string | null;
}
