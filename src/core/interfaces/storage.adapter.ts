import { Checkout, CheckoutStateChange, Order, Payment } from '../domain/models';
import { CheckoutState } from '../domain/enums';
import { CheckoutQuery, CreateCheckoutDto, KeysetPage } from './common.types';

/**
 * Storage adapter interface - abstracts all database operations
 * Implementations must ensure ACID properties where specified
 */
export interface StorageAdapter {
  // ==================== Checkout Operations ====================

  createCheckout(dto: CreateCheckoutDto): Promise<Checkout>;

  findCheckout(id: string): Promise<Checkout | null>;

  /**
   * Find checkouts matching query, ordered by id
   */
  findCheckouts(query: CheckoutQuery, page?: KeysetPage): Promise<Checkout[]>;

  /**
   * Atomically move a checkout from `expected` to `next`.
   * MUST fail with StaleCheckoutError when the stored state is no longer
   * `expected`, and with TerminalCheckoutError when it is final.
   */
  updateCheckoutState(
    id: string,
    expected: CheckoutState,
    next: CheckoutState,
  ): Promise<CheckoutStateChange>;

  /**
   * Set the gateway transaction id; fails if one is already linked
   */
  linkCheckoutTransaction(id: string, transactionId: string): Promise<Checkout>;

  // ==================== Payment / Order Operations ====================

  /**
   * Payment funded by the given checkout
   */
  findPaymentBySource(checkoutId: string): Promise<Payment | null>;

  /**
   * Persist payment state
   */
  savePayment(payment: Payment): Promise<Payment>;

  findOrder(orderId: string): Promise<Order | null>;

  // ==================== Transactions ====================

  /**
   * Run `work` as one unit: every write made through the adapter it
   * receives commits together, or none does when `work` throws
   */
  withTransaction<T>(work: (storage: StorageAdapter) => Promise<T>): Promise<T>;

  // ==================== Health ====================

  isHealthy(): Promise<boolean>;
}

/**
 * Storage failure surfaced to the reconciliation engine
 */
export class PersistenceError extends Error {
  constructor(
    message: string,
    public readonly entity: 'checkout' | 'payment' | 'order',
    public readonly entityId: string,
    public readonly originalError?: unknown,
  ) {
    super(message);
    this.name = 'PersistenceError';
  }
}

/**
 * Compare-and-set lost: another writer moved the checkout first
 */
export class StaleCheckoutError extends Error {
  constructor(
    public readonly checkoutId: string,
    public readonly expected: CheckoutState,
    public readonly actual: CheckoutState,
  ) {
    super(
      `Checkout ${checkoutId} is ${actual}, expected ${expected}`,
    );
    this.name = 'StaleCheckoutError';
  }
}

/**
 * Attempt to mutate a checkout already in a final state
 */
export class TerminalCheckoutError extends Error {
  constructor(
    public readonly checkoutId: string,
    public readonly state: CheckoutState,
  ) {
    super(`Checkout ${checkoutId} is final (${state}) and cannot change`);
    this.name = 'TerminalCheckoutError';
  }
}

/**
 * Wrap an unknown storage error, keeping domain errors as they are
 */
export function toPersistenceError(
  error: unknown,
  entity: PersistenceError['entity'],
  entityId: string,
): Error {
  if (
    error instanceof PersistenceError ||
    error instanceof StaleCheckoutError ||
    error instanceof TerminalCheckoutError
  ) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new PersistenceError(
    `Failed to persist ${entity} ${entityId}: ${message}`,
    entity,
    entityId,
    error,
  );
}
