import { Logger } from '@nestjs/common';
import {
  CheckoutQuery,
  EventDispatcher,
  GatewayError,
  GatewayStatusClient,
  PersistenceError,
  ShipmentSync,
  StorageAdapter,
  toPersistenceError,
} from '../interfaces';
import { Checkout, Order, Payment } from '../domain/models';
import {
  CheckoutState,
  PaymentState,
  ReconciliationEventType,
  parseCheckoutState,
} from '../domain/enums';
import { Money } from '../domain/value-objects/money.vo';

const DAY_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_RECOVERY_WINDOW_DAYS = 2;

/**
 * What happened to a single recovery candidate
 * - skipped: payment not failed or checkout not settled
 * - completed: order, payment and gateway amounts agree
 * - pending: gateway settled but amounts disagree
 * - unsettled: gateway no longer reports settled and amounts disagree;
 *   the payment stays failed
 */
export type RecoveryOutcome = 'skipped' | 'completed' | 'pending' | 'unsettled';

export interface RecoveryReport {
  examined: number;
  skipped: number;
  completed: number;
  pending: number;
  unsettled: number;
  failed: number;
  error?: string;
}

export interface FailedOrderRecoveryOptions {
  windowDays?: number;
  pageSize?: number;
}

export function emptyRecoveryReport(): RecoveryReport {
  return {
    examined: 0,
    skipped: 0,
    completed: 0,
    pending: 0,
    unsettled: 0,
    failed: 0,
  };
}

/**
 * Recent settled PayPal checkouts: created inside the window, settled,
 * with a PayPal email on record
 */
export function recentSettledPaypalQuery(
  now: Date,
  windowDays: number = DEFAULT_RECOVERY_WINDOW_DAYS,
): CheckoutQuery {
  return {
    states: [CheckoutState.SETTLED],
    hasPaypalEmail: true,
    createdAfter: new Date(now.getTime() - windowDays * DAY_MS),
    createdBefore: now,
  };
}

/**
 * Failed Order Recovery
 *
 * Some orders take longer to authorize than the checkout flow waits for
 * and end up with a failed payment although the gateway settled the
 * transaction. This routine finds those orders and repairs the payment.
 */
export class FailedOrderRecoveryService {
  private readonly logger = new Logger(FailedOrderRecoveryService.name);
  private readonly windowDays: number;
  private readonly pageSize: number;

  constructor(
    private readonly storageAdapter: StorageAdapter,
    private readonly gateway: GatewayStatusClient,
    private readonly shipmentSync: ShipmentSync,
    private readonly eventDispatcher?: EventDispatcher,
    options: FailedOrderRecoveryOptions = {},
  ) {
    this.windowDays = options.windowDays ?? DEFAULT_RECOVERY_WINDOW_DAYS;
    this.pageSize = options.pageSize ?? 100;
  }

  /**
   * Select the recent settled PayPal checkouts
   */
  async findCandidates(now: Date = new Date()): Promise<Checkout[]> {
    const query = recentSettledPaypalQuery(now, this.windowDays);
    const candidates: Checkout[] = [];
    let afterId: string | undefined;

    for (;;) {
      const page = await this.storageAdapter.findCheckouts(query, {
        limit: this.pageSize,
        afterId,
      });
      candidates.push(...page);
      if (page.length < this.pageSize) {
        return candidates;
      }
      afterId = page[page.length - 1].id;
    }
  }

  /**
   * Select candidates and repair them
   */
  async recoverRecent(
    now: Date = new Date(),
    runId?: string,
  ): Promise<RecoveryReport> {
    const candidates = await this.findCandidates(now);
    return this.completeFailedOrders(candidates, runId);
  }

  /**
   * Repair every candidate; a failing candidate never affects the others
   */
  async completeFailedOrders(
    checkouts: Checkout[],
    runId?: string,
  ): Promise<RecoveryReport> {
    const report = emptyRecoveryReport();

    for (const checkout of checkouts) {
      report.examined++;
      try {
        const outcome = await this.recoverCheckout(checkout, runId);
        report[outcome]++;
      } catch (error) {
        report.failed++;
        const message = error instanceof Error ? error.message : String(error);
        this.logger.error(
          `Recovery failed for checkout ${checkout.id}: ${message}`,
          error instanceof Error ? error.stack : undefined,
        );
        await this.eventDispatcher?.dispatch(
          ReconciliationEventType.ORDER_RECOVERY_FAILED,
          {
            runId,
            checkoutId: checkout.id,
            error: message,
            details: {
              errorName: error instanceof Error ? error.name : 'Error',
            },
          },
        );
      }
    }

    return report;
  }

  /**
   * Repair one candidate.
   *
   * The gateway is asked again even though the checkout is stored as
   * settled: local state may have moved since the candidate was selected.
   */
  async recoverCheckout(
    checkout: Checkout,
    runId?: string,
  ): Promise<RecoveryOutcome> {
    if (!checkout.isSettled()) {
      return 'skipped';
    }

    const payment = await this.read('payment', checkout.id, () =>
      this.storageAdapter.findPaymentBySource(checkout.id),
    );
    if (!payment || !payment.isFailed()) {
      return 'skipped';
    }

    const order = await this.read('order', payment.orderId, () =>
      this.storageAdapter.findOrder(payment.orderId),
    );
    if (!order) {
      throw new PersistenceError(
        `Order ${payment.orderId} not found for payment ${payment.id}`,
        'order',
        payment.orderId,
      );
    }

    if (!checkout.transactionId) {
      throw new GatewayError(
        `Checkout ${checkout.id} has no gateway transaction`,
        'TRANSACTION_NOT_FOUND',
        this.gateway.gatewayName,
      );
    }

    const transaction = await this.gateway.findTransaction(
      checkout.transactionId,
    );

    const settled =
      parseCheckoutState(transaction.status) === CheckoutState.SETTLED;
    if (settled) {
      await this.moveTo(payment, PaymentState.PENDING);
    } else {
      this.logger.warn(
        `Checkout ${checkout.id} is settled locally but gateway reports ${transaction.status}`,
      );
    }

    let outcome: RecoveryOutcome;
    if (amountsAgree(order, payment, transaction.amount)) {
      await this.moveTo(payment, PaymentState.COMPLETED);
      outcome = 'completed';
    } else {
      outcome = settled ? 'pending' : 'unsettled';
      this.logger.warn(
        `Amounts disagree for order ${order.number}: total ${order.total}, payment ${payment.amount}, gateway ${transaction.amount}; payment left ${payment.state}`,
      );
    }

    await this.shipmentSync.resync(order);

    await this.eventDispatcher?.dispatch(
      ReconciliationEventType.ORDER_RECOVERED,
      {
        runId,
        checkoutId: checkout.id,
        paymentId: payment.id,
        orderId: order.id,
        details: {
          outcome,
          gatewayStatus: transaction.status,
          paymentState: payment.state,
        },
      },
    );

    return outcome;
  }

  private async moveTo(payment: Payment, state: PaymentState): Promise<void> {
    payment.transitionTo(state);
    try {
      await this.storageAdapter.savePayment(payment);
    } catch (error) {
      throw toPersistenceError(error, 'payment', payment.id);
    }
  }

  private async read<T>(
    entity: PersistenceError['entity'],
    id: string,
    load: () => Promise<T>,
  ): Promise<T> {
    try {
      return await load();
    } catch (error) {
      throw toPersistenceError(error, entity, id);
    }
  }
}

/**
 * Order total, payment amount and gateway amount collapse to one value
 */
export function amountsAgree(
  order: Order,
  payment: Payment,
  gatewayAmount: Money,
): boolean {
  return Money.distinctCount([order.total, payment.amount, gatewayAmount]) === 1;
}
