import { Logger } from '@nestjs/common';
import {
  EventDispatcher,
  StorageAdapter,
  toPersistenceError,
} from '../interfaces';
import { CheckoutStateChange, Payment } from '../domain/models';
import {
  CheckoutState,
  PaymentAction,
  PaymentState,
  ReconciliationEventType,
} from '../domain/enums';
import { mapStatusToAction } from '../mapping';
import { resolvePaymentAction } from '../state-machine';

/**
 * Result of reacting to one persisted checkout state change
 */
export interface PaymentActionOutcome {
  checkoutId: string;
  paymentId: string | null;
  orderId?: string;
  action: PaymentAction | null;
  applied: boolean;
  previousPaymentState?: PaymentState;
  paymentState?: PaymentState;
  reason?: string;
}

/**
 * What caused the action: a committed checkout state, or a gateway
 * status outside the checkout vocabulary
 */
export type PaymentActionCause =
  | { checkoutState: CheckoutState }
  | { gatewayStatus: string };

/**
 * Payment State Reconciler
 *
 * The single place where a checkout state change turns into a payment
 * state change. Callers invoke it exactly once per committed change,
 * passing the transactional storage when the checkout write and the
 * payment write must commit together.
 */
export class PaymentStateReconciler {
  private readonly logger = new Logger(PaymentStateReconciler.name);

  constructor(
    private readonly storageAdapter: StorageAdapter,
    private readonly eventDispatcher?: EventDispatcher,
  ) {}

  /**
   * Apply and announce the action for a committed change
   */
  async onCheckoutStateCommitted(
    change: CheckoutStateChange,
    runId?: string,
  ): Promise<PaymentActionOutcome> {
    const outcome = await this.reconcile(change);
    await this.announce(outcome, { checkoutState: change.state }, runId);
    return outcome;
  }

  /**
   * Apply the action for a change through `storage` without announcing it
   */
  async reconcile(
    change: CheckoutStateChange,
    storage: StorageAdapter = this.storageAdapter,
  ): Promise<PaymentActionOutcome> {
    const action = resolvePaymentAction(change);
    if (action === null) {
      return {
        checkoutId: change.checkoutId,
        paymentId: null,
        action: null,
        applied: false,
        reason: 'Checkout state unchanged',
      };
    }
    return this.applyAction(change.checkoutId, action, storage);
  }

  /**
   * A gateway status the checkout cannot store still reaches the payment,
   * through the status table's failure default
   */
  async onUnrecognizedStatus(
    checkoutId: string,
    gatewayStatus: string,
    runId?: string,
  ): Promise<PaymentActionOutcome> {
    const outcome = await this.applyAction(
      checkoutId,
      mapStatusToAction(gatewayStatus),
      this.storageAdapter,
    );
    await this.announce(outcome, { gatewayStatus }, runId);
    return outcome;
  }

  /**
   * Dispatch `payment.action_applied` for an applied outcome
   */
  async announce(
    outcome: PaymentActionOutcome,
    cause: PaymentActionCause,
    runId?: string,
  ): Promise<void> {
    if (!outcome.applied) {
      return;
    }
    await this.eventDispatcher?.dispatch(
      ReconciliationEventType.PAYMENT_ACTION_APPLIED,
      {
        runId,
        checkoutId: outcome.checkoutId,
        paymentId: outcome.paymentId ?? undefined,
        orderId: outcome.orderId,
        details: {
          action: outcome.action,
          ...cause,
          previousPaymentState: outcome.previousPaymentState,
          paymentState: outcome.paymentState,
        },
      },
    );
  }

  private async applyAction(
    checkoutId: string,
    action: PaymentAction,
    storage: StorageAdapter,
  ): Promise<PaymentActionOutcome> {
    const payment = await this.findPayment(checkoutId, storage);
    if (!payment) {
      return {
        checkoutId,
        paymentId: null,
        action,
        applied: false,
        reason: 'No payment funded by this checkout',
      };
    }

    const previousPaymentState = payment.state;
    if (!payment.apply(action)) {
      const reason = `Cannot ${action} a ${previousPaymentState} payment`;
      this.logger.warn(`Payment ${payment.id} (checkout ${checkoutId}): ${reason}`);
      return {
        checkoutId,
        paymentId: payment.id,
        orderId: payment.orderId,
        action,
        applied: false,
        previousPaymentState,
        paymentState: previousPaymentState,
        reason,
      };
    }

    try {
      await storage.savePayment(payment);
    } catch (error) {
      throw toPersistenceError(error, 'payment', payment.id);
    }

    return {
      checkoutId,
      paymentId: payment.id,
      orderId: payment.orderId,
      action,
      applied: true,
      previousPaymentState,
      paymentState: payment.state,
    };
  }

  private async findPayment(
    checkoutId: string,
    storage: StorageAdapter,
  ): Promise<Payment | null> {
    try {
      return await storage.findPaymentBySource(checkoutId);
    } catch (error) {
      throw toPersistenceError(error, 'payment', checkoutId);
    }
  }
}
