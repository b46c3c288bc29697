import { Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import {
  EventDispatcher,
  GatewayError,
  GatewayStatusClient,
  StaleCheckoutError,
  StorageAdapter,
  TerminalCheckoutError,
  toPersistenceError,
} from '../interfaces';
import { Checkout } from '../domain/models';
import {
  FINAL_STATES,
  ReconciliationEventType,
  parseCheckoutState,
} from '../domain/enums';
import { PaymentStateReconciler } from './payment-state-reconciler';
import {
  FailedOrderRecoveryService,
  RecoveryReport,
  emptyRecoveryReport,
} from './failed-order-recovery.service';

/**
 * Outcome of refreshing a single checkout against the gateway
 */
export type CheckoutRefreshOutcome =
  | 'changed'
  | 'unchanged'
  | 'unrecognized'
  | 'failed';

export interface ReconciliationReport {
  runId: string;
  changed: number;
  unchanged: number;
  unrecognized: number;
  failed: number;
  recovery: RecoveryReport;
  startedAt: Date;
  finishedAt: Date;
}

export interface CheckoutReconciliationOptions {
  /**
   * Checkouts loaded per selection query
   */
  pageSize?: number;

  /**
   * Clock used for the recovery window
   */
  now?: () => Date;
}

/**
 * Checkout Reconciliation Service
 *
 * Scans every non-final checkout, refreshes it against the gateway and
 * persists state changes, then hands the recent settled PayPal checkouts
 * to the failed order recovery.
 */
export class CheckoutReconciliationService {
  private readonly logger = new Logger(CheckoutReconciliationService.name);
  private readonly pageSize: number;
  private readonly now: () => Date;

  constructor(
    private readonly storageAdapter: StorageAdapter,
    private readonly gateway: GatewayStatusClient,
    private readonly paymentReconciler: PaymentStateReconciler,
    private readonly failedOrderRecovery: FailedOrderRecoveryService,
    private readonly eventDispatcher?: EventDispatcher,
    options: CheckoutReconciliationOptions = {},
  ) {
    this.pageSize = options.pageSize ?? 100;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Run one reconciliation pass
   */
  async updateStates(): Promise<ReconciliationReport> {
    const runId = uuidv4();
    const startedAt = this.now();
    const counts: Record<CheckoutRefreshOutcome, number> = {
      changed: 0,
      unchanged: 0,
      unrecognized: 0,
      failed: 0,
    };

    this.logger.log(`Reconciliation ${runId} started`);

    let afterId: string | undefined;
    for (;;) {
      const page = await this.storageAdapter.findCheckouts(
        { statesNotIn: FINAL_STATES },
        { limit: this.pageSize, afterId },
      );

      for (const checkout of page) {
        const outcome = await this.refreshCheckout(checkout, runId);
        counts[outcome]++;
      }

      if (page.length < this.pageSize) {
        break;
      }
      afterId = page[page.length - 1].id;
    }

    const recovery = await this.runRecovery(runId);

    const report: ReconciliationReport = {
      runId,
      ...counts,
      recovery,
      startedAt,
      finishedAt: this.now(),
    };

    this.logger.log(
      `Reconciliation ${runId} finished: ${counts.changed} changed, ${counts.unchanged} unchanged, ${counts.unrecognized} unrecognized, ${counts.failed} failed; recovery completed ${recovery.completed}, pending ${recovery.pending}, failed ${recovery.failed}`,
    );

    await this.eventDispatcher?.dispatch(
      ReconciliationEventType.RECONCILIATION_COMPLETED,
      {
        runId,
        details: {
          changed: report.changed,
          unchanged: report.unchanged,
          unrecognized: report.unrecognized,
          failed: report.failed,
          recovery,
        },
      },
    );

    return report;
  }

  /**
   * Fetch, compare, persist, react - all or nothing for this checkout.
   * Never throws: failures are logged, dispatched and reported.
   * An unrecognized status leaves the checkout as it is but still sends
   * the failure action to its payment.
   */
  async refreshCheckout(
    checkout: Checkout,
    runId?: string,
  ): Promise<CheckoutRefreshOutcome> {
    if (!checkout.transactionId) {
      this.logger.debug(`Checkout ${checkout.id} has no gateway transaction yet`);
      return 'unchanged';
    }

    let status: string;
    try {
      const transaction = await this.gateway.findTransaction(
        checkout.transactionId,
      );
      status = transaction.status;
    } catch (error) {
      await this.reportFailure(checkout, error, runId);
      return 'failed';
    }

    const observed = parseCheckoutState(status);
    if (observed === null) {
      this.logger.warn(
        `Gateway reported unknown status "${status}" for checkout ${checkout.id}`,
      );
      await this.eventDispatcher?.dispatch(
        ReconciliationEventType.CHECKOUT_STATUS_UNRECOGNIZED,
        {
          runId,
          checkoutId: checkout.id,
          details: { gatewayStatus: status, state: checkout.state },
        },
      );
      try {
        await this.paymentReconciler.onUnrecognizedStatus(
          checkout.id,
          status,
          runId,
        );
      } catch (error) {
        await this.reportFailure(checkout, error, runId);
        return 'failed';
      }
      return 'unrecognized';
    }

    if (observed === checkout.state) {
      return 'unchanged';
    }

    try {
      // Checkout write and payment action commit together
      const { change, outcome } = await this.storageAdapter.withTransaction(
        async (storage) => {
          const change = await storage.updateCheckoutState(
            checkout.id,
            checkout.state,
            observed,
          );
          const outcome = await this.paymentReconciler.reconcile(
            change,
            storage,
          );
          return { change, outcome };
        },
      );
      checkout.state = change.state;

      await this.eventDispatcher?.dispatch(
        ReconciliationEventType.CHECKOUT_STATE_CHANGED,
        {
          runId,
          checkoutId: checkout.id,
          details: { from: change.previousState, to: change.state },
        },
      );
      await this.paymentReconciler.announce(
        outcome,
        { checkoutState: change.state },
        runId,
      );
      return 'changed';
    } catch (error) {
      if (
        error instanceof StaleCheckoutError ||
        error instanceof TerminalCheckoutError
      ) {
        // Another writer got there first; nothing left to do here
        this.logger.debug(error.message);
        return 'unchanged';
      }
      await this.reportFailure(
        checkout,
        error instanceof GatewayError
          ? error
          : toPersistenceError(error, 'checkout', checkout.id),
        runId,
      );
      return 'failed';
    }
  }

  private async runRecovery(runId: string): Promise<RecoveryReport> {
    try {
      return await this.failedOrderRecovery.recoverRecent(this.now(), runId);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(
        `Failed order recovery could not select candidates: ${message}`,
        error instanceof Error ? error.stack : undefined,
      );
      return { ...emptyRecoveryReport(), error: message };
    }
  }

  private async reportFailure(
    checkout: Checkout,
    error: unknown,
    runId?: string,
  ): Promise<void> {
    const message = error instanceof Error ? error.message : String(error);
    const details: Record<string, unknown> = {
      errorName: error instanceof Error ? error.name : 'Error',
      state: checkout.state,
    };
    if (error instanceof GatewayError) {
      details.code = error.code;
      details.transient = error.isTransient;
    }

    this.logger.warn(`Failed to refresh checkout ${checkout.id}: ${message}`);

    await this.eventDispatcher?.dispatch(
      ReconciliationEventType.CHECKOUT_REFRESH_FAILED,
      {
        runId,
        checkoutId: checkout.id,
        error: message,
        details,
      },
    );
  }
}
