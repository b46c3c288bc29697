import {
  CheckoutReconciliationService,
  FailedOrderRecoveryService,
  PaymentStateReconciler,
  MockStorageAdapter,
  MockGatewayClient,
  MockShipmentSync,
  EventDispatcherImpl,
  CheckoutState,
  PaymentState,
  ReconciliationEventType,
  ReconciliationEventPayload,
  StaleCheckoutError,
  TerminalCheckoutError,
  Money,
} from '../../src';

describe('CheckoutReconciliationService Integration Tests', () => {
  let storage: MockStorageAdapter;
  let gateway: MockGatewayClient;
  let shipments: MockShipmentSync;
  let dispatcher: EventDispatcherImpl;
  let service: CheckoutReconciliationService;
  let events: Array<{ type: string; payload: ReconciliationEventPayload }>;

  const usd = (cents: number) => new Money(cents, 'USD');

  /**
   * Checkout with a linked gateway transaction and a payment funded by it
   */
  const seedFundedCheckout = (
    state: CheckoutState,
    paymentState: PaymentState = PaymentState.CHECKOUT,
    transactionId = `txn_${Math.random().toString(36).slice(2, 10)}`,
  ) => {
    const order = storage.seedOrder({ total: usd(10000) });
    const checkout = storage.seedCheckout({ state, transactionId });
    const payment = storage.seedPayment({
      orderId: order.id,
      sourceId: checkout.id,
      state: paymentState,
      amount: usd(10000),
    });
    return { order, checkout, payment, transactionId };
  };

  beforeEach(() => {
    storage = new MockStorageAdapter();
    gateway = new MockGatewayClient('braintree');
    shipments = new MockShipmentSync();
    dispatcher = new EventDispatcherImpl();
    events = [];
    dispatcher.onAll((type, payload) => {
      events.push({ type, payload });
    });

    const reconciler = new PaymentStateReconciler(storage, dispatcher);
    const recovery = new FailedOrderRecoveryService(
      storage,
      gateway,
      shipments,
      dispatcher,
    );
    service = new CheckoutReconciliationService(
      storage,
      gateway,
      reconciler,
      recovery,
      dispatcher,
      { pageSize: 2 },
    );
  });

  afterEach(() => {
    storage.clear();
    gateway.reset();
  });

  describe('State refresh', () => {
    it('should persist a settled checkout and complete its payment', async () => {
      const { checkout, payment, transactionId } = seedFundedCheckout(
        CheckoutState.AUTHORIZED,
      );
      gateway.setTransaction(transactionId, 'settled', usd(10000));

      const report = await service.updateStates();

      expect(report.changed).toBe(1);
      expect(report.unchanged).toBe(0);
      expect(report.failed).toBe(0);
      expect(storage.checkoutState(checkout.id)).toBe(CheckoutState.SETTLED);
      expect(storage.paymentState(payment.id)).toBe(PaymentState.COMPLETED);

      const applied = events.filter(
        (e) => e.type === ReconciliationEventType.PAYMENT_ACTION_APPLIED,
      );
      expect(applied).toHaveLength(1);
      expect(applied[0].payload.details).toEqual({
        action: 'complete',
        checkoutState: 'settled',
        previousPaymentState: 'checkout',
        paymentState: 'completed',
      });
    });

    it('should be idempotent across runs', async () => {
      const { transactionId } = seedFundedCheckout(CheckoutState.AUTHORIZED);
      gateway.setTransaction(transactionId, 'settled', usd(10000));

      await service.updateStates();
      const second = await service.updateStates();

      expect(second.changed).toBe(0);
      expect(second.unchanged).toBe(0);
      expect(gateway.lookups).toEqual([transactionId]);
      expect(
        events.filter(
          (e) => e.type === ReconciliationEventType.PAYMENT_ACTION_APPLIED,
        ),
      ).toHaveLength(1);
    });

    it('should never load or query final checkouts', async () => {
      for (const state of [
        CheckoutState.SETTLED,
        CheckoutState.VOIDED,
        CheckoutState.PROCESSOR_DECLINED,
        CheckoutState.FAILED,
      ]) {
        seedFundedCheckout(state);
      }

      const report = await service.updateStates();

      expect(report.changed + report.unchanged + report.failed).toBe(0);
      expect(gateway.lookups).toEqual([]);
    });

    it('should count a checkout the gateway still reports as is as unchanged', async () => {
      const { payment, transactionId } = seedFundedCheckout(
        CheckoutState.AUTHORIZED,
      );
      gateway.setTransaction(transactionId, 'AUTHORIZED', usd(10000));

      const report = await service.updateStates();

      expect(report.unchanged).toBe(1);
      expect(report.changed).toBe(0);
      expect(storage.paymentState(payment.id)).toBe(PaymentState.CHECKOUT);
    });

    it('should count checkouts without a gateway transaction as unchanged', async () => {
      storage.seedCheckout({ state: CheckoutState.AUTHORIZING });

      const report = await service.updateStates();

      expect(report.unchanged).toBe(1);
      expect(gateway.lookups).toEqual([]);
    });

    it('should pend the payment when authorization completes', async () => {
      const { checkout, payment, transactionId } = seedFundedCheckout(
        CheckoutState.AUTHORIZING,
      );
      gateway.setTransaction(transactionId, 'authorized', usd(10000));

      await service.updateStates();

      expect(storage.checkoutState(checkout.id)).toBe(CheckoutState.AUTHORIZED);
      expect(storage.paymentState(payment.id)).toBe(PaymentState.PENDING);
    });

    it('should void the payment when the checkout is voided', async () => {
      const { payment, transactionId } = seedFundedCheckout(
        CheckoutState.AUTHORIZED,
        PaymentState.PENDING,
      );
      gateway.setTransaction(transactionId, 'voided', usd(10000));

      await service.updateStates();

      expect(storage.paymentState(payment.id)).toBe(PaymentState.VOID);
    });

    it('should change the checkout even when no payment is linked', async () => {
      const checkout = storage.seedCheckout({
        state: CheckoutState.AUTHORIZED,
        transactionId: 'txn_orphan',
      });
      gateway.setTransaction('txn_orphan', 'settling', usd(500));

      const report = await service.updateStates();

      expect(report.changed).toBe(1);
      expect(storage.checkoutState(checkout.id)).toBe(CheckoutState.SETTLING);
    });

    it('should not move a payment the lifecycle forbids', async () => {
      const { payment, transactionId } = seedFundedCheckout(
        CheckoutState.AUTHORIZED,
        PaymentState.FAILED,
      );
      gateway.setTransaction(transactionId, 'settled', usd(10000));

      const report = await service.updateStates();

      expect(report.changed).toBe(1);
      expect(storage.paymentState(payment.id)).toBe(PaymentState.FAILED);
      expect(
        events.some(
          (e) => e.type === ReconciliationEventType.PAYMENT_ACTION_APPLIED,
        ),
      ).toBe(false);
    });

    it('should page through every non-final checkout', async () => {
      const seeded = [1, 2, 3, 4, 5].map(() =>
        seedFundedCheckout(CheckoutState.AUTHORIZING),
      );
      for (const { transactionId } of seeded) {
        gateway.setTransaction(transactionId, 'authorized', usd(10000));
      }

      const report = await service.updateStates();

      expect(report.changed).toBe(5);
      expect(gateway.lookups).toHaveLength(5);
    });
  });

  describe('Failure isolation', () => {
    it('should isolate gateway failures to the affected checkout', async () => {
      const broken = seedFundedCheckout(CheckoutState.AUTHORIZED);
      const healthy = seedFundedCheckout(CheckoutState.AUTHORIZING);
      storage.seedCheckout({ state: CheckoutState.AUTHORIZING });

      gateway.failTransaction(broken.transactionId, 'GATEWAY_UNAVAILABLE');
      gateway.setTransaction(healthy.transactionId, 'authorized', usd(10000));

      const report = await service.updateStates();

      expect(report.failed).toBe(1);
      expect(report.changed).toBe(1);
      expect(report.unchanged).toBe(1);
      expect(storage.checkoutState(broken.checkout.id)).toBe(
        CheckoutState.AUTHORIZED,
      );
      expect(storage.paymentState(healthy.payment.id)).toBe(
        PaymentState.PENDING,
      );

      const failures = events.filter(
        (e) => e.type === ReconciliationEventType.CHECKOUT_REFRESH_FAILED,
      );
      expect(failures).toHaveLength(1);
      expect(failures[0].payload.checkoutId).toBe(broken.checkout.id);
      expect(failures[0].payload.details).toEqual({
        errorName: 'GatewayError',
        state: 'authorized',
        code: 'GATEWAY_UNAVAILABLE',
        transient: true,
      });
    });

    it('should fail the payment once when the gateway status is unknown', async () => {
      const { checkout, payment, transactionId } = seedFundedCheckout(
        CheckoutState.AUTHORIZED,
        PaymentState.PENDING,
      );
      gateway.setTransaction(transactionId, 'unknown_code', usd(10000));

      const report = await service.updateStates();

      expect(report.unrecognized).toBe(1);
      expect(report.changed).toBe(0);
      expect(storage.checkoutState(checkout.id)).toBe(CheckoutState.AUTHORIZED);
      expect(storage.paymentState(payment.id)).toBe(PaymentState.FAILED);
      expect(
        events.find(
          (e) => e.type === ReconciliationEventType.CHECKOUT_STATUS_UNRECOGNIZED,
        )?.payload.details,
      ).toEqual({ gatewayStatus: 'unknown_code', state: 'authorized' });

      const applied = events.filter(
        (e) => e.type === ReconciliationEventType.PAYMENT_ACTION_APPLIED,
      );
      expect(applied).toHaveLength(1);
      expect(applied[0].payload.details).toEqual({
        action: 'failure',
        gatewayStatus: 'unknown_code',
        previousPaymentState: 'pending',
        paymentState: 'failed',
      });

      const second = await service.updateStates();

      expect(second.unrecognized).toBe(1);
      expect(storage.paymentState(payment.id)).toBe(PaymentState.FAILED);
      expect(
        events.filter(
          (e) => e.type === ReconciliationEventType.PAYMENT_ACTION_APPLIED,
        ),
      ).toHaveLength(1);
    });

    it('should skip a checkout another writer already moved', async () => {
      const { checkout, payment, transactionId } = seedFundedCheckout(
        CheckoutState.AUTHORIZED,
      );
      gateway.setTransaction(transactionId, 'settled', usd(10000));
      jest
        .spyOn(storage, 'updateCheckoutState')
        .mockRejectedValueOnce(
          new StaleCheckoutError(
            checkout.id,
            CheckoutState.AUTHORIZED,
            CheckoutState.SUBMITTED_FOR_SETTLEMENT,
          ),
        );

      const report = await service.updateStates();

      expect(report.unchanged).toBe(1);
      expect(report.failed).toBe(0);
      expect(storage.paymentState(payment.id)).toBe(PaymentState.CHECKOUT);
    });

    it('should skip a checkout that became final meanwhile', async () => {
      const { checkout, transactionId } = seedFundedCheckout(
        CheckoutState.SUBMITTED_FOR_SETTLEMENT,
      );
      gateway.setTransaction(transactionId, 'settled', usd(10000));
      jest
        .spyOn(storage, 'updateCheckoutState')
        .mockRejectedValueOnce(
          new TerminalCheckoutError(checkout.id, CheckoutState.VOIDED),
        );

      const report = await service.updateStates();

      expect(report.unchanged).toBe(1);
    });

    it('should roll back the checkout when its payment write fails', async () => {
      const { checkout, payment, transactionId } = seedFundedCheckout(
        CheckoutState.AUTHORIZED,
      );
      gateway.setTransaction(transactionId, 'settled', usd(10000));
      jest
        .spyOn(storage, 'savePayment')
        .mockRejectedValueOnce(new Error('connection reset'));

      const first = await service.updateStates();

      expect(first.failed).toBe(1);
      expect(first.changed).toBe(0);
      expect(
        events.find(
          (e) => e.type === ReconciliationEventType.CHECKOUT_REFRESH_FAILED,
        )?.payload.error,
      ).toBe(`Failed to persist payment ${payment.id}: connection reset`);
      expect(storage.checkoutState(checkout.id)).toBe(CheckoutState.AUTHORIZED);
      expect(storage.paymentState(payment.id)).toBe(PaymentState.CHECKOUT);
      expect(
        events.some(
          (e) => e.type === ReconciliationEventType.CHECKOUT_STATE_CHANGED,
        ),
      ).toBe(false);

      const second = await service.updateStates();

      expect(second.changed).toBe(1);
      expect(second.failed).toBe(0);
      expect(storage.checkoutState(checkout.id)).toBe(CheckoutState.SETTLED);
      expect(storage.paymentState(payment.id)).toBe(PaymentState.COMPLETED);
      expect(
        events.filter(
          (e) => e.type === ReconciliationEventType.PAYMENT_ACTION_APPLIED,
        ),
      ).toHaveLength(1);
    });
  });

  describe('Run report', () => {
    it('should include the failed order recovery and announce completion', async () => {
      const order = storage.seedOrder({ total: usd(5000) });
      const checkout = storage.seedCheckout({
        state: CheckoutState.SETTLED,
        transactionId: 'txn_paypal',
        paypalEmail: 'buyer@example.com',
      });
      const payment = storage.seedPayment({
        orderId: order.id,
        sourceId: checkout.id,
        state: PaymentState.FAILED,
        amount: usd(5000),
      });
      gateway.setTransaction('txn_paypal', 'settled', usd(5000));

      const report = await service.updateStates();

      expect(report.recovery).toEqual({
        examined: 1,
        skipped: 0,
        completed: 1,
        pending: 0,
        unsettled: 0,
        failed: 0,
      });
      expect(storage.paymentState(payment.id)).toBe(PaymentState.COMPLETED);
      expect(shipments.resynced).toEqual([order.id]);

      const completed = events.filter(
        (e) => e.type === ReconciliationEventType.RECONCILIATION_COMPLETED,
      );
      expect(completed).toHaveLength(1);
      expect(completed[0].payload.runId).toBe(report.runId);
      expect(report.finishedAt.getTime()).toBeGreaterThanOrEqual(
        report.startedAt.getTime(),
      );
    });

    it('should report a recovery selection failure without failing the run', async () => {
      const findCheckouts = storage.findCheckouts.bind(storage);
      jest
        .spyOn(storage, 'findCheckouts')
        .mockImplementation(async (query, page) => {
          if (query.hasPaypalEmail) {
            throw new Error('replica unavailable');
          }
          return findCheckouts(query, page);
        });

      const report = await service.updateStates();

      expect(report.recovery.error).toBe('replica unavailable');
      expect(report.recovery.examined).toBe(0);
    });
  });
});
