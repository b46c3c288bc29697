import {
  ReconciliationScheduler,
  ConfigurationService,
  CheckoutReconciliationService,
  FailedOrderRecoveryService,
  PaymentStateReconciler,
  MockStorageAdapter,
  MockGatewayClient,
  MockShipmentSync,
  ReconciliationReport,
  emptyRecoveryReport,
  mergeCheckoutSyncConfig,
} from '../../src';

const flushPromises = () => new Promise((resolve) => setImmediate(resolve));

describe('ReconciliationScheduler', () => {
  let reconciliation: CheckoutReconciliationService;
  let report: ReconciliationReport;

  const schedulerWith = (scheduler: { enabled?: boolean; runOnStart?: boolean }) =>
    new ReconciliationScheduler(
      reconciliation,
      new ConfigurationService(
        mergeCheckoutSyncConfig({
          storage: { type: 'mock' },
          gateway: { type: 'mock' },
          scheduler: { ...scheduler, intervalMs: 60000 },
        }),
      ),
    );

  beforeEach(() => {
    const storage = new MockStorageAdapter();
    const gateway = new MockGatewayClient();
    reconciliation = new CheckoutReconciliationService(
      storage,
      gateway,
      new PaymentStateReconciler(storage),
      new FailedOrderRecoveryService(storage, gateway, new MockShipmentSync()),
    );
    report = {
      runId: 'run_1',
      changed: 0,
      unchanged: 0,
      unrecognized: 0,
      failed: 0,
      recovery: emptyRecoveryReport(),
      startedAt: new Date(),
      finishedAt: new Date(),
    };
  });

  it('should start on module init when enabled and run immediately', async () => {
    const updateStates = jest
      .spyOn(reconciliation, 'updateStates')
      .mockResolvedValue(report);
    const scheduler = schedulerWith({ enabled: true, runOnStart: true });

    try {
      scheduler.onModuleInit();
      await flushPromises();

      expect(scheduler.isActive()).toBe(true);
      expect(updateStates).toHaveBeenCalledTimes(1);
      expect(scheduler.getLastReport()).toBe(report);
    } finally {
      scheduler.onModuleDestroy();
    }
    expect(scheduler.isActive()).toBe(false);
  });

  it('should stay idle when disabled', () => {
    const scheduler = schedulerWith({ enabled: false });

    scheduler.onModuleInit();

    expect(scheduler.isActive()).toBe(false);
  });

  it('should survive a failing scheduled run', async () => {
    jest
      .spyOn(reconciliation, 'updateStates')
      .mockRejectedValue(new Error('gateway down'));
    const scheduler = schedulerWith({ enabled: true, runOnStart: true });

    try {
      scheduler.start();
      await flushPromises();

      expect(scheduler.isBusy()).toBe(false);
      expect(scheduler.getLastReport()).toBeNull();
    } finally {
      scheduler.stop();
    }
  });

  it('should propagate errors from a manual run', async () => {
    jest
      .spyOn(reconciliation, 'updateStates')
      .mockRejectedValue(new Error('gateway down'));
    const scheduler = schedulerWith({});

    await expect(scheduler.runOnce()).rejects.toThrow('gateway down');
    expect(scheduler.isBusy()).toBe(false);
  });
});
