import {
  Injectable,
  Inject,
  Logger,
  OnModuleInit,
  OnModuleDestroy,
} from '@nestjs/common';
import {
  CheckoutReconciliationService,
  ReconciliationReport,
} from '../../../core';
import { ConfigurationService } from './configuration.service';

/**
 * Reconciliation Scheduler
 *
 * Runs `updateStates` on a fixed interval. Runs never overlap: a tick that
 * finds the previous run still going is skipped.
 */
@Injectable()
export class ReconciliationScheduler implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(ReconciliationScheduler.name);
  private intervalId?: NodeJS.Timeout;
  private isRunning = false;
  private lastReport: ReconciliationReport | null = null;

  constructor(
    @Inject(CheckoutReconciliationService)
    private readonly reconciliation: CheckoutReconciliationService,
    @Inject(ConfigurationService)
    private readonly configuration: ConfigurationService,
  ) {}

  onModuleInit() {
    if (this.configuration.isSchedulerEnabled()) {
      this.start();
    }
  }

  onModuleDestroy() {
    this.stop();
  }

  start(): void {
    if (this.intervalId) {
      return;
    }

    const intervalMs = this.configuration.getSchedulerIntervalMs();
    this.logger.log(`Starting reconciliation scheduler (interval: ${intervalMs}ms)`);

    this.intervalId = setInterval(() => this.tick(), intervalMs);

    if (this.configuration.shouldRunOnStart()) {
      this.tick();
    }
  }

  stop(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = undefined;
      this.logger.log('Stopped reconciliation scheduler');
    }
  }

  isActive(): boolean {
    return this.intervalId !== undefined;
  }

  isBusy(): boolean {
    return this.isRunning;
  }

  getLastReport(): ReconciliationReport | null {
    return this.lastReport;
  }

  /**
   * Run one reconciliation pass now.
   * Resolves to null when a run is already in progress.
   */
  async runOnce(): Promise<ReconciliationReport | null> {
    if (this.isRunning) {
      this.logger.warn('Reconciliation already running; skipping');
      return null;
    }

    this.isRunning = true;
    try {
      const report = await this.reconciliation.updateStates();
      this.lastReport = report;
      return report;
    } finally {
      this.isRunning = false;
    }
  }

  private tick(): void {
    this.runOnce().catch((error: unknown) => {
      this.logger.error(
        'Scheduled reconciliation failed',
        error instanceof Error ? error.stack : String(error),
      );
    });
  }
}
