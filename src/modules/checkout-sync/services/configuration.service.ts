import { Injectable, Inject } from '@nestjs/common';
import type { CheckoutSyncModuleConfig } from '../checkout-sync.config';
import { defaultCheckoutSyncConfig } from '../checkout-sync.config';
import { CHECKOUT_SYNC_CONFIG } from '../constants';

/**
 * Configuration Service
 *
 * Typed access to the merged module configuration
 */
@Injectable()
export class ConfigurationService {
  constructor(
    @Inject(CHECKOUT_SYNC_CONFIG)
    private readonly config: CheckoutSyncModuleConfig,
  ) {}

  getConfig(): CheckoutSyncModuleConfig {
    return this.config;
  }

  getPageSize(): number {
    return (
      this.config.reconciliation?.pageSize ??
      defaultCheckoutSyncConfig.reconciliation.pageSize
    );
  }

  getRecoveryWindowDays(): number {
    return (
      this.config.reconciliation?.recoveryWindowDays ??
      defaultCheckoutSyncConfig.reconciliation.recoveryWindowDays
    );
  }

  isSchedulerEnabled(): boolean {
    return this.config.scheduler?.enabled === true;
  }

  getSchedulerIntervalMs(): number {
    return (
      this.config.scheduler?.intervalMs ??
      defaultCheckoutSyncConfig.scheduler.intervalMs
    );
  }

  shouldRunOnStart(): boolean {
    return this.config.scheduler?.runOnStart === true;
  }

  getGatewayType(): CheckoutSyncModuleConfig['gateway']['type'] {
    return this.config.gateway.type;
  }

  isDebugMode(): boolean {
    return this.config.debug === true;
  }
}
