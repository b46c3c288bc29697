import { FactoryProvider, ModuleMetadata } from '@nestjs/common';
import { PostgresConnectionOptions } from 'typeorm/driver/postgres/PostgresConnectionOptions';
import {
  EventDispatcher,
  EventHandler,
  EventLogLevel,
  GatewayStatusClient,
  ShipmentSync,
  StorageAdapter,
} from '../../core';
import {
  BraintreeClientOptions,
  BraintreeCredentials,
} from '../../adapters/gateway/braintree';

/**
 * Checkout Sync Module Configuration
 */
export interface CheckoutSyncModuleConfig {
  /**
   * Storage configuration
   */
  storage: {
    type: 'mock' | 'typeorm' | 'custom';
    options?: Partial<PostgresConnectionOptions>;
    adapter?: StorageAdapter;
  };

  /**
   * Gateway the checkouts are reconciled against
   */
  gateway: {
    type: 'mock' | 'braintree' | 'custom';

    /**
     * Required for `braintree`
     */
    credentials?: BraintreeCredentials;
    options?: BraintreeClientOptions;
    client?: GatewayStatusClient;

    /**
     * Payment method ids served by this gateway.
     * Default: the gateway name
     */
    paymentMethodIds?: string[];
  };

  /**
   * Shipment resynchronization after a recovered payment
   */
  shipments?: {
    type: 'noop' | 'http' | 'custom';
    url?: string;
    timeoutMs?: number;
    sync?: ShipmentSync;
  };

  reconciliation?: {
    /**
     * Checkouts loaded per selection query
     */
    pageSize?: number;

    /**
     * How far back failed order recovery looks, in days
     */
    recoveryWindowDays?: number;
  };

  /**
   * Periodic reconciliation
   */
  scheduler?: {
    enabled?: boolean;
    intervalMs?: number;
    runOnStart?: boolean;
  };

  /**
   * Event configuration
   */
  events?: {
    dispatcher?: EventDispatcher;
    enableLogging?: boolean;
    logLevel?: EventLogLevel;
    handlers?: Array<{
      eventType: string;
      handler: EventHandler;
    }>;
  };

  environment?: 'development' | 'staging' | 'production';
  debug?: boolean;
}

/**
 * Async configuration factory
 */
export interface CheckoutSyncModuleAsyncConfig
  extends Pick<FactoryProvider<CheckoutSyncModuleConfig>, 'useFactory' | 'inject'> {
  imports?: ModuleMetadata['imports'];
}

/**
 * Default configuration values
 */
export const defaultCheckoutSyncConfig = {
  shipments: {
    type: 'noop',
    timeoutMs: 10000,
  },
  reconciliation: {
    pageSize: 100,
    recoveryWindowDays: 2,
  },
  scheduler: {
    enabled: false,
    intervalMs: 15 * 60 * 1000,
    runOnStart: false,
  },
  events: {
    enableLogging: true,
    logLevel: 'normal',
  },
  environment: 'development',
  debug: false,
} satisfies Partial<CheckoutSyncModuleConfig>;

/**
 * Fill every optional section with its defaults
 */
export function mergeCheckoutSyncConfig(
  config: CheckoutSyncModuleConfig,
): CheckoutSyncModuleConfig {
  return {
    ...defaultCheckoutSyncConfig,
    ...config,
    shipments: { ...defaultCheckoutSyncConfig.shipments, ...config.shipments },
    reconciliation: {
      ...defaultCheckoutSyncConfig.reconciliation,
      ...config.reconciliation,
    },
    scheduler: { ...defaultCheckoutSyncConfig.scheduler, ...config.scheduler },
    events: { ...defaultCheckoutSyncConfig.events, ...config.events },
  };
}
