import { DynamicModule, Global, Module, Provider } from '@nestjs/common';
import {
  CheckoutSyncModuleConfig,
  CheckoutSyncModuleAsyncConfig,
  mergeCheckoutSyncConfig,
} from './checkout-sync.config';
import {
  CheckoutReconciliationService,
  CheckoutService,
  EventDispatcher,
  EventDispatcherImpl,
  FailedOrderRecoveryService,
  GatewayStatusClient,
  LoggingEventHandler,
  PaymentMethodRegistry,
  PaymentStateReconciler,
  ShipmentSync,
  StorageAdapter,
} from '../../core';
import { MockStorageAdapter } from '../../adapters/storage/mock';
import {
  TypeORMStorageAdapter,
  createDataSource,
} from '../../adapters/storage/typeorm';
import {
  BraintreeGatewayClient,
  MockGatewayClient,
  StaticPaymentMethodRegistry,
} from '../../adapters/gateway';
import {
  HttpShipmentSync,
  LoggingShipmentSync,
} from '../../adapters/shipment';
import {
  CHECKOUT_SYNC_CONFIG,
  EVENT_DISPATCHER,
  GATEWAY_CLIENT,
  PAYMENT_METHOD_REGISTRY,
  SHIPMENT_SYNC,
  STORAGE_ADAPTER,
} from './constants';
import {
  CheckoutController,
  HealthController,
  ReconciliationController,
} from './controllers';
import { ConfigurationService } from './services/configuration.service';
import { ReconciliationScheduler } from './services/reconciliation.scheduler';

const EXPORTED_TOKENS = [
  CHECKOUT_SYNC_CONFIG,
  STORAGE_ADAPTER,
  GATEWAY_CLIENT,
  EVENT_DISPATCHER,
  CheckoutService,
  CheckoutReconciliationService,
  FailedOrderRecoveryService,
  ReconciliationScheduler,
];

/**
 * Checkout Sync Module - Main NestJS Module
 *
 * Wires storage, gateway, shipment sync and the reconciliation services
 */
@Global()
@Module({})
export class CheckoutSyncModule {
  /**
   * Configure synchronously
   */
  static forRoot(config: CheckoutSyncModuleConfig): DynamicModule {
    return {
      module: CheckoutSyncModule,
      providers: [
        {
          provide: CHECKOUT_SYNC_CONFIG,
          useValue: mergeCheckoutSyncConfig(config),
        },
        ...this.createProviders(),
      ],
      controllers: this.createControllers(),
      exports: EXPORTED_TOKENS,
    };
  }

  /**
   * Configure asynchronously
   */
  static forRootAsync(options: CheckoutSyncModuleAsyncConfig): DynamicModule {
    return {
      module: CheckoutSyncModule,
      imports: options.imports || [],
      providers: [
        {
          provide: CHECKOUT_SYNC_CONFIG,
          useFactory: async (...args: unknown[]) =>
            mergeCheckoutSyncConfig(await options.useFactory(...args)),
          inject: options.inject || [],
        },
        ...this.createProviders(),
      ],
      controllers: this.createControllers(),
      exports: EXPORTED_TOKENS,
    };
  }

  private static createControllers() {
    return [CheckoutController, ReconciliationController, HealthController];
  }

  /**
   * Providers resolved from the merged configuration
   */
  private static createProviders(): Provider[] {
    return [
      {
        provide: STORAGE_ADAPTER,
        useFactory: (config: CheckoutSyncModuleConfig) =>
          createStorageAdapter(config),
        inject: [CHECKOUT_SYNC_CONFIG],
      },
      {
        provide: GATEWAY_CLIENT,
        useFactory: (config: CheckoutSyncModuleConfig) =>
          createGatewayClient(config),
        inject: [CHECKOUT_SYNC_CONFIG],
      },
      {
        provide: PAYMENT_METHOD_REGISTRY,
        useFactory: (
          config: CheckoutSyncModuleConfig,
          gateway: GatewayStatusClient,
        ): PaymentMethodRegistry => {
          const registry = new StaticPaymentMethodRegistry();
          const ids = config.gateway.paymentMethodIds ?? [gateway.gatewayName];
          for (const id of ids) {
            registry.register(id, gateway);
          }
          return registry;
        },
        inject: [CHECKOUT_SYNC_CONFIG, GATEWAY_CLIENT],
      },
      {
        provide: SHIPMENT_SYNC,
        useFactory: (config: CheckoutSyncModuleConfig) =>
          createShipmentSync(config),
        inject: [CHECKOUT_SYNC_CONFIG],
      },
      {
        provide: EVENT_DISPATCHER,
        useFactory: (config: CheckoutSyncModuleConfig) =>
          createEventDispatcher(config),
        inject: [CHECKOUT_SYNC_CONFIG],
      },
      {
        provide: PaymentStateReconciler,
        useFactory: (
          storageAdapter: StorageAdapter,
          eventDispatcher: EventDispatcher,
        ) => new PaymentStateReconciler(storageAdapter, eventDispatcher),
        inject: [STORAGE_ADAPTER, EVENT_DISPATCHER],
      },
      {
        provide: FailedOrderRecoveryService,
        useFactory: (
          storageAdapter: StorageAdapter,
          gateway: GatewayStatusClient,
          shipmentSync: ShipmentSync,
          eventDispatcher: EventDispatcher,
          configuration: ConfigurationService,
        ) =>
          new FailedOrderRecoveryService(
            storageAdapter,
            gateway,
            shipmentSync,
            eventDispatcher,
            {
              windowDays: configuration.getRecoveryWindowDays(),
              pageSize: configuration.getPageSize(),
            },
          ),
        inject: [
          STORAGE_ADAPTER,
          GATEWAY_CLIENT,
          SHIPMENT_SYNC,
          EVENT_DISPATCHER,
          ConfigurationService,
        ],
      },
      {
        provide: CheckoutReconciliationService,
        useFactory: (
          storageAdapter: StorageAdapter,
          gateway: GatewayStatusClient,
          paymentReconciler: PaymentStateReconciler,
          failedOrderRecovery: FailedOrderRecoveryService,
          eventDispatcher: EventDispatcher,
          configuration: ConfigurationService,
        ) =>
          new CheckoutReconciliationService(
            storageAdapter,
            gateway,
            paymentReconciler,
            failedOrderRecovery,
            eventDispatcher,
            { pageSize: configuration.getPageSize() },
          ),
        inject: [
          STORAGE_ADAPTER,
          GATEWAY_CLIENT,
          PaymentStateReconciler,
          FailedOrderRecoveryService,
          EVENT_DISPATCHER,
          ConfigurationService,
        ],
      },
      {
        provide: CheckoutService,
        useFactory: (
          storageAdapter: StorageAdapter,
          paymentMethods: PaymentMethodRegistry,
        ) => new CheckoutService(storageAdapter, paymentMethods),
        inject: [STORAGE_ADAPTER, PAYMENT_METHOD_REGISTRY],
      },
      {
        provide: ConfigurationService,
        useClass: ConfigurationService,
      },
      {
        provide: ReconciliationScheduler,
        useClass: ReconciliationScheduler,
      },
    ];
  }
}

export async function createStorageAdapter(
  config: CheckoutSyncModuleConfig,
): Promise<StorageAdapter> {
  switch (config.storage.type) {
    case 'mock':
      return new MockStorageAdapter();

    case 'typeorm': {
      const dataSource = createDataSource(config.storage.options);
      await dataSource.initialize();
      return new TypeORMStorageAdapter(dataSource);
    }

    case 'custom':
      if (!config.storage.adapter) {
        throw new Error('Custom storage adapter not provided');
      }
      return config.storage.adapter;
  }
}

export function createGatewayClient(
  config: CheckoutSyncModuleConfig,
): GatewayStatusClient {
  const { gateway } = config;

  switch (gateway.type) {
    case 'mock':
      return new MockGatewayClient();

    case 'braintree':
      if (!gateway.credentials) {
        throw new Error('Braintree credentials not provided');
      }
      return new BraintreeGatewayClient(gateway.credentials, gateway.options);

    case 'custom':
      if (!gateway.client) {
        throw new Error('Custom gateway client not provided');
      }
      return gateway.client;
  }
}

export function createShipmentSync(
  config: CheckoutSyncModuleConfig,
): ShipmentSync {
  const shipments = config.shipments ?? { type: 'noop' };

  switch (shipments.type) {
    case 'noop':
      return new LoggingShipmentSync();

    case 'http':
      if (!shipments.url) {
        throw new Error('Shipment sync URL not provided');
      }
      return new HttpShipmentSync(shipments.url, {
        timeout: shipments.timeoutMs,
      });

    case 'custom':
      if (!shipments.sync) {
        throw new Error('Custom shipment sync not provided');
      }
      return shipments.sync;
  }
}

export function createEventDispatcher(
  config: CheckoutSyncModuleConfig,
): EventDispatcher {
  const dispatcher = config.events?.dispatcher || new EventDispatcherImpl();

  if (config.events?.enableLogging) {
    const loggingHandler = new LoggingEventHandler(
      undefined,
      config.events.logLevel,
    );
    dispatcher.onAll(loggingHandler.getHandler());
  }

  if (config.events?.handlers) {
    for (const { eventType, handler } of config.events.handlers) {
      dispatcher.on(eventType, handler);
    }
  }

  return dispatcher;
}
