import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { CheckoutSyncModule, CheckoutSyncModuleConfig } from './modules';

type StorageType = CheckoutSyncModuleConfig['storage']['type'];
type GatewayType = CheckoutSyncModuleConfig['gateway']['type'];

function storageType(value: string | undefined): StorageType {
  return value === 'typeorm' ? 'typeorm' : 'mock';
}

function gatewayType(value: string | undefined): GatewayType {
  return value === 'braintree' ? 'braintree' : 'mock';
}

function toInt(value: string | undefined, fallback: number): number {
  const parsed = value === undefined ? NaN : parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

/**
 * Module configuration from environment variables
 */
export function checkoutSyncConfigFromEnv(
  env: ConfigService,
): CheckoutSyncModuleConfig {
  const shipmentUrl = env.get<string>('SHIPMENT_SYNC_URL');

  return {
    storage: {
      type: storageType(env.get<string>('CHECKOUT_SYNC_STORAGE')),
    },
    gateway: {
      type: gatewayType(env.get<string>('CHECKOUT_SYNC_GATEWAY')),
      credentials: {
        publicKey: env.get<string>('BRAINTREE_PUBLIC_KEY') ?? '',
        privateKey: env.get<string>('BRAINTREE_PRIVATE_KEY') ?? '',
      },
      options: {
        apiBaseUrl: env.get<string>('BRAINTREE_API_URL'),
        timeout: toInt(env.get<string>('BRAINTREE_TIMEOUT_MS'), 30000),
      },
    },
    shipments: shipmentUrl
      ? { type: 'http', url: shipmentUrl }
      : { type: 'noop' },
    reconciliation: {
      pageSize: toInt(env.get<string>('CHECKOUT_SYNC_PAGE_SIZE'), 100),
      recoveryWindowDays: toInt(
        env.get<string>('CHECKOUT_SYNC_RECOVERY_WINDOW_DAYS'),
        2,
      ),
    },
    scheduler: {
      enabled: env.get<string>('CHECKOUT_SYNC_SCHEDULER_ENABLED') === 'true',
      intervalMs: toInt(
        env.get<string>('CHECKOUT_SYNC_INTERVAL_MS'),
        15 * 60 * 1000,
      ),
      runOnStart: env.get<string>('CHECKOUT_SYNC_RUN_ON_START') === 'true',
    },
    events: {
      enableLogging: true,
    },
    debug: env.get<string>('CHECKOUT_SYNC_DEBUG') === 'true',
  };
}

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
    }),
    CheckoutSyncModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (env: ConfigService) => checkoutSyncConfigFromEnv(env),
    }),
  ],
  controllers: [],
  providers: [],
})
export class AppModule {}
