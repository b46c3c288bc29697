/**
 * Checkout sync NestJS module
 */

// Main module
export {
  CheckoutSyncModule,
  createStorageAdapter,
  createGatewayClient,
  createShipmentSync,
  createEventDispatcher,
} from './checkout-sync.module';

// Configuration
export {
  defaultCheckoutSyncConfig,
  mergeCheckoutSyncConfig,
} from './checkout-sync.config';
export type {
  CheckoutSyncModuleConfig,
  CheckoutSyncModuleAsyncConfig,
} from './checkout-sync.config';

// Controllers
export * from './controllers';

// Services
export { ConfigurationService } from './services/configuration.service';
export { ReconciliationScheduler } from './services/reconciliation.scheduler';

// Injection tokens
export * from './constants';
