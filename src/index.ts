/**
 * Checkout Sync
 *
 * Reconciles local checkouts and payments with the payment gateway and
 * repairs orders whose payment settled after the checkout flow gave up.
 */

// Export all core components
export * from './core';

// Export adapters
export * from './adapters/storage/mock';
export * from './adapters/storage/typeorm';
export * from './adapters/gateway';
export * from './adapters/shipment';

// Export NestJS module, controllers, services and injection tokens
export * from './modules';

// DTOs
export * from './_shared/dto';
